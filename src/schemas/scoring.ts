/**
 * Scoring Validation Schemas
 *
 * Zod schemas for the values that cross a trust boundary: claim rows read
 * from the database, findings returned by scoring agents, and weight
 * overrides sent to the control API.
 */

import { z } from "zod";

/** Nullable text column; blank strings are kept as-is */
const text = z.string().nullish();

/** Nullable numeric column; numeric strings (pg `numeric`) are coerced */
const amount = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((val, ctx) => {
    if (val === null || val === undefined || val === "") return null;
    const num = typeof val === "number" ? val : Number(val);
    if (!Number.isFinite(num)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a finite number" });
      return z.NEVER;
    }
    return num;
  });

/**
 * One claim row. Only `pharmacyNumber` is required by the core; the other
 * columns feed the scoring agents and the transaction analysis.
 */
export const claimRecordSchema = z.object({
  pharmacyNumber: z.string().min(1, "pharmacyNumber is required"),
  pharmacyName: text,
  pharmacyCity: text,
  pharmacyState: text,
  patientId: text,
  productNdc: text,
  productName: text,
  coverageType: text,
  occ: amount,
  copayCost: amount,
  oopCost: amount,
  copayFeeCost: amount,
  originalCost: amount,
  /** ISO date or timestamp */
  dateSubmitted: text,
  /** "Y" / "N" */
  isNetworkPharmacy: text,
  networkPharmacyGroupType: text,
  paRejectionCode1: text,
  paRejectionCode2: text,
  claimCobPrimaryRejectCode1: text,
  claimCobPrimaryRejectCode2: text,
  latestPaStatusCode: text,
  latestPaStatusDesc: text,
});

export type ClaimRecordInput = z.input<typeof claimRecordSchema>;

const detailValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const findingSchema = z.object({
  entityId: z.string().min(1, "entityId is required"),
  score: z.number().min(0, "score must be >= 0").max(1, "score must be <= 1"),
  reason: z.string(),
  sourceUnit: z.string().min(1),
  detail: z.record(z.string(), detailValue),
});

export const findingListSchema = z.array(findingSchema);

/** Body of PUT /api/v1/weights */
export const weightOverridesSchema = z
  .record(
    z.string().min(1),
    z.number().finite("weight must be finite").nonnegative("weight must be >= 0"),
  )
  .refine((weights) => Object.keys(weights).length > 0, {
    message: "at least one agent weight is required",
  });

export type WeightOverrides = z.infer<typeof weightOverridesSchema>;

export const scoreExportQuerySchema = z.object({
  format: z.enum(["json", "csv"]).default("json"),
  riskLevel: z.enum(["HIGH", "MEDIUM", "LOW", "VERY_LOW"]).optional(),
});
