import {
  pgTable,
  text,
  integer,
  numeric,
  timestamp,
} from "drizzle-orm/pg-core";

/**
 * Copay detail report: one row per submitted pharmacy claim. Read-only for
 * the scoring engine.
 */
export const copayClaims = pgTable("rpt_copay_detail", {
  /** Pharmacy identifier (NCPDP / NPI), the entity key of every score */
  pharmacyNumber: text("pharmacy_number").notNull(),

  pharmacyName: text("pharmacy_name"),
  pharmacyCity: text("pharmacy_city"),
  pharmacyState: text("pharmacy_state"),

  patientId: text("patient_id"),
  productNdc: text("product_ndc"),
  productName: text("product_name"),

  /** "Well Covered", "Covered - HD", "Not Covered" or "Cash" */
  coverageType: text("coverage_type"),

  /** Other coverage code submitted with the claim */
  occ: integer("occ"),

  copayCost: numeric("copay_cost", { precision: 12, scale: 2 }),
  oopCost: numeric("oop_cost", { precision: 12, scale: 2 }),
  copayFeeCost: numeric("copay_fee_cost", { precision: 12, scale: 2 }),
  originalCost: numeric("original_cost", { precision: 12, scale: 2 }),

  dateSubmitted: timestamp("date_submitted", { mode: "string" }),

  /** "Y" / "N" */
  isNetworkPharmacy: text("is_network_pharmacy"),
  networkPharmacyGroupType: text("network_pharmacy_group_type"),

  paRejectionCode1: text("pa_rejection_code_1"),
  paRejectionCode2: text("pa_rejection_code_2"),
  claimCobPrimaryRejectCode1: text("claim_cob_primary_reject_code1"),
  claimCobPrimaryRejectCode2: text("claim_cob_primary_reject_code2"),
  latestPaStatusCode: text("latest_pa_status_code"),
  latestPaStatusDesc: text("latest_pa_status_desc"),
});

export type CopayClaimRow = typeof copayClaims.$inferSelect;
