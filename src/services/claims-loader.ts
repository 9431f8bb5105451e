/**
 * Claims Loader
 *
 * Reads the copay detail report into validated claim records. Rows that fail
 * validation (no pharmacy number, non-numeric cost) are skipped with a
 * warning instead of failing the whole load.
 */

import { db } from "../db/index.ts";
import { copayClaims } from "../db/schema/index.ts";
import type { ClaimRecord } from "../agents/base-agent.ts";
import { claimRecordSchema } from "../schemas/scoring.ts";

/** Where a scoring run reads its claims from */
export interface ClaimSource {
  loadClaims(limit: number): Promise<ClaimRecord[]>;
}

/**
 * Validate raw rows. Returns the valid records and the number skipped.
 */
export function parseClaimRows(rows: readonly unknown[]): {
  claims: ClaimRecord[];
  skipped: number;
} {
  const claims: ClaimRecord[] = [];
  let skipped = 0;

  rows.forEach((row, i) => {
    const parsed = claimRecordSchema.safeParse(row);
    if (parsed.success) {
      claims.push(parsed.data);
      return;
    }
    skipped++;
    const issue = parsed.error.issues[0];
    console.warn(
      `[ClaimsLoader] Skipping row ${i}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`,
    );
  });

  return { claims, skipped };
}

export async function loadClaims(limit: number): Promise<ClaimRecord[]> {
  console.log(`[ClaimsLoader] Loading up to ${limit} claims from rpt_copay_detail...`);
  const rows = await db.select().from(copayClaims).limit(limit);
  const { claims, skipped } = parseClaimRows(rows);
  console.log(
    `[ClaimsLoader] Loaded ${claims.length} claims${skipped > 0 ? ` (${skipped} invalid rows skipped)` : ""}`,
  );
  return claims;
}

export const databaseClaimSource: ClaimSource = { loadClaims };
