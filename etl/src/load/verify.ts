import type { LoadBatch } from '../tables/batch.js'
import type { Destination } from './destination.js'

// Each query counts rows that break a taxonomy invariant; all must be zero
const TAXONOMY_CHECKS: ReadonlyArray<{ problem: string; sql: string }> = [
  {
    problem: 'names accepted as a concept that is not itself accepted',
    sql: `SELECT COUNT(*) AS n FROM taxon_all a
      JOIN taxon_all b ON b.taxon_code = a.taxon_accepted_code
      WHERE b.taxon_accepted_code <> b.taxon_code`,
  },
  {
    problem: 'names without an accepted taxon',
    sql: `SELECT COUNT(*) AS n FROM taxon_all a
      LEFT JOIN taxon_accepted t ON t.taxon_accepted_code = a.taxon_accepted_code
      WHERE t.taxon_accepted_code IS NULL`,
  },
  {
    problem: 'accepted taxa without a genus hierarchy entry',
    sql: `SELECT COUNT(*) AS n FROM taxon_accepted a
      LEFT JOIN taxon_hierarchy h ON h.taxon_genus_code = a.taxon_genus_code
      WHERE h.taxon_genus_code IS NULL`,
  },
]

export interface VerifyResult {
  counts: Record<string, { expected: number; actual: number }>
  problems: string[]
}

/** Compares destination row counts with the batch and re-checks the written taxonomy. */
export async function verifyLoad(dest: Destination, batch: LoadBatch): Promise<VerifyResult> {
  const counts: VerifyResult['counts'] = {}
  const problems: string[] = []

  for (const { spec, rows } of batch.entries()) {
    const actual = await dest.count(spec.name)
    counts[spec.name] = { expected: rows.length, actual }
    if (actual !== rows.length) problems.push(`${spec.name}: expected ${rows.length} rows, found ${actual}`)
  }

  if (batch.rows('taxon_all').length) {
    for (const check of TAXONOMY_CHECKS) {
      const n = await dest.scalar(check.sql)
      if (n) problems.push(`${n} ${check.problem}`)
    }
  }
  return { counts, problems }
}
