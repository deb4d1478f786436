#!/usr/bin/env tsx
import { env } from '@vegplot/config'
import {
  HardFailure,
  MANUAL_REVIEW,
  TaxonomyBuildError,
  buildTaxonomy,
  loadKeyRegistry,
  readTaxonomySource,
  verifyTaxonomy,
} from '@vegplot/etl'

function main() {
  const taxonomyPath = process.argv[2] ?? env.TAXONOMY_PATH
  const citationsPath = process.argv[3] ?? env.CITATIONS_PATH

  let errors = 0
  try {
    const source = readTaxonomySource(taxonomyPath, citationsPath)

    for (const row of source.rows) {
      if (row.taxon_code === MANUAL_REVIEW) {
        console.error(`[code] ${row.taxon_name} still needs a reviewed code`)
        errors++
      }
    }

    // Keys are checked against the carried registry so a release never renumbers
    const store = buildTaxonomy(source, { registry: loadKeyRegistry(env.KEY_REGISTRY_PATH) })
    for (const problem of verifyTaxonomy(store)) {
      console.error(`[verify] ${problem}`)
      errors++
    }

    if (errors === 0) {
      console.log(`[lint] OK: ${store.concepts.length} names, ${store.accepted.length} accepted taxa, ${store.hierarchy.length} genera`)
      return
    }
  } catch (error) {
    if (error instanceof TaxonomyBuildError) {
      for (const problem of error.problems) console.error(`[build] ${problem}`)
      errors += error.problems.length
    } else if (error instanceof HardFailure) {
      console.error(`[source] ${error.message}`)
      errors++
    } else {
      throw error
    }
  }

  console.error(`\n[lint] FAILED with ${errors} error(s)`)
  process.exit(1)
}

main()
