#!/usr/bin/env tsx
import { env } from '@vegplot/config'
import { fixDuplicateCodes, formatCsv, generateTaxonCode, readCsv, readTaxonomySource } from '@vegplot/etl'

// Suggests codes for new names (a CSV with a taxon_name column), taking the
// codes already in the taxonomy into account
function main() {
  const namesFile = process.argv[2]
  if (!namesFile) {
    console.error('Usage: npm run taxonomy:codes -- <new-names.csv>')
    process.exit(1)
  }

  const existing = readTaxonomySource(env.TAXONOMY_PATH).rows.map(r => ({ name: r.taxon_name, code: generateTaxonCode(r.taxon_name) }))
  const known = new Set(existing.map(r => r.name))
  const fresh = readCsv(namesFile)
    .map(r => (r.taxon_name ?? '').trim())
    .filter(name => name && !known.has(name))
    .map(name => ({ name, code: generateTaxonCode(name) }))

  const freshNames = new Set(fresh.map(r => r.name))
  const coded = fixDuplicateCodes([...existing, ...fresh]).filter(r => freshNames.has(r.name))

  process.stdout.write(formatCsv(['taxon_name', 'taxon_code', 'manual_review'], coded.map(r => ({
    taxon_name: r.name,
    taxon_code: r.code,
    manual_review: r.manual,
  }))))
  const manual = coded.filter(r => r.manual).length
  if (manual) console.error(`[codes] ${manual} name(s) need a manually assigned code`)
}

main()
