#!/usr/bin/env tsx
import fs from 'node:fs'
import {
  KeyRegistry,
  diffKeySnapshots,
  loadKeyRegistry,
  readTaxonomySource,
  type TaxonomySourceRow,
} from '@vegplot/etl'

function load(file: string): Map<string, TaxonomySourceRow> {
  return new Map(readTaxonomySource(file).rows.map(r => [r.taxon_code, r]))
}

function main() {
  const [oldFile, newFile, oldRegistry, newRegistry] = process.argv.slice(2)
  if (!oldFile || !newFile) {
    console.error('Usage: npm run taxonomy:diff -- <old.csv> <new.csv> [old-registry.json new-registry.json]')
    process.exit(1)
  }
  const A = load(oldFile)
  const B = load(newFile)

  const added: string[] = []
  const removed: string[] = []
  const moved: string[] = []

  for (const code of B.keys()) if (!A.has(code)) added.push(code)
  for (const code of A.keys()) if (!B.has(code)) removed.push(code)
  for (const [code, a] of A) {
    const b = B.get(code)
    if (b && a.taxon_accepted !== b.taxon_accepted) moved.push(`${code}: ${a.taxon_accepted} -> ${b.taxon_accepted}`)
  }

  console.log(`Added: ${added.length}`)
  added.slice(0, 50).forEach(code => console.log('  +', code))
  console.log(`Removed: ${removed.length}`)
  removed.slice(0, 50).forEach(code => console.log('  -', code))
  console.log(`Re-accepted: ${moved.length}`)
  moved.slice(0, 50).forEach(line => console.log('  ~', line))

  let shifted = 0
  if (oldRegistry && newRegistry) {
    const before = fs.existsSync(oldRegistry) ? loadKeyRegistry(oldRegistry) : new KeyRegistry()
    const diff = diffKeySnapshots(before.snapshot(), loadKeyRegistry(newRegistry).snapshot())
    console.log(`New keys: ${diff.added.length}`)
    diff.added.slice(0, 50).forEach(k => console.log('  +', `${k.table}.${k.value} = ${k.after}`))
    console.log(`Shifted keys: ${diff.shifted.length}`)
    diff.shifted.forEach(k => console.log('  !', `${k.table}.${k.value}: ${k.before} -> ${k.after}`))
    shifted = diff.shifted.length
  }

  // Removed codes break existing observations; shifted keys break foreign keys
  if (removed.length > 0 || shifted > 0) process.exit(1)
}

main()
