import { byCodeUnit } from '../keys.js'
import { TaxonomyBuildError } from '../errors.js'

export const MANUAL_REVIEW = 'MANUAL_REVIEW'

/**
 * Short code for a scientific name: the first six letters of a bare genus,
 * otherwise genus[0..3] + species[0..3], extended with the first letter of the
 * infraspecific rank and infraspecies[0..3] for trinomials.
 */
export function generateTaxonCode(name: string): string {
  const parts = name.toLowerCase().trim().split(/\s+/)
  const [genus = '', species, infratype, ...rest] = parts
  const infraspecies = rest.length ? rest.join(' ') : undefined

  if (!species) return genus.slice(0, 6)
  const base = genus.slice(0, 3) + species.slice(0, 3)
  if (!infratype || !infraspecies) return base
  return base + infratype.slice(0, 1) + infraspecies.slice(0, 3)
}

export interface CodedName {
  name: string
  code: string
  manual: boolean
}

/**
 * Disambiguates colliding codes. Rows are ordered by name; genus and species
 * codes that collide get a 1-based sequence suffix, colliding infraspecific
 * codes are marked for manual review.
 */
export function fixDuplicateCodes(rows: ReadonlyArray<{ name: string; code: string }>): CodedName[] {
  const seen = new Set<string>()
  const dupNames: string[] = []
  for (const r of rows) {
    if (seen.has(r.name)) dupNames.push(r.name)
    seen.add(r.name)
  }
  if (dupNames.length) {
    throw new TaxonomyBuildError(dupNames.map(n => `duplicate taxon name "${n}" while generating codes`))
  }

  const sorted = [...rows].sort((a, b) => byCodeUnit(a.name, b.name))
  const groupSize = new Map<string, number>()
  for (const r of sorted) groupSize.set(r.code, (groupSize.get(r.code) ?? 0) + 1)

  const counter = new Map<string, number>()
  return sorted.map(r => {
    const size = groupSize.get(r.code) ?? 1
    const n = (counter.get(r.code) ?? 0) + 1
    counter.set(r.code, n)
    if (size === 1) return { name: r.name, code: r.code, manual: false }
    if (r.code.length <= 6) return { name: r.name, code: `${r.code}${n}`, manual: false }
    return { name: r.name, code: MANUAL_REVIEW, manual: true }
  })
}
