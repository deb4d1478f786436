import type { AcceptedTaxon, Classification, GenusHierarchy, TaxonLevel } from '@vegplot/shared'
import { TaxonomyBuildError } from '../errors.js'
import { GENUS_LEVELS } from './source.js'

export interface HierarchyLookup {
  getAccepted(acceptedCode: string): AcceptedTaxon | undefined
  getGenus(genusCode: string): GenusHierarchy | undefined
  findGenusByName(genus: string): GenusHierarchy | undefined
}

export const isGenusLevel = (level: TaxonLevel): boolean => GENUS_LEVELS.has(level)

/** Name used to find the genus-level record of an accepted taxon. */
export function genusJoinName(acceptedName: string, level: TaxonLevel): string {
  if (level === 'unknown' || level === 'functional group') return acceptedName
  return acceptedName.split(' ')[0] ?? acceptedName
}

/**
 * Genus-level record for an accepted taxon, or undefined when the hierarchy has
 * no entry. Genus-level taxa (genus, unknown, functional group) are their own
 * hierarchy entry; everything below genus joins through the genus name.
 */
export function findGenusFor(lookup: HierarchyLookup, taxon: Pick<AcceptedTaxon, 'acceptedCode' | 'name' | 'level'>): GenusHierarchy | undefined {
  if (isGenusLevel(taxon.level)) return lookup.getGenus(taxon.acceptedCode)
  return lookup.findGenusByName(genusJoinName(taxon.name, taxon.level))
}

export function deriveClassification(lookup: HierarchyLookup, acceptedCode: string): Classification {
  const accepted = lookup.getAccepted(acceptedCode)
  if (!accepted) throw new TaxonomyBuildError([`unknown accepted taxon code "${acceptedCode}"`])
  const genus = lookup.getGenus(accepted.genusCode)
  if (!genus) {
    throw new TaxonomyBuildError([`no genus hierarchy entry "${accepted.genusCode}" for ${accepted.name} (${acceptedCode})`])
  }
  return { family: genus.family, category: genus.category }
}
