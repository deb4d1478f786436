import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { parseCsv } from '../src/csv.js'
import { TaxonomyBuildError } from '../src/errors.js'
import { parseTaxonomySource, readTaxonomySource, type TaxonomySource } from '../src/taxonomy/source.js'
import { buildTaxonomy, type BuildOptions, type TaxonConceptStore } from '../src/taxonomy/store.js'
import { readOverrides } from '../src/taxonomy/overrides.js'
import { buildVocabulary, type VocabularyNormalizer } from '../src/vocabulary/normalizer.js'

export const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures')
export const REFERENCE = path.join(FIXTURES, 'reference')
export const PLOTS = path.join(FIXTURES, 'plots')

export const referenceFile = (name: string): string => path.join(REFERENCE, name)

export function fixtureStore(options?: BuildOptions): TaxonConceptStore {
  return buildTaxonomy(readTaxonomySource(referenceFile('taxonomy.csv'), referenceFile('citations.csv')), options)
}

export const fixtureOverrides = () => readOverrides(referenceFile('name_overrides.csv'))

export function fixtureVocabulary(): VocabularyNormalizer {
  return buildVocabulary({
    dictionaryPath: referenceFile('database_dictionary.csv'),
    organizationPath: referenceFile('organization.csv'),
    aliasesPath: referenceFile('vocabulary_aliases.json'),
  })
}

const TAXONOMY_HEADER =
  'taxon_code,taxon_name,taxon_author,taxon_status,taxon_accepted,taxon_family,taxon_source,taxon_link,taxon_level,taxon_category,taxon_habit,taxon_native,taxon_non_native'

interface TaxonLine {
  code: string
  name: string
  status?: string
  accepted?: string
  level?: string
  family?: string
  category?: string
  author?: string
  source?: string
}

/** One taxonomy CSV line; accepted defaults to the name itself. */
export function taxon(t: TaxonLine): string {
  return [
    t.code,
    t.name,
    t.author ?? 'L.',
    t.status ?? 'accepted',
    t.accepted ?? t.name,
    t.family ?? 'Asteraceae',
    t.source ?? 'NA',
    'NA',
    t.level ?? (t.name.includes(' ') ? 'species' : 'genus'),
    t.category ?? 'eudicot',
    'forb',
    'TRUE',
    'FALSE',
  ].join(',')
}

export function taxonomyFrom(lines: string[], citations: string[] = []): TaxonomySource {
  return parseTaxonomySource(
    parseCsv([TAXONOMY_HEADER, ...lines].join('\n')),
    parseCsv(['taxon_source,taxon_citation', ...citations].join('\n')),
  )
}

/** Problems reported by a failed build, or [] when the build succeeds. */
export function buildProblems(source: TaxonomySource): string[] {
  try {
    buildTaxonomy(source)
    return []
  } catch (error) {
    if (error instanceof TaxonomyBuildError) return error.problems
    throw error
  }
}
