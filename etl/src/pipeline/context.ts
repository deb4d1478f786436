import path from 'node:path'
import type { Env } from '@vegplot/config'
import type { ExclusionEntry, ProblemEntry } from '@vegplot/shared'
import { SourceError } from '../errors.js'
import { cleanText } from '../taxonomy/source.js'
import { collapseCover, parseCoverObservations, type NameResolver } from '../taxonomy/resolver.js'
import type { TaxonConceptStore } from '../taxonomy/store.js'
import type { VocabularyNormalizer } from '../vocabulary/normalizer.js'
import { LoadBatch } from '../tables/batch.js'
import { applyRenames, normalizeTable, type NormalizeContext } from '../tables/normalize.js'
import { getTable } from '../tables/schema.js'
import type { SourceTable } from '../tables/sources.js'
import type { LoadSummary } from '../load/loader.js'
import type { Destination } from '../load/destination.js'
import { PgDestination } from '../load/pg-destination.js'
import { SqliteDestination } from '../load/sqlite-destination.js'

export interface PipelineSettings {
  taxonomyPath: string
  citationsPath: string
  dictionaryPath: string
  organizationPath: string
  overridesPath: string
  aliasesPath: string
  dataRoot: string
  projectListPath: string
  outputDir: string
  keyRegistryPath: string
  databaseUrl?: string
  sqlitePath: string
  retries: number
  retryDelayMs: number
  chunkSize: number
  // Fail the run when any observed name stays unresolved
  strict: boolean
  // Check only: no taxonomy tables and no key registry written
  dryRun: boolean
}

export function settingsFromEnv(env: Env, overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    taxonomyPath: env.TAXONOMY_PATH,
    citationsPath: env.CITATIONS_PATH,
    dictionaryPath: env.DICTIONARY_PATH,
    organizationPath: env.ORGANIZATION_PATH,
    overridesPath: env.OVERRIDES_PATH,
    aliasesPath: env.ALIASES_PATH,
    dataRoot: env.DATA_ROOT,
    projectListPath: env.PROJECT_LIST_PATH,
    outputDir: env.OUTPUT_DIR,
    keyRegistryPath: env.KEY_REGISTRY_PATH,
    databaseUrl: env.DATABASE_URL,
    sqlitePath: env.SQLITE_PATH,
    retries: env.LOAD_RETRIES,
    retryDelayMs: env.LOAD_RETRY_DELAY_MS,
    chunkSize: env.LOAD_CHUNK_SIZE,
    strict: false,
    dryRun: false,
    ...overrides,
  }
}

export const outputPaths = (outputDir: string) => ({
  taxonomy: path.join(outputDir, 'taxonomy'),
  tables: path.join(outputDir, 'tables'),
  sql: path.join(outputDir, 'sql'),
  reports: path.join(outputDir, 'reports'),
})

export function connectDestination(settings: PipelineSettings): Destination {
  return settings.databaseUrl
    ? new PgDestination(settings.databaseUrl)
    : new SqliteDestination(settings.sqlitePath)
}

/** State carried from step to step during one run. */
export class PipelineContext {
  store?: TaxonConceptStore
  vocabulary?: VocabularyNormalizer
  readonly batch = new LoadBatch()
  problems: ProblemEntry[] = []
  exclusions: ExclusionEntry[] = []
  duplicatesDropped: Record<string, number> = {}
  load?: LoadSummary

  constructor(readonly settings: PipelineSettings) {}

  get outputs() {
    return outputPaths(this.settings.outputDir)
  }

  requireStore(): TaxonConceptStore {
    if (!this.store) throw new Error('Taxonomy has not been built in this run')
    return this.store
  }

  requireVocabulary(): VocabularyNormalizer {
    if (!this.vocabulary) throw new Error('Vocabularies have not been loaded in this run')
    return this.vocabulary
  }
}

const TAXON_TABLES = new Set(['tree_structure', 'shrub_structure'])

export interface AssembledTables {
  problems: ProblemEntry[]
  exclusions: ExclusionEntry[]
}

/**
 * Normalizes every source table into the batch. Vegetation cover is collapsed
 * and resolved first; structure tables are resolved row by row. Rows whose
 * names stay unresolved are withheld and reported.
 */
export function assemblePlotTables(
  sources: readonly SourceTable[],
  vocabulary: VocabularyNormalizer,
  resolver: NameResolver,
  batch: LoadBatch,
): AssembledTables {
  const problems: ProblemEntry[] = []
  const exclusions: ExclusionEntry[] = []

  for (const source of sources) {
    const spec = getTable(source.table)
    const ctx: NormalizeContext = { vocabulary, file: source.file }
    const records = source.records.map(r => applyRenames(spec, r))

    if (spec.name === 'vegetation_cover') {
      // Retired cover type labels must collapse with their current label
      const observations = collapseCover(parseCoverObservations(records, source.file).map((o, i) => ({
        ...o,
        cover_type: vocabulary.canonicalLabel('cover_type', o.cover_type, { table: spec.name, file: source.file, line: i + 2 }) ?? o.cover_type,
      })))
      const resolved = resolver.resolveObservations(observations, source.project)
      problems.push(...resolved.problems)
      exclusions.push(...resolved.exclusions)
      batch.add(spec.name, normalizeTable(spec, resolved.rows, ctx))
    } else if (TAXON_TABLES.has(spec.name)) {
      const named = records.map((record, i) => {
        const name = cleanText(record.name_original ?? '')
        if (!name) throw new SourceError('Missing required name_original', { table: spec.name, file: source.file, line: i + 2 })
        return { ...record, name_original: name }
      })
      const resolved = resolver.resolveObservations(named, source.project)
      problems.push(...resolved.problems)
      exclusions.push(...resolved.exclusions)
      batch.add(spec.name, normalizeTable(spec, resolved.rows, ctx))
    } else {
      batch.add(spec.name, normalizeTable(spec, records, ctx))
    }
  }
  return { problems: mergeProblems(problems), exclusions }
}

// One entry per (dataset, name) across tables
function mergeProblems(entries: readonly ProblemEntry[]): ProblemEntry[] {
  const merged = new Map<string, ProblemEntry>()
  for (const entry of entries) {
    const key = `${entry.dataset}\u0000${entry.nameOriginal}`
    const existing = merged.get(key)
    if (existing) existing.occurrences += entry.occurrences
    else merged.set(key, { ...entry })
  }
  return Array.from(merged.values())
}
