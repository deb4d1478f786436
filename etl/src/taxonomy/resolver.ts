import { z } from 'zod'
import type { ExclusionEntry, ProblemEntry } from '@vegplot/shared'
import { byCodeUnit } from '../keys.js'
import { MeasurementError } from '../errors.js'
import { cleanText } from './source.js'
import { byStatusPrecedence, type TaxonConceptStore } from './store.js'
import { OverrideTable } from './overrides.js'

export type ResolvedVia = 'exact' | 'override' | 'cleaned'

export type Resolution =
  | {
      status: 'resolved'
      nameOriginal: string
      nameAdjudicated: string
      codeAdjudicated: string
      acceptedCode: string
      via: ResolvedVia
    }
  | { status: 'excluded'; nameOriginal: string; rule: string }
  | { status: 'unresolved'; nameOriginal: string; nameAdjudicated: null }

// Field shorthand for an unidentified species within a genus
const SPECIES_PLACEHOLDER = /\s+spp?\.$/

export function cleanName(name: string): string {
  return cleanText(name).replace(SPECIES_PLACEHOLDER, '')
}

/**
 * Maps observed names to accepted taxa: exact match, then the dataset's
 * override table, then a cleaned form of the name. Anything left over is
 * reported as unresolved and never guessed at.
 */
export class NameResolver {
  private readonly cache = new Map<string, Resolution>()

  constructor(
    private readonly store: TaxonConceptStore,
    private readonly overrides: OverrideTable = new OverrideTable(),
  ) {}

  resolve(nameOriginal: string, dataset: string): Resolution {
    const key = `${dataset}\u0000${nameOriginal}`
    const cached = this.cache.get(key)
    if (cached) return cached
    const resolution = this.resolveUncached(nameOriginal, dataset)
    this.cache.set(key, resolution)
    return resolution
  }

  private resolveUncached(nameOriginal: string, dataset: string): Resolution {
    const exact = this.exact(nameOriginal, nameOriginal, 'exact')
    if (exact) return exact

    const override = this.overrides.find(dataset, nameOriginal)
    if (override?.action === 'exclude') {
      return { status: 'excluded', nameOriginal, rule: `override:${override.dataset}` }
    }
    if (override?.action === 'correct') {
      const corrected = this.exact(nameOriginal, override.nameCorrected, 'override')
        ?? this.exact(nameOriginal, cleanName(override.nameCorrected), 'override')
      if (corrected) return corrected
    }

    const cleaned = cleanName(nameOriginal)
    if (cleaned !== nameOriginal) {
      const match = this.exact(nameOriginal, cleaned, 'cleaned')
      if (match) return match
    }

    return { status: 'unresolved', nameOriginal, nameAdjudicated: null }
  }

  private exact(nameOriginal: string, candidate: string, via: ResolvedVia): Resolution | undefined {
    const [concept] = this.store.lookupByName(candidate).sort(byStatusPrecedence)
    if (!concept) return undefined
    const accepted = this.store.getAccepted(concept.acceptedCode)
    // The store guarantees this; a miss means the store was built wrong
    if (!accepted) throw new Error(`Concept ${concept.code} points at missing accepted taxon ${concept.acceptedCode}`)
    return {
      status: 'resolved',
      nameOriginal,
      nameAdjudicated: accepted.name,
      codeAdjudicated: accepted.acceptedCode,
      acceptedCode: accepted.acceptedCode,
      via,
    }
  }

  /**
   * Resolves a dataset's observation rows. Each distinct name is resolved once;
   * excluded rows are dropped into the audit list and unresolved rows are
   * withheld and reported.
   */
  resolveObservations<T extends NamedObservation>(rows: readonly T[], dataset: string): ResolvedObservations<T> {
    const out: Array<Resolved<T>> = []
    const problems = new Map<string, ProblemEntry>()
    const exclusions = new Map<string, ExclusionEntry>()

    for (const row of rows) {
      const resolution = this.resolve(row.name_original, dataset)
      switch (resolution.status) {
        case 'resolved':
          out.push({ ...row, code_adjudicated: resolution.codeAdjudicated, name_adjudicated: resolution.nameAdjudicated })
          break
        case 'excluded': {
          const entry: ExclusionEntry = exclusions.get(row.name_original)
            ?? { dataset, nameOriginal: row.name_original, rule: resolution.rule, rowsDropped: 0 }
          entry.rowsDropped += 1
          exclusions.set(row.name_original, entry)
          break
        }
        case 'unresolved': {
          const entry: ProblemEntry = problems.get(row.name_original)
            ?? { dataset, nameOriginal: row.name_original, nameAdjudicated: null, status: 'unresolved', occurrences: 0 }
          entry.occurrences += 1
          problems.set(row.name_original, entry)
          break
        }
      }
    }

    const byName = <T extends { nameOriginal: string }>(a: T, b: T) => byCodeUnit(a.nameOriginal, b.nameOriginal)
    return {
      rows: out,
      problems: Array.from(problems.values()).sort(byName),
      exclusions: Array.from(exclusions.values()).sort(byName),
    }
  }
}

export type NamedObservation = {
  name_original: string
}

export type Resolved<T extends NamedObservation> = T & {
  code_adjudicated: string
  name_adjudicated: string
}

export interface ResolvedObservations<T extends NamedObservation> {
  rows: Array<Resolved<T>>
  problems: ProblemEntry[]
  exclusions: ExclusionEntry[]
}

export type CoverObservation = NamedObservation & {
  site_visit_code: string
  cover_type: string
  dead_status: boolean
  cover_percent: number
}

const coverKey = (row: CoverObservation) =>
  [row.site_visit_code, row.name_original, row.cover_type, String(row.dead_status)].join('\u0000')

// Drops binary float noise (0.1 + 0.2) and keeps every recorded digit
const sumCover = (a: number, b: number): number => Number((a + b).toPrecision(12))

/**
 * Merges rows that share (site_visit_code, name_original, cover_type,
 * dead_status), summing cover_percent. First-seen order is kept.
 */
export function collapseCover(rows: readonly CoverObservation[]): CoverObservation[] {
  const merged = new Map<string, CoverObservation>()
  for (const row of rows) {
    const key = coverKey(row)
    const existing = merged.get(key)
    if (existing) {
      existing.cover_percent = sumCover(existing.cover_percent, row.cover_percent)
    } else {
      merged.set(key, { ...row })
    }
  }
  return Array.from(merged.values())
}

const deadStatus = z
  .string()
  .transform(v => cleanText(v).toUpperCase())
  .pipe(z.enum(['TRUE', 'FALSE', 'T', 'F', '1', '0']))
  .transform(v => v === 'TRUE' || v === 'T' || v === '1')

const coverSourceSchema = z.object({
  site_visit_code: z.string().transform(cleanText).pipe(z.string().min(1)),
  name_original: z.string().transform(cleanText).pipe(z.string().min(1)),
  cover_type: z.string().transform(cleanText).pipe(z.string().min(1)),
  dead_status: deadStatus,
  cover_percent: z.string().transform(cleanText).pipe(z.string().min(1)).pipe(z.coerce.number().finite()),
})

/** Reads raw vegetation cover records into typed observations. */
export function parseCoverObservations(records: ReadonlyArray<Record<string, string>>, file?: string): CoverObservation[] {
  return records.map((record, i) => {
    const result = coverSourceSchema.safeParse(record)
    if (!result.success) {
      const issue = result.error.issues[0]
      const column = issue ? issue.path.join('.') : 'row'
      throw new MeasurementError(column, record[column] ?? null, issue?.message ?? 'invalid', {
        table: 'vegetation_cover',
        file,
        line: i + 2,
      })
    }
    return result.data
  })
}
