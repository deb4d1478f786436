import { z } from 'zod'
import type { TaxonLevel } from '@vegplot/shared'
import { readCsv, type CsvRecord } from '../csv.js'
import { SourceError } from '../errors.js'

export const TAXON_LEVELS = [
  'genus', 'hybrid', 'species', 'subspecies', 'variety', 'unknown', 'functional group',
] as const satisfies readonly TaxonLevel[]

// Levels that are their own genus-level hierarchy entry
export const GENUS_LEVELS: ReadonlySet<TaxonLevel> = new Set<TaxonLevel>(['genus', 'unknown', 'functional group'])

// Statuses whose rows populate the accepted taxon table
export const ACCEPTED_STATUSES: ReadonlySet<string> = new Set([
  'accepted',
  'historical',
  'taxonomy unresolved',
  'location unresolved',
  'adjacent Yukon',
  'adjacent BC',
  'adjacent Canada',
  'ephemeral non-native',
])

export const cleanText = (value: string): string =>
  value.replace(/\u00A0/g, ' ').replace(/\s+/g, ' ').trim()

const MISSING = new Set(['', 'NA'])

const text = z.string().transform(cleanText).pipe(z.string().min(1))
const optionalText = z
  .string()
  .optional()
  .transform(v => (v === undefined ? null : cleanText(v)))
  .transform(v => (v === null || MISSING.has(v) ? null : v))
const flag = z
  .string()
  .transform(v => cleanText(v).toUpperCase())
  .pipe(z.enum(['TRUE', 'FALSE', '1', '0', 'T', 'F']))
  .transform(v => v === 'TRUE' || v === '1' || v === 'T')

export const taxonomySourceRowSchema = z.object({
  taxon_code: text,
  taxon_name: text,
  taxon_author: text,
  taxon_status: text,
  taxon_accepted: text,
  taxon_family: text,
  taxon_source: optionalText,
  taxon_link: optionalText,
  taxon_level: z.string().transform(cleanText).pipe(z.enum(TAXON_LEVELS)),
  taxon_category: text,
  taxon_habit: text,
  taxon_native: flag,
  taxon_non_native: flag,
})

export type TaxonomySourceRow = z.infer<typeof taxonomySourceRowSchema>

export const citationRowSchema = z.object({
  taxon_source: text,
  taxon_citation: text,
})

export type CitationRow = z.infer<typeof citationRowSchema>

export interface TaxonomySource {
  rows: TaxonomySourceRow[]
  citations: CitationRow[]
}

function parseRows<S extends z.ZodTypeAny>(records: CsvRecord[], schema: S, file: string): z.infer<S>[] {
  return records.map((record, i) => {
    const result = schema.safeParse(record)
    if (!result.success) {
      const issue = result.error.issues[0]
      const field = issue ? issue.path.join('.') : 'row'
      // line 1 is the header
      throw new SourceError(`Invalid ${field}: ${issue?.message ?? 'unknown issue'}`, { file, line: i + 2 })
    }
    return result.data
  })
}

export function parseTaxonomySource(taxa: CsvRecord[], citations: CsvRecord[] = [], file = '<taxonomy>'): TaxonomySource {
  return {
    rows: parseRows(taxa, taxonomySourceRowSchema, file),
    citations: parseRows(citations, citationRowSchema, `${file}:citations`),
  }
}

export function readTaxonomySource(taxonomyPath: string, citationsPath?: string): TaxonomySource {
  const taxa = readCsv(taxonomyPath)
  const citations = citationsPath ? readCsv(citationsPath) : []
  return {
    rows: parseRows(taxa, taxonomySourceRowSchema, taxonomyPath),
    citations: parseRows(citations, citationRowSchema, citationsPath ?? '<citations>'),
  }
}
