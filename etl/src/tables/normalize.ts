import { z } from 'zod'
import type { Cell, Row } from '@vegplot/shared'
import { MeasurementError, SourceError, VocabularyError, type FailureLocation } from '../errors.js'
import { cleanText } from '../taxonomy/source.js'
import type { VocabularyNormalizer } from '../vocabulary/normalizer.js'
import { MISSING_VALUES, isNullText, normalizeMeasurement } from '../vocabulary/nodata.js'
import { sourceColumn, type ColumnSpec, type TableSpec } from './schema.js'

export type SourceValue = Cell | undefined

export type SourceRecord = Record<string, SourceValue>

export interface NormalizeContext {
  vocabulary: VocabularyNormalizer
  file?: string
}

const BOOLEAN_TEXT = new Map<string, boolean>([
  ['TRUE', true], ['T', true], ['1', true], ['YES', true],
  ['FALSE', false], ['F', false], ['0', false], ['NO', false],
])

const isoDate = z.string().date()

/** Applies a table's vintage renames; a column already under its current name wins. */
export function applyRenames<T extends SourceValue>(spec: TableSpec, record: Record<string, T>): Record<string, T> {
  if (!spec.renames) return { ...record }
  const out: Record<string, T> = {}
  for (const [column, value] of Object.entries(record)) {
    const renamed = spec.renames[column]
    if (renamed !== undefined && !(renamed in record)) out[renamed] = value
    else out[column] = value
  }
  return out
}

// Key columns that identify a record in error messages
function identify(spec: TableSpec, record: SourceRecord): Record<string, SourceValue> {
  const columns = spec.primaryKey ?? spec.unique?.[0] ?? [spec.columns[0]?.name ?? '']
  return Object.fromEntries(columns.map(c => [c, record[c] ?? record[sourceColumnOf(spec, c)]]))
}

function sourceColumnOf(spec: TableSpec, name: string): string {
  const column = spec.columns.find(c => c.name === name)
  return column ? sourceColumn(column) : name
}

const asText = (value: SourceValue): string | null => {
  if (value === null || value === undefined) return null
  return typeof value === 'string' ? value : String(value)
}

/**
 * One destination row from one source record. Vocabulary labels become keys,
 * numeric cells are checked against their column domain, and missing cells
 * follow the missing-value policy.
 */
export function normalizeRecord(spec: TableSpec, record: SourceRecord, ctx: NormalizeContext, line?: number): Row {
  const location: FailureLocation = { table: spec.name, file: ctx.file, line, record: identify(spec, record) }
  const row: Row = {}
  for (const column of spec.columns) {
    let value = normalizeCell(column, record[sourceColumn(column)], ctx, location)
    if (value === null && column.whenMissing !== undefined) value = column.whenMissing
    if (value === null && !column.nullable && !column.nodata) {
      throw new SourceError(`Missing required ${column.name}`, location)
    }
    row[column.name] = value
  }
  return row
}

export function normalizeCell(column: ColumnSpec, raw: SourceValue, ctx: NormalizeContext, location: FailureLocation): Cell {
  const type = column.type
  switch (type.kind) {
    case 'text': {
      const value = asText(raw)
      if (isNullText(value) || value === null) return null
      const text = cleanText(value)
      if (text.length > type.max) {
        throw new SourceError(`${column.name} is longer than ${type.max} characters`, location)
      }
      return text
    }
    case 'integer':
    case 'decimal':
      return normalizeMeasurement(
        { name: column.name, domain: type.domain, nodata: column.nodata ?? false, nullable: column.nullable || column.whenMissing !== undefined },
        asText(raw),
        location,
      )
    case 'boolean': {
      if (typeof raw === 'boolean') return raw
      const value = asText(raw)
      if (isNullText(value) || value === null) return null
      const parsed = BOOLEAN_TEXT.get(cleanText(value).toUpperCase())
      if (parsed === undefined) throw new MeasurementError(column.name, value, 'not a boolean', location)
      return parsed
    }
    case 'date': {
      const value = asText(raw)
      if (isNullText(value) || value === null) return null
      const text = cleanText(value)
      if (!isoDate.safeParse(text).success) throw new MeasurementError(column.name, text, 'not a YYYY-MM-DD date', location)
      return text
    }
    case 'vocabulary': {
      const value = asText(raw)
      const key = type.input === 'key'
        ? ctx.vocabulary.requireKey(type.domain, value, location)
        : ctx.vocabulary.normalize(type.domain, value, location)
      if (key !== null && type.elementTypes) {
        const elementType = ctx.vocabulary.elementType(key)
        if (!elementType || !type.elementTypes.includes(elementType)) {
          throw new VocabularyError(type.domain, String(value), location, `is a ${elementType ?? 'untyped'} element, not allowed in ${location.table ?? column.name}`)
        }
      }
      return key
    }
    case 'taxon': {
      const value = asText(raw)
      if (value === null || value === MISSING_VALUES.textSentinel || value.trim() === '') return null
      return cleanText(value)
    }
  }
}

export function normalizeTable(spec: TableSpec, records: readonly SourceRecord[], ctx: NormalizeContext): Row[] {
  // line 1 of a source file is its header
  return records.map((record, i) => normalizeRecord(spec, applyRenames(spec, record), ctx, i + 2))
}
