import { MeasurementError, type FailureLocation } from '../errors.js'

/**
 * Missing-value policy, one rule per field kind:
 *
 * - empty cells and `NA` are missing everywhere;
 * - `NULL` is the text sentinel: it becomes null in text, vocabulary, boolean
 *   and date fields, and is rejected in numeric fields;
 * - NOT NULL measurement columns store `-999` for a missing value, nullable
 *   numeric columns store null.
 */
export const MISSING_VALUES = {
  missingCells: ['', 'NA'],
  textSentinel: 'NULL',
  numericNodata: -999,
} as const

export type FieldKind = 'text' | 'vocabulary' | 'boolean' | 'date' | 'measurement' | 'number'

export const isMissingCell = (raw: string | null | undefined): raw is '' | 'NA' | null | undefined =>
  raw === null || raw === undefined || raw.trim() === '' || raw.trim() === 'NA'

export const isNullText = (raw: string | null | undefined): boolean =>
  isMissingCell(raw) || raw === MISSING_VALUES.textSentinel

export interface NumericDomain {
  min?: number
  max?: number
  // Exclusive lower bound
  above?: number
  integer?: boolean
}

export const PERCENT: NumericDomain = { min: 0, max: 100 }
export const NON_NEGATIVE: NumericDomain = { min: 0 }

export function inDomain(value: number, domain: NumericDomain): boolean {
  if (domain.integer && !Number.isInteger(value)) return false
  if (domain.min !== undefined && value < domain.min) return false
  if (domain.max !== undefined && value > domain.max) return false
  if (domain.above !== undefined && value <= domain.above) return false
  return true
}

export function describeDomain(domain: NumericDomain): string {
  const parts: string[] = []
  if (domain.min !== undefined) parts.push(`>= ${domain.min}`)
  if (domain.above !== undefined) parts.push(`> ${domain.above}`)
  if (domain.max !== undefined) parts.push(`<= ${domain.max}`)
  if (domain.integer) parts.push('integer')
  return parts.length ? parts.join(', ') : 'any number'
}

// A domain that admits -999 would make NODATA indistinguishable from a reading
export function assertExcludesNodata(column: string, domain: NumericDomain): void {
  if (inDomain(MISSING_VALUES.numericNodata, domain)) {
    throw new Error(`Domain of ${column} (${describeDomain(domain)}) admits the NODATA value ${MISSING_VALUES.numericNodata}`)
  }
}

export interface MeasurementColumn {
  name: string
  domain: NumericDomain
  // NOT NULL DEFAULT -999 column
  nodata: boolean
  nullable: boolean
}

/**
 * Parses a numeric cell. Missing values (including a -999 already in the
 * source) become -999 for NODATA columns and null for nullable ones; present
 * values must fall inside the column's domain.
 */
export function normalizeMeasurement(column: MeasurementColumn, raw: string | null | undefined, location: FailureLocation = {}): number | null {
  if (isMissingCell(raw)) return missing(column, raw ?? null, location)
  const text = raw.trim()
  if (text === MISSING_VALUES.textSentinel) {
    throw new MeasurementError(column.name, text, 'the text sentinel NULL is not a numeric value', location)
  }
  const value = Number(text)
  if (!Number.isFinite(value)) throw new MeasurementError(column.name, text, 'not a number', location)
  if (value === MISSING_VALUES.numericNodata) return missing(column, text, location)
  if (!inDomain(value, column.domain)) {
    throw new MeasurementError(column.name, value, `outside ${describeDomain(column.domain)}`, location)
  }
  return value
}

function missing(column: MeasurementColumn, raw: string | null, location: FailureLocation): number | null {
  if (column.nodata) return MISSING_VALUES.numericNodata
  if (column.nullable) return null
  throw new MeasurementError(column.name, raw, 'a value is required', location)
}
