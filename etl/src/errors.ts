// Hard failures. Any of these aborts the run; nothing is committed.

export type HardFailureCode =
  | 'TAXONOMY_BUILD'
  | 'VOCABULARY'
  | 'MEASUREMENT'
  | 'BOUNDS'
  | 'UNIQUENESS'
  | 'LOAD'
  | 'SOURCE'

export interface FailureLocation {
  table?: string
  record?: Record<string, unknown>
  file?: string
  line?: number
}

export class HardFailure extends Error {
  code: HardFailureCode
  location: FailureLocation

  constructor(code: HardFailureCode, message: string, location: FailureLocation = {}, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HardFailure'
    this.code = code
    this.location = location
  }
}

export class TaxonomyBuildError extends HardFailure {
  problems: string[]

  constructor(problems: string[]) {
    super('TAXONOMY_BUILD', `Taxonomy build blocked by ${problems.length} problem(s):\n  - ${problems.join('\n  - ')}`)
    this.name = 'TaxonomyBuildError'
    this.problems = problems
  }
}

export class VocabularyError extends HardFailure {
  domain: string
  value: string

  constructor(domain: string, value: string, location: FailureLocation = {}, reason?: string) {
    const message = reason ? `${domain} value "${value}" ${reason}` : `Unmapped ${domain} value "${value}"`
    super('VOCABULARY', `${message}${describeLocation(location)}`, location)
    this.name = 'VocabularyError'
    this.domain = domain
    this.value = value
  }
}

export class MeasurementError extends HardFailure {
  column: string
  value: unknown

  constructor(column: string, value: unknown, reason: string, location: FailureLocation = {}) {
    super('MEASUREMENT', `Invalid ${column} value ${JSON.stringify(value)}: ${reason}${describeLocation(location)}`, location)
    this.name = 'MeasurementError'
    this.column = column
    this.value = value
  }
}

export class BoundsError extends HardFailure {
  constructor(siteCode: string, latitude: number, longitude: number) {
    super(
      'BOUNDS',
      `Site ${siteCode} lies outside the plot region (latitude_dd=${latitude}, longitude_dd=${longitude})`,
      { table: 'site', record: { site_code: siteCode, latitude_dd: latitude, longitude_dd: longitude } }
    )
    this.name = 'BoundsError'
  }
}

export class UniquenessError extends HardFailure {
  constructor(table: string, key: Record<string, unknown>) {
    super('UNIQUENESS', `Conflicting rows in ${table} for key ${JSON.stringify(key)}`, { table, record: key })
    this.name = 'UniquenessError'
  }
}

export class LoadError extends HardFailure {
  constructor(table: string, cause: unknown, record?: Record<string, unknown>) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('LOAD', `Load of ${table} failed${record ? ` at ${JSON.stringify(record)}` : ''}: ${reason}`, { table, record }, { cause })
    this.name = 'LoadError'
  }
}

export class SourceError extends HardFailure {
  constructor(message: string, location: FailureLocation = {}) {
    super('SOURCE', `${message}${describeLocation(location)}`, location)
    this.name = 'SourceError'
  }
}

function describeLocation(location: FailureLocation): string {
  const parts: string[] = []
  if (location.table) parts.push(`table ${location.table}`)
  if (location.file) parts.push(location.line ? `${location.file}:${location.line}` : location.file)
  if (location.record) parts.push(JSON.stringify(location.record))
  return parts.length ? ` (${parts.join(', ')})` : ''
}
