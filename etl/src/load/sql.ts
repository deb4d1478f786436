import type { Cell, Row } from '@vegplot/shared'
import { getDomain } from '../vocabulary/domains.js'
import { MISSING_VALUES } from '../vocabulary/nodata.js'
import { insertColumns, type ColumnSpec, type TableSpec } from '../tables/schema.js'
import type { BatchTable } from '../tables/batch.js'

export const quoteIdent = (name: string): string => `"${name.replace(/"/g, '""')}"`

/** SQL literal for a cell: quotes doubled, missing values as NULL. */
export function quoteLiteral(value: Cell | undefined): string {
  if (value === null || value === undefined) return 'NULL'
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Cannot write non-finite number ${value} as SQL`)
    return String(value)
  }
  return `'${value.replace(/'/g, "''")}'`
}

export const savepointName = (table: string): string => `load_${table}`

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = []
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size))
  return out
}

export function renderInsert(table: string, columns: readonly string[], rows: readonly Row[]): string {
  const values = rows.map(row => `(${columns.map(c => quoteLiteral(row[c])).join(', ')})`)
  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES\n${values.join(',\n')};`
}

export interface SqlScriptOptions {
  chunkSize?: number
  description?: string
}

/**
 * Insert script for a whole batch: one transaction, a savepoint per table,
 * multi-row INSERT statements in load order.
 */
export function renderSqlScript(tables: readonly BatchTable[], options: SqlScriptOptions = {}): string {
  const chunkSize = options.chunkSize ?? 500
  const lines = [
    '-- Insert plot data',
    `-- ${options.description ?? 'All tables in foreign-key order'}`,
    '',
    'START TRANSACTION;',
    '',
  ]
  for (const { spec, rows } of tables) {
    const columns = insertColumns(spec)
    lines.push(`-- ${spec.name}: ${rows.length} rows`, `SAVEPOINT ${savepointName(spec.name)};`)
    for (const part of chunk(rows, chunkSize)) lines.push(renderInsert(spec.name, columns, part))
    lines.push(`RELEASE SAVEPOINT ${savepointName(spec.name)};`, '')
  }
  lines.push('COMMIT TRANSACTION;', '')
  return lines.join('\n')
}

function sqliteType(column: ColumnSpec): string {
  const type = column.type
  switch (type.kind) {
    case 'text':
    case 'date':
    case 'taxon':
      return 'TEXT'
    case 'integer':
    case 'boolean':
      return 'INTEGER'
    case 'decimal':
      return 'REAL'
    case 'vocabulary':
      return getDomain(type.domain).keyKind === 'code' ? 'TEXT' : 'INTEGER'
  }
}

function columnDdl(column: ColumnSpec): string {
  const parts = [column.name, sqliteType(column)]
  if (!column.nullable) parts.push('NOT NULL')
  if (column.nodata) parts.push(`DEFAULT ${MISSING_VALUES.numericNodata}`)
  if (column.references) parts.push(`REFERENCES ${column.references.table}(${column.references.column})`)
  return parts.join(' ')
}

/** CREATE TABLE statements for a SQLite destination. */
export function renderDdl(tables: readonly TableSpec[]): string {
  return tables.map(spec => {
    const lines: string[] = []
    if (spec.serial) lines.push(`${spec.serial} INTEGER PRIMARY KEY AUTOINCREMENT`)
    lines.push(...spec.columns.map(columnDdl))
    if (spec.primaryKey) lines.push(`PRIMARY KEY (${spec.primaryKey.join(', ')})`)
    for (const unique of spec.unique ?? []) lines.push(`UNIQUE (${unique.join(', ')})`)
    for (const check of spec.checks ?? []) lines.push(`CONSTRAINT ${check.name} CHECK (${check.sql})`)
    return `CREATE TABLE IF NOT EXISTS ${spec.name} (\n  ${lines.join(',\n  ')}\n);`
  }).join('\n\n') + '\n'
}
