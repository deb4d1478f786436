import type { Cell, Row } from '@vegplot/shared'
import { UniquenessError } from '../errors.js'
import { LOAD_ORDER, getTable, type TableSpec } from './schema.js'
import { checkSiteBounds } from './geo.js'

const rowKey = (columns: readonly string[], row: Row): string =>
  JSON.stringify(columns.map(c => row[c] ?? null))

export interface DedupeResult {
  rows: Row[]
  duplicates: number
}

/**
 * Collapses exact duplicate rows and rejects rows that share a primary or
 * unique key but differ elsewhere. Tables without a key keep every row.
 */
export function dedupeRows(spec: TableSpec, rows: readonly Row[]): DedupeResult {
  const columns = spec.columns.map(c => c.name)
  const keys = [...(spec.primaryKey ? [spec.primaryKey] : []), ...(spec.unique ?? [])]
  if (!keys.length) return { rows: [...rows], duplicates: 0 }
  const seenRows = new Set<string>()
  const seenKeys = keys.map(() => new Map<string, string>())
  const out: Row[] = []
  let duplicates = 0

  for (const row of rows) {
    const full = rowKey(columns, row)
    if (seenRows.has(full)) {
      duplicates++
      continue
    }
    keys.forEach((key, i) => {
      const k = rowKey(key, row)
      const previous = seenKeys[i]?.get(k)
      if (previous !== undefined && previous !== full) {
        const conflict: Record<string, Cell> = {}
        for (const c of key) conflict[c] = row[c] ?? null
        throw new UniquenessError(spec.name, conflict)
      }
      seenKeys[i]?.set(k, full)
    })
    seenRows.add(full)
    out.push(row)
  }
  return { rows: out, duplicates }
}

export interface BatchTable {
  spec: TableSpec
  rows: Row[]
}

/**
 * Normalized rows for one run, gathered per destination table and checked as
 * a whole before anything is written.
 */
export class LoadBatch {
  private readonly tables = new Map<string, Row[]>()
  private checked = false

  add(table: string, rows: readonly Row[]): void {
    getTable(table)
    const existing = this.tables.get(table) ?? []
    existing.push(...rows)
    this.tables.set(table, existing)
    this.checked = false
  }

  rows(table: string): Row[] {
    return this.tables.get(table) ?? []
  }

  /** Dedupes every table and checks site bounds. Returns duplicates dropped per table. */
  check(): Record<string, number> {
    const dropped: Record<string, number> = {}
    for (const [table, rows] of this.tables) {
      const result = dedupeRows(getTable(table), rows)
      this.tables.set(table, result.rows)
      if (result.duplicates) dropped[table] = result.duplicates
    }
    checkSiteBounds(this.rows('site'))
    this.checked = true
    return dropped
  }

  get isChecked(): boolean {
    return this.checked
  }

  /** Tables with rows, in foreign-key load order. */
  entries(): BatchTable[] {
    return LOAD_ORDER.flatMap(name => {
      const rows = this.tables.get(name)
      return rows && rows.length ? [{ spec: getTable(name), rows }] : []
    })
  }

  counts(): Record<string, number> {
    return Object.fromEntries(this.entries().map(t => [t.spec.name, t.rows.length]))
  }
}
