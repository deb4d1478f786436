import fs from 'node:fs'
import path from 'node:path'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import type { Cell } from '@vegplot/shared'
import { SourceError } from './errors.js'

export type CsvRecord = Record<string, string>

const recordsSchema = z.array(z.record(z.string()))

export function parseCsv(content: string, file = '<inline>'): CsvRecord[] {
  let parsed: unknown
  try {
    parsed = parse(content, { columns: true, skip_empty_lines: true, bom: true })
  } catch (error) {
    throw new SourceError(`Malformed CSV: ${error instanceof Error ? error.message : String(error)}`, { file })
  }
  const result = recordsSchema.safeParse(parsed)
  if (!result.success) throw new SourceError('CSV did not parse into records', { file })
  return result.data
}

export function readCsv(file: string): CsvRecord[] {
  if (!fs.existsSync(file)) throw new SourceError('File not found', { file })
  return parseCsv(fs.readFileSync(file, 'utf8'), file)
}

export function escapeCsvField(field: Cell | undefined): string {
  if (field === null || field === undefined) return 'NA'
  const str = typeof field === 'boolean' ? (field ? 'TRUE' : 'FALSE') : String(field)
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`
  }
  return str
}

export function formatCsv(columns: readonly string[], rows: ReadonlyArray<Record<string, Cell>>): string {
  const lines = [columns.map(c => escapeCsvField(c)).join(',')]
  for (const row of rows) lines.push(columns.map(c => escapeCsvField(row[c])).join(','))
  return lines.join('\n') + '\n'
}

export function writeCsv(file: string, columns: readonly string[], rows: ReadonlyArray<Record<string, Cell>>): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, formatCsv(columns, rows), 'utf8')
}
