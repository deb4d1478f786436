import type { Row } from '@vegplot/shared'
import { HardFailure, LoadError } from '../errors.js'
import type { LoadBatch } from '../tables/batch.js'
import { insertColumns, type TableSpec } from '../tables/schema.js'
import type { Destination } from './destination.js'
import { withRetry } from './retry.js'
import { chunk, savepointName } from './sql.js'

export interface LoadOptions {
  chunkSize?: number
  onTable?: (table: string, rows: number) => void
}

export interface LoadSummary {
  destination: string
  tables: Record<string, number>
  rows: number
}

const CHUNK_SAVEPOINT = 'load_chunk'
const ROW_SAVEPOINT = 'load_row'

interface Offender {
  row: Row
  error: unknown
}

// Replays a failed chunk row by row to find the first record the destination rejects
async function findOffender(dest: Destination, spec: TableSpec, columns: readonly string[], rows: readonly Row[]): Promise<Offender | undefined> {
  for (const row of rows) {
    await dest.savepoint(ROW_SAVEPOINT)
    try {
      await dest.insert(spec, columns, [row])
      await dest.release(ROW_SAVEPOINT)
    } catch (error) {
      await dest.rollbackTo(ROW_SAVEPOINT)
      return { row, error }
    }
  }
  return undefined
}

async function loadTable(dest: Destination, spec: TableSpec, rows: readonly Row[], chunkSize: number): Promise<void> {
  const columns = insertColumns(spec)
  await dest.savepoint(savepointName(spec.name))
  for (const part of chunk(rows, chunkSize)) {
    await dest.savepoint(CHUNK_SAVEPOINT)
    try {
      await dest.insert(spec, columns, part)
    } catch (error) {
      await dest.rollbackTo(CHUNK_SAVEPOINT)
      const offender = await findOffender(dest, spec, columns, part)
      throw new LoadError(spec.name, offender?.error ?? error, offender?.row)
    }
    await dest.release(CHUNK_SAVEPOINT)
  }
  await dest.release(savepointName(spec.name))
}

/**
 * Writes a checked batch in one transaction, tables in foreign-key order.
 * Any failure rolls back everything written by this call.
 */
export async function loadBatch(dest: Destination, batch: LoadBatch, options: LoadOptions = {}): Promise<LoadSummary> {
  if (!batch.isChecked) batch.check()
  const chunkSize = options.chunkSize ?? 500
  const tables: Record<string, number> = {}
  let rows = 0

  await dest.begin()
  try {
    for (const { spec, rows: tableRows } of batch.entries()) {
      await loadTable(dest, spec, tableRows, chunkSize)
      tables[spec.name] = tableRows.length
      rows += tableRows.length
      options.onTable?.(spec.name, tableRows.length)
    }
    await dest.commit()
  } catch (error) {
    try {
      await dest.rollback()
    } catch (rollbackError) {
      throw new LoadError('transaction', new AggregateError([error, rollbackError], 'Load failed and rollback failed'))
    }
    throw error instanceof HardFailure ? error : new LoadError('transaction', error)
  }
  return { destination: dest.description, tables, rows }
}

export interface RetryingLoadOptions extends LoadOptions {
  retries: number
  retryDelayMs: number
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void
}

/**
 * Opens a fresh destination per attempt and retries transient connection
 * failures. Each attempt is all-or-nothing, so a retry starts clean.
 */
export async function loadWithRetry(connect: () => Destination, batch: LoadBatch, options: RetryingLoadOptions): Promise<LoadSummary> {
  return withRetry(async () => {
    const dest = connect()
    try {
      await dest.open()
      return await loadBatch(dest, batch, options)
    } finally {
      await dest.close()
    }
  }, { retries: options.retries, delayMs: options.retryDelayMs, onRetry: options.onRetry })
}
