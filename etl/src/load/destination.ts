import type { Row } from '@vegplot/shared'
import type { TableSpec } from '../tables/schema.js'

export type DestinationKind = 'sqlite' | 'postgres'

/**
 * A relational store the loader writes into. Every call happens inside the
 * single transaction opened by `begin`.
 */
export interface Destination {
  readonly kind: DestinationKind
  readonly description: string
  open(): Promise<void>
  begin(): Promise<void>
  savepoint(name: string): Promise<void>
  release(name: string): Promise<void>
  rollbackTo(name: string): Promise<void>
  commit(): Promise<void>
  rollback(): Promise<void>
  insert(spec: TableSpec, columns: readonly string[], rows: readonly Row[]): Promise<void>
  count(table: string): Promise<number>
  // Runs a query returning one row with a numeric column `n`
  scalar(sql: string): Promise<number>
  close(): Promise<void>
}
