import pg from 'pg'
import type { Client as PgClient } from 'pg'
import { z } from 'zod'
import type { Row } from '@vegplot/shared'
import type { TableSpec } from '../tables/schema.js'
import type { Destination } from './destination.js'
import { quoteIdent } from './sql.js'

const { Client } = pg

const countRow = z.object({ n: z.coerce.number() })

// Serializes concurrent loads into the same database
export const LOAD_LOCK_KEY = 471_602

export class PgDestination implements Destination {
  readonly kind = 'postgres'
  readonly description: string
  private client: PgClient | undefined

  constructor(private readonly connectionString: string) {
    this.description = `postgres ${new URL(connectionString).host}`
  }

  private get connection(): PgClient {
    if (!this.client) throw new Error(`${this.description} is not open`)
    return this.client
  }

  async open(): Promise<void> {
    if (this.client) return
    const client = new Client({ connectionString: this.connectionString })
    await client.connect()
    this.client = client
  }

  async begin(): Promise<void> {
    await this.connection.query('BEGIN')
    await this.connection.query('SELECT pg_advisory_xact_lock($1)', [LOAD_LOCK_KEY])
  }

  async savepoint(name: string): Promise<void> {
    await this.connection.query(`SAVEPOINT ${quoteIdent(name)}`)
  }

  async release(name: string): Promise<void> {
    await this.connection.query(`RELEASE SAVEPOINT ${quoteIdent(name)}`)
  }

  async rollbackTo(name: string): Promise<void> {
    await this.connection.query(`ROLLBACK TO SAVEPOINT ${quoteIdent(name)}`)
  }

  async commit(): Promise<void> {
    await this.connection.query('COMMIT')
  }

  async rollback(): Promise<void> {
    await this.connection.query('ROLLBACK')
  }

  async insert(spec: TableSpec, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    if (!rows.length) return
    const params: Array<string | number | boolean | null> = []
    const tuples = rows.map(row => {
      const placeholders = columns.map(c => {
        params.push(row[c] ?? null)
        return `$${params.length}`
      })
      return `(${placeholders.join(', ')})`
    })
    const target = `${quoteIdent(spec.name)} (${columns.map(quoteIdent).join(', ')})`
    await this.connection.query(`INSERT INTO ${target} VALUES ${tuples.join(', ')}`, params)
  }

  async count(table: string): Promise<number> {
    return this.scalar(`SELECT COUNT(*) AS n FROM ${quoteIdent(table)}`)
  }

  // COUNT(*) arrives as a bigint string
  async scalar(sql: string): Promise<number> {
    const result = await this.connection.query(sql)
    return countRow.parse(result.rows[0]).n
  }

  async close(): Promise<void> {
    const client = this.client
    this.client = undefined
    await client?.end()
  }
}
