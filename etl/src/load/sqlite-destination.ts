import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { z } from 'zod'
import type { Row } from '@vegplot/shared'
import { TABLES, type TableSpec } from '../tables/schema.js'
import type { Destination } from './destination.js'
import { renderDdl } from './sql.js'

const countRow = z.object({ n: z.number() })

// better-sqlite3 binds numbers, strings and null; booleans go in as 0/1
const bindable = (value: Row[string] | undefined): string | number | null => {
  if (value === undefined || value === null) return null
  if (typeof value === 'boolean') return value ? 1 : 0
  return value
}

export interface SqliteDestinationOptions {
  // Create missing tables before loading
  createSchema?: boolean
  tables?: readonly TableSpec[]
}

export class SqliteDestination implements Destination {
  readonly kind = 'sqlite'
  readonly description: string
  private db: Database.Database | undefined

  constructor(private readonly file: string, private readonly options: SqliteDestinationOptions = {}) {
    this.description = file === ':memory:' ? 'sqlite (in memory)' : `sqlite ${file}`
  }

  private get connection(): Database.Database {
    if (!this.db) throw new Error(`${this.description} is not open`)
    return this.db
  }

  async open(): Promise<void> {
    if (this.db) return
    if (this.file !== ':memory:') fs.mkdirSync(path.dirname(this.file), { recursive: true })
    const db = new Database(this.file)
    db.pragma('foreign_keys = ON')
    db.pragma('busy_timeout = 5000')
    if (this.options.createSchema ?? true) db.exec(renderDdl(this.options.tables ?? TABLES))
    this.db = db
  }

  async begin(): Promise<void> {
    this.connection.exec('BEGIN IMMEDIATE')
  }

  async savepoint(name: string): Promise<void> {
    this.connection.exec(`SAVEPOINT ${name}`)
  }

  async release(name: string): Promise<void> {
    this.connection.exec(`RELEASE SAVEPOINT ${name}`)
  }

  async rollbackTo(name: string): Promise<void> {
    this.connection.exec(`ROLLBACK TO SAVEPOINT ${name}`)
  }

  async commit(): Promise<void> {
    this.connection.exec('COMMIT')
  }

  async rollback(): Promise<void> {
    if (this.connection.inTransaction) this.connection.exec('ROLLBACK')
  }

  async insert(spec: TableSpec, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    if (!rows.length) return
    const tuple = `(${columns.map(() => '?').join(', ')})`
    const sql = `INSERT INTO ${spec.name} (${columns.join(', ')}) VALUES ${rows.map(() => tuple).join(', ')}`
    const params = rows.flatMap(row => columns.map(c => bindable(row[c])))
    this.connection.prepare(sql).run(...params)
  }

  async count(table: string): Promise<number> {
    return this.scalar(`SELECT COUNT(*) AS n FROM ${table}`)
  }

  async scalar(sql: string): Promise<number> {
    return countRow.parse(this.connection.prepare(sql).get()).n
  }

  /** Rows of a table in insertion order, for inspection and tests. */
  select(table: string): unknown[] {
    return this.connection.prepare(`SELECT * FROM ${table} ORDER BY rowid`).all()
  }

  async close(): Promise<void> {
    this.db?.close()
    this.db = undefined
  }
}
