import fs from 'node:fs'
import path from 'node:path'
import { writeCsv } from '../../csv.js'
import { renderDdl, renderSqlScript } from '../../load/sql.js'
import { TABLES, insertColumns } from '../../tables/schema.js'
import type { PipelineContext } from '../context.js'

// Normalized CSV per table, the insert script, and SQLite DDL for local destinations
export async function runEmitStep(ctx: PipelineContext): Promise<string> {
  const entries = ctx.batch.entries()
  for (const { spec, rows } of entries) {
    writeCsv(path.join(ctx.outputs.tables, `${spec.name}.csv`), insertColumns(spec), rows)
  }

  fs.mkdirSync(ctx.outputs.sql, { recursive: true })
  fs.writeFileSync(
    path.join(ctx.outputs.sql, 'insert_all.sql'),
    renderSqlScript(entries, { chunkSize: ctx.settings.chunkSize }),
    'utf8',
  )
  fs.writeFileSync(path.join(ctx.outputs.sql, 'schema.sqlite.sql'), renderDdl(TABLES), 'utf8')

  const rows = entries.reduce((n, e) => n + e.rows.length, 0)
  return `${entries.length} tables, ${rows} rows`
}
