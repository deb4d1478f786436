import fs from 'node:fs'
import path from 'node:path'
import { globSync } from 'glob'
import { z } from 'zod'
import { readCsv, type CsvRecord } from '../csv.js'
import { SourceError } from '../errors.js'
import { byCodeUnit } from '../keys.js'
import { PLOT_TABLES, type TableSpec } from './schema.js'

const projectListSchema = z.object({
  projects: z.array(z.string().min(1)).min(1),
})

export function readProjectList(file: string): string[] {
  if (!fs.existsSync(file)) throw new SourceError('Project list not found', { file })
  const result = projectListSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')))
  if (!result.success) throw new SourceError('Project list must be { "projects": [folder, ...] }', { file })
  return result.data.projects
}

export interface SourceFile {
  project: string
  table: string
  file: string
}

/**
 * First file per table in each project folder whose name starts with the
 * table's source prefix, e.g. `05_vegetationcover_2019.csv`.
 */
export function discoverSources(dataRoot: string, projects: readonly string[], tables: readonly TableSpec[] = PLOT_TABLES): SourceFile[] {
  const out: SourceFile[] = []
  for (const project of projects) {
    const folder = path.join(dataRoot, project)
    if (!fs.existsSync(folder)) throw new SourceError(`Project folder ${project} not found`, { file: folder })
    for (const table of tables) {
      if (!table.source) continue
      const [first] = globSync(`${table.source}*.csv`, { cwd: folder, nodir: true }).sort(byCodeUnit)
      if (first) out.push({ project, table: table.name, file: path.join(folder, first) })
    }
  }
  return out
}

export interface SourceTable extends SourceFile {
  records: CsvRecord[]
}

export const readSource = (source: SourceFile): SourceTable => ({ ...source, records: readCsv(source.file) })
