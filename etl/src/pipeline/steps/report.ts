import path from 'node:path'
import type { ExclusionEntry, ProblemEntry } from '@vegplot/shared'
import { writeCsv } from '../../csv.js'
import { byCodeUnit } from '../../keys.js'
import type { PipelineContext } from '../context.js'

export const PROBLEM_COLUMNS = ['dataset', 'name_original', 'name_adjudicated', 'status', 'occurrences'] as const
export const EXCLUSION_COLUMNS = ['dataset', 'name_original', 'rule', 'rows_dropped'] as const

const byDatasetAndName = (a: { dataset: string; nameOriginal: string }, b: { dataset: string; nameOriginal: string }) =>
  byCodeUnit(a.dataset, b.dataset) || byCodeUnit(a.nameOriginal, b.nameOriginal)

export const problemRows = (problems: readonly ProblemEntry[]) =>
  [...problems].sort(byDatasetAndName).map(p => ({
    dataset: p.dataset,
    name_original: p.nameOriginal,
    name_adjudicated: p.nameAdjudicated,
    status: p.status,
    occurrences: p.occurrences,
  }))

export const exclusionRows = (exclusions: readonly ExclusionEntry[]) =>
  [...exclusions].sort(byDatasetAndName).map(e => ({
    dataset: e.dataset,
    name_original: e.nameOriginal,
    rule: e.rule,
    rows_dropped: e.rowsDropped,
  }))

export class UnresolvedNamesError extends Error {
  constructor(readonly count: number, readonly file: string) {
    super(`${count} observed name(s) could not be resolved; see ${file}`)
    this.name = 'UnresolvedNamesError'
  }
}

/**
 * Writes the problem list and the exclusion audit. In strict mode a non-empty
 * problem list fails the run once both files are written.
 */
export async function runReportStep(ctx: PipelineContext): Promise<string> {
  const problemsFile = path.join(ctx.outputs.reports, 'problems.csv')
  writeCsv(problemsFile, PROBLEM_COLUMNS, problemRows(ctx.problems))
  writeCsv(path.join(ctx.outputs.reports, 'excluded.csv'), EXCLUSION_COLUMNS, exclusionRows(ctx.exclusions))

  if (ctx.settings.strict && ctx.problems.length) throw new UnresolvedNamesError(ctx.problems.length, problemsFile)
  const dropped = ctx.exclusions.reduce((n, e) => n + e.rowsDropped, 0)
  return `${ctx.problems.length} unresolved names, ${ctx.exclusions.length} excluded names (${dropped} rows)`
}
