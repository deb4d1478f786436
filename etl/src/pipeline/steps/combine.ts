import { readOverrides } from '../../taxonomy/overrides.js'
import { NameResolver } from '../../taxonomy/resolver.js'
import { discoverSources, readProjectList, readSource } from '../../tables/sources.js'
import { assemblePlotTables, type PipelineContext } from '../context.js'

/**
 * Reads every included project's tables, normalizes and resolves them into the
 * batch, then runs the whole-batch checks. Nothing is written yet.
 */
export async function runCombineStep(ctx: PipelineContext): Promise<string> {
  const { settings } = ctx
  const projects = readProjectList(settings.projectListPath)
  const sources = discoverSources(settings.dataRoot, projects).map(readSource)
  const resolver = new NameResolver(ctx.requireStore(), readOverrides(settings.overridesPath))

  const assembled = assemblePlotTables(sources, ctx.requireVocabulary(), resolver, ctx.batch)
  ctx.problems = assembled.problems
  ctx.exclusions = assembled.exclusions
  ctx.duplicatesDropped = ctx.batch.check()

  const rows = sources.reduce((n, s) => n + s.records.length, 0)
  return `${sources.length} source tables from ${projects.length} projects, ${rows} source rows`
}
