import path from 'node:path'
import { writeCsv } from '../../csv.js'
import { TaxonomyBuildError } from '../../errors.js'
import { loadKeyRegistry, saveKeyRegistry } from '../../keys.js'
import { insertColumns, getTable } from '../../tables/schema.js'
import { readTaxonomySource } from '../../taxonomy/source.js'
import { buildTaxonomy, taxonomyTableRows, verifyTaxonomy } from '../../taxonomy/store.js'
import type { PipelineContext } from '../context.js'

/**
 * Builds the taxonomy release from the curated CSVs, re-checks it, and writes
 * the taxonomy tables plus the updated key registry. A dry run writes neither,
 * so keys it assigns are not kept.
 */
export async function runTaxonomyStep(ctx: PipelineContext): Promise<string> {
  const { settings } = ctx
  const source = readTaxonomySource(settings.taxonomyPath, settings.citationsPath)
  const registry = loadKeyRegistry(settings.keyRegistryPath)
  const store = buildTaxonomy(source, { registry })

  const problems = verifyTaxonomy(store)
  if (problems.length) throw new TaxonomyBuildError(problems)

  const tables = taxonomyTableRows(store)
  for (const [name, rows] of Object.entries(tables)) {
    if (!settings.dryRun) writeCsv(path.join(ctx.outputs.taxonomy, `${name}.csv`), insertColumns(getTable(name)), rows)
    ctx.batch.add(name, rows)
  }
  if (!settings.dryRun) saveKeyRegistry(settings.keyRegistryPath, registry)

  ctx.store = store
  const summary = `${store.concepts.length} names, ${store.accepted.length} accepted taxa, ${store.hierarchy.length} genera`
  return settings.dryRun ? `${summary} (dry run)` : summary
}
