import chalk from 'chalk'
import { loadWithRetry } from '../../load/loader.js'
import { connectDestination, type PipelineContext } from '../context.js'

export async function runLoadStep(ctx: PipelineContext): Promise<string> {
  const { settings } = ctx
  const summary = await loadWithRetry(() => connectDestination(settings), ctx.batch, {
    chunkSize: settings.chunkSize,
    retries: settings.retries,
    retryDelayMs: settings.retryDelayMs,
    onRetry: (error, attempt, waitMs) => {
      const reason = error instanceof Error ? error.message : String(error)
      console.warn(chalk.yellow(`\n[load] attempt ${attempt} failed (${reason}); retrying in ${waitMs}ms`))
    },
  })
  ctx.load = summary
  return `${summary.rows} rows into ${Object.keys(summary.tables).length} tables (${summary.destination})`
}
