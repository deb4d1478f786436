import fs from 'node:fs'
import path from 'node:path'
import chalk from 'chalk'
import ora from 'ora'
import { HardFailure } from '../errors.js'
import type { PipelineStep, BuildReport } from './types.js'
import { pipelineSteps } from './config.js'
import { PipelineContext, type PipelineSettings } from './context.js'

const RULE = '='.repeat(50)

export class PipelineRunner {
  private startTime = Date.now()
  readonly context: PipelineContext
  private report: BuildReport

  constructor(settings: PipelineSettings, private readonly steps: PipelineStep[] = pipelineSteps) {
    this.context = new PipelineContext(settings)
    this.report = {
      success: false,
      startedAt: new Date(this.startTime).toISOString(),
      duration: 0,
      steps: [],
      summary: { taxa: 0, acceptedTaxa: 0, genera: 0, rows: {}, duplicatesDropped: {}, unresolvedNames: 0, excludedNames: 0 },
    }
  }

  async run(stepsToRun?: string[], skipSteps?: string[]): Promise<BuildReport> {
    console.log(chalk.cyan('🌱 Vegetation Plot ETL Pipeline'))
    console.log(chalk.cyan(RULE))
    console.log()

    const steps = this.filterSteps(stepsToRun, skipSteps)

    for (const [i, step] of steps.entries()) {
      const stepStartTime = Date.now()
      const spinner = ora({
        text: `Step ${i + 1}/${steps.length}: ${step.name}`,
        color: 'cyan',
      }).start()

      try {
        const output = await step.run(this.context)
        this.report.steps.push({ id: step.id, success: true, duration: Date.now() - stepStartTime, output })
        spinner.succeed(chalk.green(`✅ ${step.name}: ${output}`))
      } catch (error) {
        spinner.fail(chalk.red(`❌ ${step.name}`))
        this.report.steps.push({
          id: step.id,
          success: false,
          duration: Date.now() - stepStartTime,
          error: error instanceof Error ? error.message : String(error),
          code: error instanceof HardFailure ? error.code : undefined,
        })
        console.error(chalk.red(`[${step.id}] ${error instanceof Error ? error.message : String(error)}`))
        return this.finish(false)
      }
    }

    const report = this.finish(true)

    console.log()
    console.log(chalk.cyan('📊 BUILD SUMMARY'))
    console.log(chalk.cyan(RULE))
    console.log(chalk.green('✅ Build completed successfully'))
    console.log(`🌿 Taxon names: ${report.summary.taxa} (${report.summary.acceptedTaxa} accepted, ${report.summary.genera} genera)`)
    console.log(`📈 Rows in batch: ${Object.values(report.summary.rows).reduce((a, b) => a + b, 0)}`)
    if (report.summary.unresolvedNames) {
      console.log(chalk.yellow(`⚠️  Unresolved names: ${report.summary.unresolvedNames} (not release-ready)`))
    }
    if (report.summary.excludedNames) console.log(`🚫 Excluded names: ${report.summary.excludedNames}`)
    if (report.summary.loaded) {
      console.log(`💾 Loaded ${report.summary.loaded.rows} rows into ${report.summary.loaded.destination}`)
    }
    console.log(`⏱️  Execution time: ${(report.duration / 1000).toFixed(2)}s`)
    console.log(chalk.green('🎉 Pipeline completed successfully!'))

    return report
  }

  /** Selected steps plus everything they depend on, in pipeline order. */
  filterSteps(run?: string[], skip?: string[]): PipelineStep[] {
    const known = new Set(this.steps.map(s => s.id))
    for (const id of [...(run ?? []), ...(skip ?? [])]) {
      if (!known.has(id)) throw new Error(`Unknown step "${id}" (steps: ${[...known].join(', ')})`)
    }

    const selected = new Set(run && run.length > 0 ? run : this.steps.map(s => s.id))
    for (const id of skip ?? []) selected.delete(id)

    // Add dependencies for selected steps, transitively
    const pending = [...selected]
    while (pending.length) {
      const id = pending.pop()
      const step = this.steps.find(s => s.id === id)
      for (const dep of step?.dependencies ?? []) {
        if (!selected.has(dep)) {
          selected.add(dep)
          pending.push(dep)
        }
      }
    }

    return this.steps.filter(s => selected.has(s.id))
  }

  private finish(success: boolean): BuildReport {
    const ctx = this.context
    this.report.success = success
    this.report.duration = Date.now() - this.startTime
    this.report.summary = {
      taxa: ctx.store?.concepts.length ?? 0,
      acceptedTaxa: ctx.store?.accepted.length ?? 0,
      genera: ctx.store?.hierarchy.length ?? 0,
      rows: ctx.batch.counts(),
      duplicatesDropped: ctx.duplicatesDropped,
      unresolvedNames: ctx.problems.length,
      excludedNames: ctx.exclusions.length,
      loaded: ctx.load ? { destination: ctx.load.destination, rows: ctx.load.rows } : undefined,
    }
    this.writeReport()
    return this.report
  }

  private writeReport(): void {
    const file = path.join(this.context.outputs.reports, 'build-report.json')
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, JSON.stringify(this.report, null, 2) + '\n', 'utf8')
  }
}
