#!/usr/bin/env tsx
import fs from 'node:fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { env } from '@vegplot/config'
import { PipelineRunner } from './runner.js'
import { BUILD_STEPS, LOAD_STEPS, VALIDATE_STEPS } from './config.js'
import { outputPaths, settingsFromEnv } from './context.js'

const program = new Command()

const splitList = (value: string): string[] => value.split(',').map(s => s.trim()).filter(Boolean)

interface RunOptions {
  step?: string[]
  skip?: string[]
  strict?: boolean
  dryRun?: boolean
}

async function runSteps(defaultSteps: string[], options: RunOptions, failure: string): Promise<void> {
  const runner = new PipelineRunner(settingsFromEnv(env, { strict: options.strict ?? false, dryRun: options.dryRun ?? false }))
  const report = await runner.run(options.step ?? defaultSteps, options.skip)
  if (!report.success) {
    console.error(chalk.red(`\n❌ ${failure}`))
    process.exit(1)
  }
}

program
  .name('vegplot-etl')
  .description('Vegetation plot ETL pipeline')
  .version('1.0.0')

program
  .command('build')
  .description('Build taxonomy, combine project tables and write CSV and SQL outputs')
  .option('-s, --step <steps>', 'Run only specific step(s)', splitList)
  .option('--skip <steps>', 'Skip specific step(s)', splitList)
  .option('--strict', 'Fail when any observed name is unresolved')
  .action(async (options: RunOptions) => {
    await runSteps(BUILD_STEPS, options, 'Pipeline failed')
  })

program
  .command('taxonomy')
  .description('Build and check the taxonomy release only')
  .action(async () => {
    await runSteps(['taxonomy'], {}, 'Taxonomy build failed')
  })

program
  .command('validate')
  .description('Run every check and write the problem reports, without writing tables, keys or loading')
  .option('--strict', 'Fail when any observed name is unresolved')
  .action(async (options: RunOptions) => {
    await runSteps(VALIDATE_STEPS, { ...options, dryRun: true }, 'Validation failed')
  })

program
  .command('load')
  .description('Build, then load the batch into DATABASE_URL (or SQLITE_PATH) and verify it')
  .option('--skip <steps>', 'Skip specific step(s)', splitList)
  .option('--strict', 'Fail when any observed name is unresolved')
  .action(async (options: RunOptions) => {
    await runSteps(LOAD_STEPS, options, 'Load failed')
  })

program
  .command('clean')
  .description('Clean build artifacts (the key registry is kept)')
  .action(() => {
    console.log(chalk.yellow('🧹 Cleaning build artifacts...'))
    const settings = settingsFromEnv(env)
    const outputs = outputPaths(settings.outputDir)
    for (const dir of [outputs.tables, outputs.sql, outputs.reports]) {
      fs.rmSync(dir, { recursive: true, force: true })
    }
    fs.rmSync(settings.sqlitePath, { force: true })
    console.log(chalk.green('✅ Clean completed'))
  })

// Handle direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌ Pipeline crashed:'), error)
    process.exit(1)
  })
}
