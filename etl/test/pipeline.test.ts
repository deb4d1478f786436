import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { PipelineRunner } from '../src/pipeline/runner.js'
import { BUILD_STEPS, LOAD_STEPS, VALIDATE_STEPS } from '../src/pipeline/config.js'
import { assemblePlotTables, type PipelineSettings } from '../src/pipeline/context.js'
import { NameResolver } from '../src/taxonomy/resolver.js'
import { LoadBatch } from '../src/tables/batch.js'
import { SqliteDestination } from '../src/load/sqlite-destination.js'
import { loadKeyRegistry } from '../src/keys.js'
import { PLOTS, fixtureOverrides, fixtureStore, fixtureVocabulary, referenceFile } from './helpers.js'

let workDir: string

function settings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    taxonomyPath: referenceFile('taxonomy.csv'),
    citationsPath: referenceFile('citations.csv'),
    dictionaryPath: referenceFile('database_dictionary.csv'),
    organizationPath: referenceFile('organization.csv'),
    overridesPath: referenceFile('name_overrides.csv'),
    aliasesPath: referenceFile('vocabulary_aliases.json'),
    dataRoot: PLOTS,
    projectListPath: path.join(PLOTS, 'included_projects.json'),
    outputDir: path.join(workDir, 'build'),
    keyRegistryPath: path.join(workDir, 'build', 'key-registry.json'),
    sqlitePath: path.join(workDir, 'plots.db'),
    retries: 0,
    retryDelayMs: 1,
    chunkSize: 4,
    strict: false,
    dryRun: false,
    ...overrides,
  }
}

const read = (...parts: string[]) => fs.readFileSync(path.join(workDir, 'build', ...parts), 'utf8')

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vegplot-'))
})

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true })
})

describe('pipeline', () => {
  it('builds, loads and verifies the fixture project', async () => {
    const report = await new PipelineRunner(settings()).run(LOAD_STEPS)

    expect(report.steps.map(s => [s.id, s.success])).toEqual(LOAD_STEPS.map(id => [id, true]))
    expect(report.success).toBe(true)
    expect(report.summary).toMatchObject({
      taxa: 23,
      acceptedTaxa: 18,
      genera: 9,
      unresolvedNames: 1,
      excludedNames: 1,
      duplicatesDropped: {},
    })
    expect(report.summary.rows).toMatchObject({
      project: 1,
      site: 2,
      site_visit: 2,
      vegetation_cover: 9,
      abiotic_top_cover: 2,
      ground_cover: 2,
      tree_structure: 1,
      environment: 2,
      soil_metrics: 2,
      soil_horizons: 2,
      taxon_all: 23,
      taxon_accepted: 18,
      taxon_hierarchy: 9,
      organization: 2,
      personnel: 4,
    })
    const total = Object.values(report.summary.rows).reduce((a, b) => a + b, 0)
    expect(report.summary.loaded).toEqual({ destination: `sqlite ${path.join(workDir, 'plots.db')}`, rows: total })

    const dest = new SqliteDestination(path.join(workDir, 'plots.db'), { createSchema: false })
    await dest.open()
    expect(await dest.count('vegetation_cover')).toBe(9)
    expect(await dest.scalar("SELECT cover_percent AS n FROM vegetation_cover WHERE name_original = 'Carex bigelowii'")).toBe(8)
    expect(await dest.scalar("SELECT h_error_m AS n FROM site WHERE site_code = 'ALP-02'")).toBe(-999)
    expect(await dest.scalar("SELECT veg_recorder_id AS n FROM site_visit WHERE site_code = 'ALP-02'")).toBe(3)
    expect(await dest.scalar("SELECT COUNT(*) AS n FROM vegetation_cover WHERE code_adjudicated = 'oxymic'")).toBe(1)
    expect(await dest.scalar('SELECT private AS n FROM project')).toBe(0)
    await dest.close()
  })

  it('writes the problem list, the exclusion audit and the tables', async () => {
    const report = await new PipelineRunner(settings()).run(BUILD_STEPS)
    expect(report.success).toBe(true)

    expect(read('reports', 'problems.csv')).toBe(
      'dataset,name_original,name_adjudicated,status,occurrences\nalpha_2019,Mystery forb,NA,unresolved,1\n',
    )
    expect(read('reports', 'excluded.csv')).toBe(
      'dataset,name_original,rule,rows_dropped\nalpha_2019,Lichen crust,override:alpha_2019,1\n',
    )

    const cover = read('tables', 'vegetation_cover.csv').split('\n')
    expect(cover.slice(0, 3)).toEqual([
      'site_visit_code,cover_type_id,name_original,code_adjudicated,cover_percent,dead_status',
      'ALP-01_20190712,1,Vaccinium oxycoccos,oxymic,2,FALSE',
      'ALP-01_20190712,1,Carex bigelowii,carbig,8,FALSE',
    ])
    expect(cover).toContain('ALP-01_20190712,1,Betula nana,betnan,1,TRUE')
    expect(cover).toContain('ALP-02_20190713,1,Moss sp.,moss,4,FALSE')
    expect(cover.some(line => line.includes('Mystery forb') || line.includes('Lichen crust'))).toBe(false)

    expect(read('sql', 'insert_all.sql').startsWith('-- Insert plot data\n')).toBe(true)
    expect(read('taxonomy', 'taxon_hierarchy.csv').split('\n')).toContain('oxycoc,4,1')
    expect(fs.existsSync(path.join(workDir, 'plots.db'))).toBe(false)

    expect(JSON.parse(read('reports', 'build-report.json'))).toMatchObject({ success: true })
    expect(loadKeyRegistry(path.join(workDir, 'build', 'key-registry.json')).snapshot().taxon_category).toEqual({
      eudicot: 1, gymnosperm: 2, lichen: 3, monocot: 4, moss: 5,
    })
  })

  it('fails strict runs on unresolved names after writing the report', async () => {
    const report = await new PipelineRunner(settings({ strict: true })).run(BUILD_STEPS)

    expect(report.success).toBe(false)
    expect(report.steps.at(-1)).toMatchObject({ id: 'report', success: false })
    expect(read('reports', 'problems.csv').split('\n')[1]).toBe('alpha_2019,Mystery forb,NA,unresolved,1')
  })

  it('validates with dependencies added and writes only the reports', async () => {
    const report = await new PipelineRunner(settings({ dryRun: true })).run(VALIDATE_STEPS)

    expect(report.steps.map(s => [s.id, s.success])).toEqual([
      ['taxonomy', true], ['vocabulary', true], ['combine', true], ['report', true],
    ])
    expect(report.success).toBe(true)
    expect(read('reports', 'problems.csv').split('\n')[1]).toBe('alpha_2019,Mystery forb,NA,unresolved,1')
    for (const dir of ['taxonomy', 'tables', 'sql']) {
      expect(fs.existsSync(path.join(workDir, 'build', dir)), dir).toBe(false)
    }
    expect(fs.existsSync(path.join(workDir, 'build', 'key-registry.json'))).toBe(false)
  })

  it('rejects a site outside the plot region before anything is inserted', async () => {
    const dataRoot = path.join(workDir, 'plots')
    fs.cpSync(PLOTS, dataRoot, { recursive: true })
    const siteFile = path.join(dataRoot, 'alpha_2019', '02_site_alpha.csv')
    fs.writeFileSync(siteFile, fs.readFileSync(siteFile, 'utf8').replace('63.9021', '45.0'), 'utf8')

    const report = await new PipelineRunner(settings({
      dataRoot,
      projectListPath: path.join(dataRoot, 'included_projects.json'),
    })).run(LOAD_STEPS)

    expect(report.success).toBe(false)
    expect(report.steps.at(-1)).toMatchObject({ id: 'combine', success: false, code: 'BOUNDS' })
    expect(report.steps.map(s => s.id)).not.toContain('load')
    expect(fs.existsSync(path.join(workDir, 'plots.db'))).toBe(false)
  })
})

describe('assemblePlotTables', () => {
  it('collapses cover recorded under a retired cover type label', () => {
    const batch = new LoadBatch()
    const assembled = assemblePlotTables([{
      project: 'alpha_2019',
      table: 'vegetation_cover',
      file: '05_vegetationcover_alpha.csv',
      records: [
        { site_visit_code: 'ALP-01_20190712', name_original: 'Betula nana', dead_status: 'FALSE', cover_type: 'absolute cover', cover_percent: '1' },
        { site_visit_code: 'ALP-01_20190712', name_original: 'Betula nana', dead_status: 'FALSE', cover_type: 'absolute foliar cover', cover_percent: '12.5' },
      ],
    }], fixtureVocabulary(), new NameResolver(fixtureStore(), fixtureOverrides()), batch)

    expect(assembled.problems).toEqual([])
    expect(batch.check()).toEqual({})
    expect(batch.rows('vegetation_cover')).toEqual([{
      site_visit_code: 'ALP-01_20190712',
      cover_type_id: 1,
      name_original: 'Betula nana',
      code_adjudicated: 'betnan',
      cover_percent: 13.5,
      dead_status: false,
    }])
  })
})

describe('step selection', () => {
  const runner = () => new PipelineRunner(settings())

  it('adds dependencies of the requested steps', () => {
    expect(runner().filterSteps(['verify']).map(s => s.id)).toEqual(['taxonomy', 'vocabulary', 'combine', 'load', 'verify'])
    expect(runner().filterSteps(['taxonomy']).map(s => s.id)).toEqual(['taxonomy'])
  })

  it('skips steps nothing selected depends on', () => {
    expect(runner().filterSteps(BUILD_STEPS, ['emit']).map(s => s.id)).toEqual(['taxonomy', 'vocabulary', 'combine', 'report'])
  })

  it('rejects unknown step ids', () => {
    expect(() => runner().filterSteps(['publish'])).toThrow('Unknown step "publish"')
  })
})
