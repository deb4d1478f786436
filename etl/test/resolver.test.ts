import { describe, it, expect } from 'vitest'
import { MeasurementError, SourceError } from '../src/errors.js'
import { OverrideTable, parseOverrides } from '../src/taxonomy/overrides.js'
import { NameResolver, cleanName, collapseCover, parseCoverObservations, type CoverObservation } from '../src/taxonomy/resolver.js'
import { fixtureOverrides, fixtureStore } from './helpers.js'

const store = fixtureStore()

const cover = (name: string, percent: number, extra: Partial<CoverObservation> = {}): CoverObservation => ({
  site_visit_code: 'ALP-01_20190712',
  name_original: name,
  cover_type: 'absolute foliar cover',
  dead_status: false,
  cover_percent: percent,
  ...extra,
})

describe('NameResolver', () => {
  const resolver = new NameResolver(store, fixtureOverrides())

  it('resolves a synonym to its accepted taxon', () => {
    expect(resolver.resolve('Vaccinium oxycoccos', 'alpha_2019')).toEqual({
      status: 'resolved',
      nameOriginal: 'Vaccinium oxycoccos',
      nameAdjudicated: 'Oxycoccus microcarpus',
      codeAdjudicated: 'oxymic',
      acceptedCode: 'oxymic',
      via: 'exact',
    })
    expect(store.classify('oxymic').category).toBe('eudicot')
  })

  it('prefers the accepted homonym', () => {
    const resolution = resolver.resolve('Betula glandulosa', 'alpha_2019')
    expect(resolution.status === 'resolved' && resolution.codeAdjudicated).toBe('betgla')
  })

  it('applies wildcard corrections', () => {
    const resolution = resolver.resolve('Oxycoccus microcarpa', 'beta_2021')
    expect(resolution).toMatchObject({ status: 'resolved', codeAdjudicated: 'oxymic', via: 'override' })
    expect(resolver.resolve('Moss sp.', 'alpha_2019')).toMatchObject({ status: 'resolved', codeAdjudicated: 'moss', via: 'override' })
  })

  it('resolves species placeholders through the cleaned name', () => {
    expect(resolver.resolve('Salix sp.', 'alpha_2019')).toMatchObject({ status: 'resolved', codeAdjudicated: 'salix', via: 'cleaned' })
    expect(resolver.resolve('Carex  spp.', 'alpha_2019')).toMatchObject({ status: 'resolved', codeAdjudicated: 'carex', via: 'cleaned' })
  })

  it('excludes names only in the dataset that asks for it', () => {
    expect(resolver.resolve('Lichen crust', 'alpha_2019')).toEqual({
      status: 'excluded',
      nameOriginal: 'Lichen crust',
      rule: 'override:alpha_2019',
    })
    expect(resolver.resolve('Lichen crust', 'beta_2021')).toEqual({
      status: 'unresolved',
      nameOriginal: 'Lichen crust',
      nameAdjudicated: null,
    })
  })

  it('never guesses at unknown names', () => {
    expect(resolver.resolve('Mystery forb', 'alpha_2019')).toEqual({
      status: 'unresolved',
      nameOriginal: 'Mystery forb',
      nameAdjudicated: null,
    })
  })

  it('is idempotent on adjudicated names', () => {
    for (const name of ['Vaccinium oxycoccos', 'Picea alba', 'Carex lugens', 'Salix sp.']) {
      const first = resolver.resolve(name, 'alpha_2019')
      if (first.status !== 'resolved') throw new Error(`${name} did not resolve`)
      const again = resolver.resolve(first.nameAdjudicated, 'alpha_2019')
      expect(again).toMatchObject({ status: 'resolved', codeAdjudicated: first.codeAdjudicated, via: 'exact' })
    }
  })

  it('lets a dataset-specific override win over a wildcard one', () => {
    const overrides = new OverrideTable([
      { action: 'correct', dataset: '*', nameOriginal: 'Spruce', nameCorrected: 'Picea' },
      { action: 'correct', dataset: 'beta_2021', nameOriginal: 'Spruce', nameCorrected: 'Picea glauca' },
    ])
    const local = new NameResolver(store, overrides)
    expect(local.resolve('Spruce', 'alpha_2019')).toMatchObject({ codeAdjudicated: 'picea' })
    expect(local.resolve('Spruce', 'beta_2021')).toMatchObject({ codeAdjudicated: 'picgla' })
  })

  it('does not consult overrides for names that already match', () => {
    const overrides = new OverrideTable([{ action: 'exclude', dataset: '*', nameOriginal: 'Betula nana' }])
    expect(new NameResolver(store, overrides).resolve('Betula nana', 'alpha_2019')).toMatchObject({ status: 'resolved', codeAdjudicated: 'betnan' })
  })
})

describe('resolveObservations', () => {
  it('combines duplicate cover rows before resolving them', () => {
    const overrides = new OverrideTable([{ action: 'correct', dataset: '*', nameOriginal: 'Carex 1', nameCorrected: 'Carex' }])
    const resolver = new NameResolver(store, overrides)
    const rows = collapseCover([cover('Carex 1', 5), cover('Carex 1', 3)])
    const resolved = resolver.resolveObservations(rows, 'alpha_2019')

    expect(resolved.rows).toEqual([{
      ...cover('Carex 1', 8),
      code_adjudicated: 'carex',
      name_adjudicated: 'Carex',
    }])
    expect(resolved.problems).toEqual([])
  })

  it('withholds unresolved rows and reports them once per name', () => {
    const resolver = new NameResolver(store, fixtureOverrides())
    const resolved = resolver.resolveObservations([
      cover('Mystery forb', 1),
      cover('Betula nana', 10),
      cover('Mystery forb', 2, { site_visit_code: 'ALP-02_20190713' }),
      cover('Lichen crust', 4),
    ], 'alpha_2019')

    expect(resolved.rows.map(r => r.code_adjudicated)).toEqual(['betnan'])
    expect(resolved.problems).toEqual([
      { dataset: 'alpha_2019', nameOriginal: 'Mystery forb', nameAdjudicated: null, status: 'unresolved', occurrences: 2 },
    ])
    expect(resolved.exclusions).toEqual([
      { dataset: 'alpha_2019', nameOriginal: 'Lichen crust', rule: 'override:alpha_2019', rowsDropped: 1 },
    ])
  })
})

describe('collapseCover', () => {
  it('keeps rows apart by cover type and dead status', () => {
    const rows = collapseCover([
      cover('Betula nana', 10),
      cover('Betula nana', 1, { dead_status: true }),
      cover('Betula nana', 2, { cover_type: 'top foliar cover' }),
      cover('Betula nana', 5),
    ])
    expect(rows.map(r => [r.cover_type, r.dead_status, r.cover_percent])).toEqual([
      ['absolute foliar cover', false, 15],
      ['absolute foliar cover', true, 1],
      ['top foliar cover', false, 2],
    ])
  })

  it('drops float noise from sums', () => {
    expect(collapseCover([cover('Salix', 0.1), cover('Salix', 0.2)])[0]?.cover_percent).toBe(0.3)
  })

  it('keeps digits finer than a thousandth', () => {
    expect(collapseCover([cover('Salix', 0.0004), cover('Salix', 0.0002)])[0]?.cover_percent).toBe(0.0006)
    expect(collapseCover([cover('Salix', 1.0005), cover('Salix', 2)])[0]?.cover_percent).toBe(3.0005)
  })

  it('leaves its input untouched', () => {
    const input = [cover('Salix', 1), cover('Salix', 2)]
    collapseCover(input)
    expect(input.map(r => r.cover_percent)).toEqual([1, 2])
  })
})

describe('parseCoverObservations', () => {
  const record = {
    site_visit_code: 'ALP-01_20190712',
    name_original: ' Carex  bigelowii ',
    cover_type: 'absolute foliar cover',
    dead_status: 'FALSE',
    cover_percent: '2.5',
  }

  it('types and cleans raw cover records', () => {
    expect(parseCoverObservations([record])).toEqual([{
      site_visit_code: 'ALP-01_20190712',
      name_original: 'Carex bigelowii',
      cover_type: 'absolute foliar cover',
      dead_status: false,
      cover_percent: 2.5,
    }])
  })

  it('rejects a non-numeric cover value with its line', () => {
    try {
      parseCoverObservations([record, { ...record, cover_percent: 'trace' }], 'cover.csv')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(MeasurementError)
      if (!(error instanceof MeasurementError)) return
      expect(error.column).toBe('cover_percent')
      expect(error.location).toMatchObject({ table: 'vegetation_cover', file: 'cover.csv', line: 3 })
    }
  })

  it('rejects an empty cover value', () => {
    expect(() => parseCoverObservations([{ ...record, cover_percent: '' }])).toThrow(MeasurementError)
  })
})

describe('overrides', () => {
  it('reads corrections and exclusions', () => {
    const table = parseOverrides([
      { dataset: '*', name_original: 'Moss sp.', name_corrected: 'moss', action: 'correct' },
      { dataset: 'alpha_2019', name_original: 'Lichen crust', name_corrected: 'NA', action: 'EXCLUDE' },
    ])
    expect(table.size).toBe(2)
    expect(table.find('beta_2021', 'Moss sp.')).toEqual({ action: 'correct', dataset: '*', nameOriginal: 'Moss sp.', nameCorrected: 'moss' })
    expect(table.find('alpha_2019', 'Lichen crust')).toEqual({ action: 'exclude', dataset: 'alpha_2019', nameOriginal: 'Lichen crust' })
    expect(table.find('beta_2021', 'Lichen crust')).toBeUndefined()
  })

  it('rejects a correction without a corrected name', () => {
    expect(() => parseOverrides([{ dataset: '*', name_original: 'Moss sp.', name_corrected: 'NA', action: 'correct' }])).toThrow(SourceError)
  })

  it('rejects duplicate entries', () => {
    expect(() => new OverrideTable([
      { action: 'exclude', dataset: '*', nameOriginal: 'Lichen crust' },
      { action: 'exclude', dataset: '*', nameOriginal: 'Lichen crust' },
    ])).toThrow(SourceError)
  })
})

describe('cleanName', () => {
  it('drops the species placeholder and extra whitespace', () => {
    expect(cleanName('  Salix sp. ')).toBe('Salix')
    expect(cleanName('Carex spp.')).toBe('Carex')
    expect(cleanName('Salix spinulosa')).toBe('Salix spinulosa')
  })
})
