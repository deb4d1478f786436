import { describe, it, expect } from 'vitest'
import { KeyRegistry } from '../src/keys.js'
import { SourceError, TaxonomyBuildError } from '../src/errors.js'
import { buildTaxonomy, taxonomyTableRows, verifyTaxonomy } from '../src/taxonomy/store.js'
import { genusJoinName } from '../src/taxonomy/hierarchy.js'
import { buildProblems, fixtureStore, taxon, taxonomyFrom } from './helpers.js'

describe('TaxonConceptStore', () => {
  const store = fixtureStore()

  it('builds every name, accepted taxon and genus', () => {
    expect(store.concepts).toHaveLength(23)
    expect(store.accepted).toHaveLength(18)
    expect(store.hierarchy).toHaveLength(9)
    expect(verifyTaxonomy(store)).toEqual([])
  })

  it('classifies a species through its genus', () => {
    const concept = store.lookupByCode('vacoxy')
    expect(concept?.acceptedCode).toBe('oxymic')
    expect(store.classify('oxymic')).toEqual({ family: 'Ericaceae', category: 'eudicot' })
  })

  it('classifies a functional group as its own hierarchy entry', () => {
    expect(store.getAccepted('moss')?.genusCode).toBe('moss')
    expect(store.classify('moss')).toEqual({ family: 'unknown', category: 'moss' })
  })

  it('flattens synonym chains to a single hop', () => {
    expect(store.lookupByCode('picalb')?.acceptedCode).toBe('picgla')
    expect(store.lookupByCode('piccan')?.acceptedCode).toBe('picgla')
  })

  it('keeps homonyms apart by author', () => {
    const homonyms = store.lookupByName('Betula glandulosa')
    expect(homonyms.map(c => [c.code, c.author, c.acceptedCode])).toEqual([
      ['betgla', 'Michx.', 'betgla'],
      ['betgla2', 'auct. non Michx.', 'betnan'],
    ])
  })

  it('matches names exactly', () => {
    expect(store.lookupByName('betula nana')).toEqual([])
    expect(store.lookupByName('Betula nana')).toHaveLength(1)
  })

  it('rejects an unknown accepted code when classifying', () => {
    expect(() => store.classify('nope')).toThrow(TaxonomyBuildError)
  })

  it('numbers constraint values alphabetically on a first build', () => {
    expect([...store.constraints.category]).toEqual([
      ['eudicot', 1], ['gymnosperm', 2], ['lichen', 3], ['monocot', 4], ['moss', 5],
    ])
    expect([...store.constraints.status]).toEqual([['accepted', 1], ['synonym', 2]])
    expect(store.constraints.author.get('L.')).toBe(10)
    expect(store.constraints.author.size).toBe(16)
  })
})

describe('taxonomyTableRows', () => {
  const tables = taxonomyTableRows(fixtureStore())

  it('writes the genus hierarchy with family and category keys', () => {
    expect(tables.taxon_hierarchy).toHaveLength(9)
    expect(tables.taxon_hierarchy).toContainEqual({ taxon_genus_code: 'oxycoc', taxon_family_id: 4, taxon_category_id: 1 })
  })

  it('points every name at its accepted code', () => {
    expect(tables.taxon_all).toContainEqual({
      taxon_code: 'vacoxy',
      taxon_name: 'Vaccinium oxycoccos',
      taxon_author_id: 10,
      taxon_status_id: 2,
      taxon_accepted_code: 'oxymic',
    })
  })

  it('writes accepted taxa with their genus and optional source', () => {
    expect(tables.taxon_accepted).toContainEqual({
      taxon_accepted_code: 'claran',
      taxon_genus_code: 'cladon',
      taxon_source_id: null,
      taxon_link: null,
      taxon_level_id: 3,
      taxon_habit_id: 4,
      taxon_native: true,
      taxon_non_native: false,
    })
  })

  it('carries citations on the source table', () => {
    expect(tables.taxon_source).toEqual([
      { taxon_source_id: 1, taxon_source: 'FNA', taxon_citation: 'Flora of North America Editorial Committee, eds. Flora of North America North of Mexico.' },
      { taxon_source_id: 2, taxon_source: 'PAF', taxon_citation: 'Panarctic Flora Editorial Committee. Annotated checklist of the panarctic flora, vascular plants.' },
    ])
  })
})

describe('taxonomy build checks', () => {
  const base = [taxon({ code: 'aster', name: 'Aster' }), taxon({ code: 'astalp', name: 'Aster alpinus' })]

  it('accepts a clean release', () => {
    expect(buildProblems(taxonomyFrom(base))).toEqual([])
  })

  it('reports accepted-name cycles', () => {
    const problems = buildProblems(taxonomyFrom([
      ...base,
      taxon({ code: 'astone', name: 'Aster one', status: 'synonym', accepted: 'Aster two' }),
      taxon({ code: 'asttwo', name: 'Aster two', status: 'synonym', accepted: 'Aster one' }),
    ]))
    expect(problems).toEqual([
      'accepted-name cycle through Aster one (astone)',
      'accepted-name cycle through Aster two (asttwo)',
    ])
  })

  it('reports names accepted as an unknown name', () => {
    const problems = buildProblems(taxonomyFrom([
      ...base,
      taxon({ code: 'astgho', name: 'Aster ghost', status: 'synonym', accepted: 'Aster missing' }),
    ]))
    expect(problems).toEqual(['Aster ghost (astgho) is accepted as unknown name "Aster missing"'])
  })

  it('reports accepted taxa without a genus', () => {
    const problems = buildProblems(taxonomyFrom([...base, taxon({ code: 'solcan', name: 'Solidago canadensis' })]))
    expect(problems).toEqual(['no genus hierarchy entry for Solidago canadensis (solcan, level species)'])
  })

  it('reports duplicate codes and duplicate name-author pairs', () => {
    const problems = buildProblems(taxonomyFrom([
      ...base,
      taxon({ code: 'astalp', name: 'Aster alpinus var. two', author: 'Nees' }),
      taxon({ code: 'astalp2', name: 'Aster alpinus' }),
    ]))
    expect(problems).toContain('duplicate taxon code "astalp"')
    expect(problems).toContain('duplicate taxon name "Aster alpinus" with the same author')
  })

  it('reports accepted-status rows that point elsewhere', () => {
    const problems = buildProblems(taxonomyFrom([
      ...base,
      taxon({ code: 'astbad', name: 'Aster bad', accepted: 'Aster alpinus' }),
    ]))
    expect(problems).toEqual(['Aster bad (astbad) has status "accepted" but is accepted as Aster alpinus'])
  })

  it('reports sources without a citation', () => {
    const lines = [...base, taxon({ code: 'astsib', name: 'Aster sibiricus', source: 'XYZ' })]
    expect(buildProblems(taxonomyFrom(lines))).toEqual(['taxon source "XYZ" has no citation'])
    expect(buildProblems(taxonomyFrom(lines, ['XYZ,Example checklist']))).toEqual([])
  })

  it('rejects an unknown level while reading', () => {
    expect(() => taxonomyFrom([taxon({ code: 'aster', name: 'Aster', level: 'kingdom' })])).toThrow(SourceError)
  })
})

describe('key stability across releases', () => {
  it('keeps earlier keys when a new value sorts first', () => {
    const first = buildTaxonomy(taxonomyFrom([
      taxon({ code: 'aster', name: 'Aster', category: 'eudicot' }),
      taxon({ code: 'poa', name: 'Poa', category: 'monocot', family: 'Poaceae' }),
    ]))
    const registry = new KeyRegistry(first.registry.snapshot())
    const next = buildTaxonomy(taxonomyFrom([
      taxon({ code: 'aster', name: 'Aster', category: 'eudicot' }),
      taxon({ code: 'poa', name: 'Poa', category: 'monocot', family: 'Poaceae' }),
      taxon({ code: 'chara', name: 'Chara', category: 'algae', family: 'Characeae' }),
    ]), { registry })

    expect(next.constraints.category.get('eudicot')).toBe(1)
    expect(next.constraints.category.get('monocot')).toBe(2)
    expect(next.constraints.category.get('algae')).toBe(3)
  })
})

describe('genusJoinName', () => {
  it('joins species through the first word and groups through the whole name', () => {
    expect(genusJoinName('Carex bigelowii ssp. lugens', 'subspecies')).toBe('Carex')
    expect(genusJoinName('moss', 'functional group')).toBe('moss')
    expect(genusJoinName('unknown forb', 'unknown')).toBe('unknown forb')
  })
})
