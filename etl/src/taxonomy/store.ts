import type { AcceptedTaxon, Classification, GenusHierarchy, Row, TaxonConcept } from '@vegplot/shared'
import { KeyRegistry, byCodeUnit } from '../keys.js'
import { TaxonomyBuildError } from '../errors.js'
import { ACCEPTED_STATUSES, type TaxonomySource, type TaxonomySourceRow } from './source.js'
import { deriveClassification, findGenusFor, isGenusLevel, type HierarchyLookup } from './hierarchy.js'

export const CONSTRAINT_TABLES = ['author', 'category', 'family', 'habit', 'status', 'level', 'source'] as const

export type ConstraintTable = typeof CONSTRAINT_TABLES[number]

export type ConstraintKeys = Record<ConstraintTable, ReadonlyMap<string, number>>

// Homonym precedence: accepted > historical > taxonomy unresolved > everything else
const STATUS_PRECEDENCE = ['accepted', 'historical', 'taxonomy unresolved']

export function statusRank(status: string): number {
  const i = STATUS_PRECEDENCE.indexOf(status)
  return i === -1 ? STATUS_PRECEDENCE.length : i
}

export function byStatusPrecedence<T extends { status: string; code: string }>(a: T, b: T): number {
  return statusRank(a.status) - statusRank(b.status) || byCodeUnit(a.code, b.code)
}

export interface BuildOptions {
  // Prior key registry; omit for a first build
  registry?: KeyRegistry
}

const isAcceptedEligible = (row: TaxonomySourceRow) => ACCEPTED_STATUSES.has(row.taxon_status)
const isSelfAccepting = (row: TaxonomySourceRow) => isAcceptedEligible(row) && row.taxon_accepted === row.taxon_name

/**
 * Read-only taxonomy snapshot for one release: every name, its accepted concept,
 * and the genus-level hierarchy that classifies it.
 */
export class TaxonConceptStore implements HierarchyLookup {
  private readonly byCode: ReadonlyMap<string, TaxonConcept>
  private readonly byName: ReadonlyMap<string, readonly TaxonConcept[]>
  private readonly acceptedByCode: ReadonlyMap<string, AcceptedTaxon>
  private readonly genusByCode: ReadonlyMap<string, GenusHierarchy>
  private readonly genusByName: ReadonlyMap<string, GenusHierarchy>

  private constructor(
    readonly concepts: readonly TaxonConcept[],
    readonly accepted: readonly AcceptedTaxon[],
    readonly hierarchy: readonly GenusHierarchy[],
    readonly constraints: ConstraintKeys,
    readonly citations: ReadonlyMap<string, string>,
    readonly registry: KeyRegistry,
  ) {
    this.byCode = new Map(concepts.map(c => [c.code, c]))
    const byName = new Map<string, TaxonConcept[]>()
    for (const c of concepts) byName.set(c.name, [...(byName.get(c.name) ?? []), c])
    this.byName = byName
    this.acceptedByCode = new Map(accepted.map(a => [a.acceptedCode, a]))
    this.genusByCode = new Map(hierarchy.map(g => [g.genusCode, g]))
    this.genusByName = new Map(hierarchy.map(g => [g.genus, g]))
  }

  static build(source: TaxonomySource, options: BuildOptions = {}): TaxonConceptStore {
    const registry = options.registry ?? new KeyRegistry()
    const rows = [...source.rows].sort((a, b) => byCodeUnit(a.taxon_code, b.taxon_code))
    const problems: string[] = []

    // Identity checks
    const codes = new Set<string>()
    const nameAuthors = new Set<string>()
    for (const row of rows) {
      if (codes.has(row.taxon_code)) problems.push(`duplicate taxon code "${row.taxon_code}"`)
      codes.add(row.taxon_code)
      const key = `${row.taxon_name}\u0000${row.taxon_author}`
      if (nameAuthors.has(key)) problems.push(`duplicate taxon name "${row.taxon_name}" with the same author`)
      nameAuthors.add(key)
      if (isAcceptedEligible(row) && row.taxon_accepted !== row.taxon_name) {
        problems.push(`${row.taxon_name} (${row.taxon_code}) has status "${row.taxon_status}" but is accepted as ${row.taxon_accepted}`)
      }
    }

    // Constraint tables
    const constraints: ConstraintKeys = {
      author: registry.assign('taxon_author', rows.map(r => r.taxon_author)),
      category: registry.assign('taxon_category', rows.map(r => r.taxon_category)),
      family: registry.assign('taxon_family', rows.map(r => r.taxon_family)),
      habit: registry.assign('taxon_habit', rows.map(r => r.taxon_habit)),
      status: registry.assign('taxon_status', rows.map(r => r.taxon_status)),
      level: registry.assign('taxon_level', rows.map(r => r.taxon_level)),
      source: registry.assign('taxon_source', rows.flatMap(r => (r.taxon_source ? [r.taxon_source] : []))),
    }
    const citations = new Map(source.citations.map(c => [c.taxon_source, c.taxon_citation]))
    for (const s of constraints.source.keys()) {
      if (!citations.has(s)) problems.push(`taxon source "${s}" has no citation`)
    }

    // Genus-level hierarchy: one entry per accepted genus-level name
    const hierarchy: GenusHierarchy[] = []
    const genusNames = new Set<string>()
    for (const row of rows) {
      if (!isAcceptedEligible(row) || !isGenusLevel(row.taxon_level)) continue
      if (genusNames.has(row.taxon_accepted)) continue
      genusNames.add(row.taxon_accepted)
      hierarchy.push(Object.freeze({
        genusCode: row.taxon_code,
        genus: row.taxon_accepted,
        family: row.taxon_family,
        category: row.taxon_category,
      }))
    }
    const genusLookup = {
      byCode: new Map(hierarchy.map(g => [g.genusCode, g])),
      byName: new Map(hierarchy.map(g => [g.genus, g])),
    }

    // Accepted taxa
    const accepted: AcceptedTaxon[] = []
    for (const row of rows) {
      if (!isSelfAccepting(row)) continue
      const genus = findGenusFor(
        {
          getAccepted: () => undefined,
          getGenus: code => genusLookup.byCode.get(code),
          findGenusByName: name => genusLookup.byName.get(name),
        },
        { acceptedCode: row.taxon_code, name: row.taxon_name, level: row.taxon_level },
      )
      if (!genus) {
        problems.push(`no genus hierarchy entry for ${row.taxon_name} (${row.taxon_code}, level ${row.taxon_level})`)
        continue
      }
      accepted.push(Object.freeze({
        acceptedCode: row.taxon_code,
        name: row.taxon_name,
        genusCode: genus.genusCode,
        source: row.taxon_source,
        link: row.taxon_link,
        level: row.taxon_level,
        habit: row.taxon_habit,
        native: row.taxon_native,
        nonNative: row.taxon_non_native,
      }))
    }

    // Concepts, with accepted pointers flattened to a single hop
    const rowsByName = new Map<string, TaxonomySourceRow[]>()
    for (const row of rows) rowsByName.set(row.taxon_name, [...(rowsByName.get(row.taxon_name) ?? []), row])

    const acceptedCodes = new Set(accepted.map(a => a.acceptedCode))
    const concepts: TaxonConcept[] = []
    for (const row of rows) {
      const target = flattenAccepted(row, rowsByName)
      if (typeof target === 'string') {
        problems.push(target)
        continue
      }
      // Already reported when the accepted row failed its genus join
      if (!acceptedCodes.has(target.taxon_code)) continue
      concepts.push(Object.freeze({
        code: row.taxon_code,
        name: row.taxon_name,
        author: row.taxon_author,
        status: row.taxon_status,
        acceptedCode: target.taxon_code,
      }))
    }

    if (problems.length) throw new TaxonomyBuildError(problems)

    return new TaxonConceptStore(
      Object.freeze(concepts),
      Object.freeze(accepted),
      Object.freeze(hierarchy),
      Object.freeze(constraints),
      citations,
      registry,
    )
  }

  lookupByCode(code: string): TaxonConcept | undefined {
    return this.byCode.get(code)
  }

  // Exact match only; curated names are compared as stored
  lookupByName(name: string): TaxonConcept[] {
    return [...(this.byName.get(name) ?? [])]
  }

  getAccepted(acceptedCode: string): AcceptedTaxon | undefined {
    return this.acceptedByCode.get(acceptedCode)
  }

  getGenus(genusCode: string): GenusHierarchy | undefined {
    return this.genusByCode.get(genusCode)
  }

  findGenusByName(genus: string): GenusHierarchy | undefined {
    return this.genusByName.get(genus)
  }

  classify(acceptedCode: string): Classification {
    return deriveClassification(this, acceptedCode)
  }
}

export const buildTaxonomy = (source: TaxonomySource, options?: BuildOptions): TaxonConceptStore =>
  TaxonConceptStore.build(source, options)

// Follows taxon_accepted names until a self-accepting row; returns a problem string on failure
function flattenAccepted(row: TaxonomySourceRow, rowsByName: ReadonlyMap<string, TaxonomySourceRow[]>): TaxonomySourceRow | string {
  const visited = new Set<string>()
  let current = row
  while (!isSelfAccepting(current)) {
    if (visited.has(current.taxon_code)) return `accepted-name cycle through ${row.taxon_name} (${row.taxon_code})`
    visited.add(current.taxon_code)
    const candidates = (rowsByName.get(current.taxon_accepted) ?? [])
      .map(r => ({ row: r, status: r.taxon_status, code: r.taxon_code }))
      .sort(byStatusPrecedence)
    const next = candidates[0]
    if (!next) return `${row.taxon_name} (${row.taxon_code}) is accepted as unknown name "${current.taxon_accepted}"`
    current = next.row
  }
  return current
}

/**
 * Re-checks a built store: accepted pointers are a single hop and every
 * accepted taxon reaches a hierarchy entry. Returns the problems found.
 */
export function verifyTaxonomy(store: TaxonConceptStore): string[] {
  const problems: string[] = []
  for (const concept of store.concepts) {
    const target = store.lookupByCode(concept.acceptedCode)
    if (!target || target.acceptedCode !== target.code) {
      problems.push(`${concept.name} (${concept.code}) does not point at a self-accepting concept`)
    }
    if (!store.getAccepted(concept.acceptedCode)) {
      problems.push(`${concept.name} (${concept.code}) has no accepted taxon "${concept.acceptedCode}"`)
    }
  }
  for (const accepted of store.accepted) {
    if (!store.getGenus(accepted.genusCode)) {
      problems.push(`${accepted.name} (${accepted.acceptedCode}) has no genus hierarchy entry "${accepted.genusCode}"`)
    }
  }
  return problems
}

/**
 * Relational rows for the taxonomy tables, keyed by destination table.
 */
export function taxonomyTableRows(store: TaxonConceptStore): Record<string, Row[]> {
  const k = store.constraints
  const lookup = (table: ConstraintTable, value: string): number => {
    const id = k[table].get(value)
    if (id === undefined) throw new TaxonomyBuildError([`no ${table} key for "${value}"`])
    return id
  }
  const constraintRows = (table: ConstraintTable, column: string): Row[] =>
    Array.from(k[table].entries())
      .sort((a, b) => a[1] - b[1])
      .map(([value, id]) => ({ [`${column}_id`]: id, [column]: value }))

  const families = new Map(store.hierarchy.map(g => [g.genusCode, g]))

  return {
    taxon_author: constraintRows('author', 'taxon_author'),
    taxon_category: constraintRows('category', 'taxon_category'),
    taxon_family: constraintRows('family', 'taxon_family'),
    taxon_habit: constraintRows('habit', 'taxon_habit'),
    taxon_status: constraintRows('status', 'taxon_status'),
    taxon_level: constraintRows('level', 'taxon_level'),
    taxon_source: constraintRows('source', 'taxon_source').map(r => ({
      ...r,
      taxon_citation: typeof r.taxon_source === 'string' ? store.citations.get(r.taxon_source) ?? null : null,
    })),
    taxon_hierarchy: Array.from(families.values()).map(g => ({
      taxon_genus_code: g.genusCode,
      taxon_family_id: lookup('family', g.family),
      taxon_category_id: lookup('category', g.category),
    })),
    taxon_accepted: store.accepted.map(a => ({
      taxon_accepted_code: a.acceptedCode,
      taxon_genus_code: a.genusCode,
      taxon_source_id: a.source === null ? null : lookup('source', a.source),
      taxon_link: a.link,
      taxon_level_id: lookup('level', a.level),
      taxon_habit_id: lookup('habit', a.habit),
      taxon_native: a.native,
      taxon_non_native: a.nonNative,
    })),
    taxon_all: store.concepts.map(c => ({
      taxon_code: c.code,
      taxon_name: c.name,
      taxon_author_id: lookup('author', c.author),
      taxon_status_id: lookup('status', c.status),
      taxon_accepted_code: c.acceptedCode,
    })),
  }
}
