import fs from 'node:fs'
import { z } from 'zod'
import type { ElementType, Row, VocabularyKey, VocabularyTerm } from '@vegplot/shared'
import { readCsv, type CsvRecord } from '../csv.js'
import { SourceError, VocabularyError, type FailureLocation } from '../errors.js'
import { cleanText } from '../taxonomy/source.js'
import { byCodeUnit } from '../keys.js'
import { VOCABULARY_DOMAINS, domainForField, isDomainName, type DomainName, type VocabularyDomain } from './domains.js'
import { MISSING_VALUES, isMissingCell } from './nodata.js'

const dictionaryRowSchema = z.object({
  field: z.string().transform(cleanText),
  data_attribute_id: z.string().transform(cleanText).pipe(z.string().min(1)),
  data_attribute: z.string().transform(cleanText).pipe(z.string().min(1)),
  element_type: z.string().optional().transform(v => cleanText(v ?? '')),
})

const elementTypeSchema = z.enum(['abiotic', 'ground', 'both'])

const organizationRowSchema = z.object({
  organization_id: z.string().transform(cleanText).pipe(z.coerce.number().int().positive()),
  organization: z.string().transform(cleanText).pipe(z.string().min(1)),
  organization_type: z.string().transform(cleanText).pipe(z.string().min(1)),
})

// domain -> retired label -> current label
const aliasesSchema = z.record(z.record(z.string()))

export type VocabularyAliases = z.infer<typeof aliasesSchema>

const integerKey = z.coerce.number().int().positive()

export interface Organization {
  id: number
  label: string
  organizationTypeId: number
}

/**
 * Label to surrogate key lookups for every controlled vocabulary, with the
 * retired-label aliases applied first. Built once per run and read-only after.
 */
export class VocabularyNormalizer {
  private readonly byLabel = new Map<string, Map<string, VocabularyKey>>()
  private readonly byKey = new Map<string, Map<string, VocabularyTerm>>()

  constructor(
    terms: Iterable<VocabularyTerm>,
    private readonly aliases: VocabularyAliases = {},
    readonly organizations: readonly Organization[] = [],
  ) {
    for (const term of terms) {
      const labels = this.byLabel.get(term.domain) ?? new Map<string, VocabularyKey>()
      const keys = this.byKey.get(term.domain) ?? new Map<string, VocabularyTerm>()
      if (labels.has(term.label)) throw new SourceError(`Duplicate ${term.domain} label "${term.label}"`)
      if (keys.has(String(term.id))) throw new SourceError(`Duplicate ${term.domain} key "${term.id}"`)
      labels.set(term.label, term.id)
      keys.set(String(term.id), Object.freeze({ ...term }))
      this.byLabel.set(term.domain, labels)
      this.byKey.set(term.domain, keys)
    }
    for (const org of organizations) {
      if (!this.byKey.get('organization_type')?.has(String(org.organizationTypeId))) {
        throw new VocabularyError('organization_type', String(org.organizationTypeId), { table: 'organization', record: { organization: org.label } })
      }
    }
  }

  /**
   * Surrogate key for a label. Missing cells are null; aliases apply next, and
   * the NULL sentinel (raw or as an alias target) is null. Any other label
   * must exist in the domain.
   */
  normalize(domain: DomainName, raw: string | null | undefined, location: FailureLocation = {}): VocabularyKey | null {
    const value = this.canonicalLabel(domain, raw, location)
    if (value === null) return null
    const key = this.byLabel.get(domain)?.get(value)
    if (key === undefined) throw new VocabularyError(domain, value, location)
    return key
  }

  /** The current label for a raw cell, aliases applied; null where `normalize` gives null. */
  canonicalLabel(domain: DomainName, raw: string | null | undefined, location: FailureLocation = {}): string | null {
    if (isMissingCell(raw)) return null
    const value = this.applyAlias(domain, cleanText(raw))
    if (value === MISSING_VALUES.textSentinel) return null
    if (!this.byLabel.get(domain)?.has(value)) throw new VocabularyError(domain, value, location)
    return value
  }

  elementType(code: VocabularyKey): ElementType | undefined {
    return this.byKey.get('ground_element')?.get(String(code))?.elementType
  }

  /** Checks a value that is already a key (soil horizon codes, hue codes). */
  requireKey(domain: DomainName, raw: string | null | undefined, location: FailureLocation = {}): VocabularyKey | null {
    if (isMissingCell(raw)) return null
    const value = cleanText(raw)
    if (value === MISSING_VALUES.textSentinel) return null
    const term = this.byKey.get(domain)?.get(value)
    if (!term) throw new VocabularyError(domain, value, location)
    return term.id
  }

  terms(domain: DomainName): VocabularyTerm[] {
    return Array.from(this.byKey.get(domain)?.values() ?? [])
  }

  private applyAlias(domain: string, value: string): string {
    return this.aliases[domain]?.[value] ?? value
  }

  /** Rows of every vocabulary table, keyed by table name. */
  tableRows(): Record<string, Row[]> {
    const out: Record<string, Row[]> = {}
    for (const domain of VOCABULARY_DOMAINS) {
      if (domain.name === 'organization') continue
      out[domain.table] = this.terms(domain.name)
        .sort(compareKeys)
        .map(t => domain.name === 'ground_element'
          ? { [domain.keyColumn]: t.id, [domain.labelColumn]: t.label, element_type: t.elementType ?? 'both' }
          : { [domain.keyColumn]: t.id, [domain.labelColumn]: t.label })
    }
    out.organization = [...this.organizations]
      .sort((a, b) => a.id - b.id)
      .map(o => ({ organization_id: o.id, organization: o.label, organization_type_id: o.organizationTypeId }))
    return out
  }
}

function compareKeys(a: VocabularyTerm, b: VocabularyTerm): number {
  if (typeof a.id === 'number' && typeof b.id === 'number') return a.id - b.id
  return byCodeUnit(String(a.id), String(b.id))
}

function parseKey(domain: VocabularyDomain, raw: string, location: FailureLocation): VocabularyKey {
  if (domain.keyKind === 'code') return raw
  const parsed = integerKey.safeParse(raw)
  if (!parsed.success) throw new SourceError(`${domain.name} key "${raw}" is not a positive integer`, location)
  return parsed.data
}

/** Vocabulary terms from database dictionary records; fields that are not vocabularies are skipped. */
export function parseDictionary(records: CsvRecord[], file = '<dictionary>'): VocabularyTerm[] {
  const terms: VocabularyTerm[] = []
  records.forEach((record, i) => {
    const location = { file, line: i + 2 }
    const result = dictionaryRowSchema.safeParse(record)
    if (!result.success) {
      throw new SourceError(`Invalid dictionary row: ${result.error.issues[0]?.message ?? 'unknown issue'}`, location)
    }
    const domain = domainForField(result.data.field)
    if (!domain || domain.name === 'organization') return
    const term: VocabularyTerm = {
      domain: domain.name,
      id: parseKey(domain, result.data.data_attribute_id, location),
      label: result.data.data_attribute,
    }
    if (domain.name === 'ground_element') {
      // Unmarked elements may be recorded in either cover table
      const elementType = elementTypeSchema.safeParse(result.data.element_type || 'both')
      if (!elementType.success) throw new SourceError(`Unknown element_type "${result.data.element_type}"`, location)
      term.elementType = elementType.data
    }
    terms.push(term)
  })
  return terms
}

export function parseOrganizations(records: CsvRecord[], terms: readonly VocabularyTerm[], file = '<organizations>'): Organization[] {
  const types = new Map(terms.filter(t => t.domain === 'organization_type').map(t => [t.label, t.id]))
  return records.map((record, i) => {
    const location = { file, line: i + 2 }
    const result = organizationRowSchema.safeParse(record)
    if (!result.success) {
      throw new SourceError(`Invalid organization row: ${result.error.issues[0]?.message ?? 'unknown issue'}`, location)
    }
    const typeId = types.get(result.data.organization_type)
    if (typeof typeId !== 'number') {
      throw new VocabularyError('organization_type', result.data.organization_type, { ...location, table: 'organization' })
    }
    return { id: result.data.organization_id, label: result.data.organization, organizationTypeId: typeId }
  })
}

export function parseAliases(value: unknown, file = '<aliases>'): VocabularyAliases {
  const result = aliasesSchema.safeParse(value)
  if (!result.success) throw new SourceError('Vocabulary aliases must map domain -> label -> label', { file })
  for (const domain of Object.keys(result.data)) {
    // Fails for a misspelled domain
    if (!isDomainName(domain)) throw new SourceError(`Aliases name unknown vocabulary "${domain}"`, { file })
  }
  return result.data
}

export interface VocabularySources {
  dictionaryPath: string
  organizationPath?: string
  aliasesPath?: string
}

export function buildVocabulary(sources: VocabularySources): VocabularyNormalizer {
  const terms = parseDictionary(readCsv(sources.dictionaryPath), sources.dictionaryPath)
  const organizations = sources.organizationPath && fs.existsSync(sources.organizationPath)
    ? parseOrganizations(readCsv(sources.organizationPath), terms, sources.organizationPath)
    : []
  const aliases = sources.aliasesPath && fs.existsSync(sources.aliasesPath)
    ? parseAliases(JSON.parse(fs.readFileSync(sources.aliasesPath, 'utf8')), sources.aliasesPath)
    : {}
  const organizationTerms = organizations.map(o => ({ domain: 'organization', id: o.id, label: o.label }))
  return new VocabularyNormalizer([...terms, ...organizationTerms], aliases, organizations)
}
