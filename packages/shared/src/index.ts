export type TaxonLevel =
  | 'genus' | 'hybrid' | 'species' | 'subspecies' | 'variety'
  | 'unknown' | 'functional group'

// Status strings are curated data; these are the ones the pipeline reasons about.
export type KnownTaxonStatus =
  | 'accepted' | 'synonym' | 'historical'
  | 'taxonomy unresolved' | 'location unresolved'
  | 'adjacent Yukon' | 'adjacent BC' | 'adjacent Canada'
  | 'ephemeral non-native'

export type TaxonStatus = KnownTaxonStatus | (string & {})

export interface TaxonConcept {
  code: string
  name: string
  author: string
  status: TaxonStatus
  acceptedCode: string
}

export interface AcceptedTaxon {
  acceptedCode: string
  name: string
  genusCode: string
  source: string | null
  link: string | null
  level: TaxonLevel
  habit: string
  native: boolean
  nonNative: boolean
}

export interface GenusHierarchy {
  genusCode: string
  genus: string
  family: string
  category: string
}

export interface Classification {
  family: string
  category: string
}

export type VocabularyKey = number | string

// Which cover tables a ground element may appear in
export type ElementType = 'abiotic' | 'ground' | 'both'

export interface VocabularyTerm {
  domain: string
  id: VocabularyKey
  label: string
  // ground_element only
  elementType?: ElementType
}

// A cell of a normalized table row, as written to CSV, SQL and the destination
export type Cell = string | number | boolean | null

export type Row = Record<string, Cell>

export interface ProblemEntry {
  dataset: string
  nameOriginal: string
  nameAdjudicated: null
  status: 'unresolved'
  occurrences: number
}

export interface ExclusionEntry {
  dataset: string
  nameOriginal: string
  rule: string
  rowsDropped: number
}
