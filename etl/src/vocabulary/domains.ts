// Controlled vocabularies of the plot schema. Each one is a small lookup table
// whose rows come from the database dictionary.

export type KeyKind = 'id' | 'code' | 'epsg'

export interface VocabularyDomain {
  name: string
  // `field` value in the database dictionary
  field: string
  table: string
  keyColumn: string
  labelColumn: string
  keyKind: KeyKind
  // Longest label the destination column takes
  labelLength: number
}

const idDomain = <N extends string>(name: N, labelLength = 50): VocabularyDomain & { name: N } => ({
  name, field: name, table: name, keyColumn: `${name}_id`, labelColumn: name, keyKind: 'id', labelLength,
})

const codeDomain = <N extends string>(name: N, labelLength = 50): VocabularyDomain & { name: N } => ({
  name, field: name, table: name, keyColumn: `${name}_code`, labelColumn: name, keyKind: 'code', labelLength,
})

export const VOCABULARY_DOMAINS = [
  idDomain('completion', 30),
  idDomain('cover_method'),
  idDomain('cover_type'),
  idDomain('crown_class', 30),
  idDomain('data_tier', 30),
  idDomain('disturbance'),
  idDomain('disturbance_severity', 20),
  idDomain('drainage'),
  idDomain('geomorphology'),
  codeDomain('ground_element'),
  { name: 'h_datum', field: 'h_datum', table: 'h_datum', keyColumn: 'h_datum_epsg', labelColumn: 'h_datum', keyKind: 'epsg', labelLength: 20 },
  idDomain('height_type'),
  idDomain('location_type', 20),
  idDomain('macrotopography'),
  idDomain('microtopography'),
  idDomain('moisture'),
  idDomain('organization_type'),
  idDomain('personnel'),
  idDomain('perspective'),
  idDomain('physiography', 30),
  {
    name: 'plot_dimensions', field: 'plot_dimensions_m', table: 'plot_dimensions',
    keyColumn: 'plot_dimensions_id', labelColumn: 'plot_dimensions_m', keyKind: 'id', labelLength: 20,
  },
  idDomain('positional_accuracy', 30),
  idDomain('restrictive_type'),
  idDomain('scope', 30),
  idDomain('shrub_class', 20),
  idDomain('soil_class'),
  {
    name: 'soil_nonmatrix_features', field: 'soil_nonmatrix_features', table: 'soil_nonmatrix_features',
    keyColumn: 'nonmatrix_feature_code', labelColumn: 'nonmatrix_feature', keyKind: 'code', labelLength: 30,
  },
  codeDomain('soil_structure', 30),
  codeDomain('soil_texture'),
  codeDomain('soil_horizon_type', 30),
  codeDomain('soil_horizon_suffix'),
  codeDomain('soil_hue', 5),
  codeDomain('structural_class'),
  idDomain('structural_group'),
  // Own reference file; each organization also carries its type
  { name: 'organization', field: 'organization', table: 'organization', keyColumn: 'organization_id', labelColumn: 'organization', keyKind: 'id', labelLength: 120 },
] as const satisfies readonly VocabularyDomain[]

export type DomainName = typeof VOCABULARY_DOMAINS[number]['name']

const byName = new Map<string, VocabularyDomain>(VOCABULARY_DOMAINS.map(d => [d.name, d]))
const byField = new Map<string, VocabularyDomain>(VOCABULARY_DOMAINS.map(d => [d.field, d]))

export function getDomain(name: DomainName): VocabularyDomain {
  const domain = byName.get(name)
  if (!domain) throw new Error(`Unknown vocabulary domain ${name}`)
  return domain
}

export const isDomainName = (value: string): value is DomainName => byName.has(value)

export const domainForField = (field: string): VocabularyDomain | undefined => byField.get(field)
