import type { Cell, ElementType } from '@vegplot/shared'
import { VOCABULARY_DOMAINS, getDomain, type DomainName } from '../vocabulary/domains.js'
import { NON_NEGATIVE, PERCENT, assertExcludesNodata, type NumericDomain } from '../vocabulary/nodata.js'

export type ColumnType =
  | { kind: 'text'; max: number }
  | { kind: 'integer'; domain: NumericDomain }
  | { kind: 'decimal'; domain: NumericDomain }
  | { kind: 'boolean' }
  | { kind: 'date' }
  // input 'label' maps a label to its key, 'key' checks a value that already is one
  // elementTypes limits ground_element keys to elements of those types
  | { kind: 'vocabulary'; domain: DomainName; input: 'label' | 'key'; elementTypes?: readonly ElementType[] }
  | { kind: 'taxon' }

export interface ColumnSpec {
  name: string
  type: ColumnType
  nullable: boolean
  // NOT NULL DEFAULT -999
  nodata?: boolean
  // Column name in the combined source table, when it differs
  source?: string
  // Stands in for a missing cell before the nullability check
  whenMissing?: Cell
  references?: { table: string; column: string }
}

export type TableGroup = 'vocabulary' | 'taxonomy' | 'project' | 'site' | 'site_visit' | 'observation' | 'environment' | 'soil'

export interface TableSpec {
  name: string
  group: TableGroup
  columns: ColumnSpec[]
  primaryKey?: string[]
  // Generated surrogate id, never written by the loader
  serial?: string
  unique?: string[][]
  checks?: Array<{ name: string; sql: string }>
  // File name prefix of the per-project source table
  source?: string
  // Older schema vintages: old column name -> current name
  renames?: Record<string, string>
}

type ColumnOptions = Partial<Pick<ColumnSpec, 'nullable' | 'nodata' | 'source' | 'whenMissing' | 'references'>>

const text = (name: string, max: number, o: ColumnOptions = {}): ColumnSpec =>
  ({ name, type: { kind: 'text', max }, nullable: false, ...o })
const integer = (name: string, domain: NumericDomain, o: ColumnOptions = {}): ColumnSpec =>
  ({ name, type: { kind: 'integer', domain: { ...domain, integer: true } }, nullable: false, ...o })
const decimal = (name: string, domain: NumericDomain, o: ColumnOptions = {}): ColumnSpec =>
  ({ name, type: { kind: 'decimal', domain }, nullable: false, ...o })
const bool = (name: string, o: ColumnOptions = {}): ColumnSpec =>
  ({ name, type: { kind: 'boolean' }, nullable: false, ...o })
const date = (name: string, o: ColumnOptions = {}): ColumnSpec =>
  ({ name, type: { kind: 'date' }, nullable: false, ...o })

// NOT NULL measurement stored as -999 when missing
const measure = (name: string, domain: NumericDomain, whole = false): ColumnSpec =>
  (whole ? integer(name, domain, { nodata: true }) : decimal(name, domain, { nodata: true }))

type VocabOptions = ColumnOptions & { input?: 'label' | 'key'; elementTypes?: readonly ElementType[] }

function vocab(name: string, domainName: DomainName, o: VocabOptions = {}): ColumnSpec {
  const domain = getDomain(domainName)
  const { input = 'label', elementTypes, ...rest } = o
  return {
    name,
    type: { kind: 'vocabulary', domain: domainName, input, elementTypes },
    nullable: false,
    references: { table: domain.table, column: domain.keyColumn },
    ...rest,
  }
}

const taxon = (name: string): ColumnSpec =>
  ({ name, type: { kind: 'taxon' }, nullable: false, references: { table: 'taxon_all', column: 'taxon_code' } })

const siteVisitRef = (): ColumnSpec =>
  text('site_visit_code', 65, { references: { table: 'site_visit', column: 'site_visit_code' } })

const YEAR: NumericDomain = { min: 1900, max: 2100 }
const DEPTH_CM: NumericDomain = { min: 0, max: 999 }
const MUNSELL_VALUE: NumericDomain = { min: 0, max: 10 }
const MUNSELL_CHROMA: NumericDomain = { min: 0, max: 8 }

// Renamed in every vintage after the first
const SITE_VISIT_ID = { site_visit_id: 'site_visit_code' }

// --- Controlled vocabularies -------------------------------------------------

export const VOCABULARY_TABLES: TableSpec[] = VOCABULARY_DOMAINS.map((domain): TableSpec => {
  const key: ColumnSpec = domain.keyKind === 'code'
    ? text(domain.keyColumn, 10)
    : integer(domain.keyColumn, { min: 1 })
  const columns = [key, text(domain.labelColumn, domain.labelLength)]
  if (domain.name === 'organization') {
    columns.push(integer('organization_type_id', { min: 1 }, {
      references: { table: 'organization_type', column: 'organization_type_id' },
    }))
  }
  const spec: TableSpec = {
    name: domain.table,
    group: 'vocabulary',
    columns,
    primaryKey: [domain.keyColumn],
    unique: [[domain.labelColumn]],
  }
  if (domain.name === 'ground_element') {
    columns.push(text('element_type', 10))
    spec.checks = [{ name: 'element_type_values', sql: "element_type IN ('abiotic', 'ground', 'both')" }]
  }
  return spec
})

// --- Taxonomy ----------------------------------------------------------------

const constraintTable = (name: string, max: number, extra: ColumnSpec[] = []): TableSpec => ({
  name,
  group: 'taxonomy',
  columns: [integer(`${name}_id`, { min: 1 }), text(name, max), ...extra],
  primaryKey: [`${name}_id`],
  unique: [[name]],
})

export const TAXONOMY_TABLES: TableSpec[] = [
  constraintTable('taxon_author', 120),
  constraintTable('taxon_category', 30),
  constraintTable('taxon_family', 80),
  constraintTable('taxon_habit', 80),
  constraintTable('taxon_status', 30),
  constraintTable('taxon_level', 30),
  constraintTable('taxon_source', 50, [text('taxon_citation', 500)]),
  {
    name: 'taxon_hierarchy',
    group: 'taxonomy',
    columns: [
      text('taxon_genus_code', 15),
      integer('taxon_family_id', { min: 1 }, { references: { table: 'taxon_family', column: 'taxon_family_id' } }),
      integer('taxon_category_id', { min: 1 }, { references: { table: 'taxon_category', column: 'taxon_category_id' } }),
    ],
    primaryKey: ['taxon_genus_code'],
  },
  {
    name: 'taxon_accepted',
    group: 'taxonomy',
    columns: [
      text('taxon_accepted_code', 15),
      text('taxon_genus_code', 15, { references: { table: 'taxon_hierarchy', column: 'taxon_genus_code' } }),
      integer('taxon_source_id', { min: 1 }, { nullable: true, references: { table: 'taxon_source', column: 'taxon_source_id' } }),
      text('taxon_link', 255, { nullable: true }),
      integer('taxon_level_id', { min: 1 }, { references: { table: 'taxon_level', column: 'taxon_level_id' } }),
      integer('taxon_habit_id', { min: 1 }, { references: { table: 'taxon_habit', column: 'taxon_habit_id' } }),
      bool('taxon_native'),
      bool('taxon_non_native'),
    ],
    primaryKey: ['taxon_accepted_code'],
  },
  {
    name: 'taxon_all',
    group: 'taxonomy',
    columns: [
      text('taxon_code', 15),
      text('taxon_name', 120),
      integer('taxon_author_id', { min: 1 }, { references: { table: 'taxon_author', column: 'taxon_author_id' } }),
      integer('taxon_status_id', { min: 1 }, { references: { table: 'taxon_status', column: 'taxon_status_id' } }),
      text('taxon_accepted_code', 15, { references: { table: 'taxon_accepted', column: 'taxon_accepted_code' } }),
    ],
    primaryKey: ['taxon_code'],
    // Homonyms are kept apart by their authors
    unique: [['taxon_name', 'taxon_author_id']],
  },
]

// --- Plot data ---------------------------------------------------------------

export const PLOT_TABLES: TableSpec[] = [
  {
    name: 'project',
    group: 'project',
    source: '01_project',
    columns: [
      text('project_code', 30),
      text('project_name', 250),
      vocab('originator_id', 'organization', { source: 'originator' }),
      vocab('funder_id', 'organization', { source: 'funder' }),
      vocab('manager_id', 'personnel', { source: 'manager' }),
      vocab('completion_id', 'completion', { source: 'completion' }),
      integer('year_start', YEAR),
      integer('year_end', YEAR, { nullable: true }),
      text('project_description', 500),
      bool('private'),
    ],
    primaryKey: ['project_code'],
    unique: [['project_name']],
  },
  {
    name: 'site',
    group: 'site',
    source: '02_site',
    renames: { establishing_project: 'establishing_project_code' },
    columns: [
      text('site_code', 50),
      text('establishing_project_code', 30, { references: { table: 'project', column: 'project_code' } }),
      vocab('perspective_id', 'perspective', { source: 'perspective' }),
      vocab('cover_method_id', 'cover_method', { source: 'cover_method' }),
      vocab('plot_dimensions_id', 'plot_dimensions', { source: 'plot_dimensions_m' }),
      vocab('h_datum_epsg', 'h_datum', { source: 'h_datum' }),
      decimal('latitude_dd', { min: -90, max: 90 }),
      decimal('longitude_dd', { min: -180, max: 180 }),
      measure('h_error_m', NON_NEGATIVE),
      vocab('positional_accuracy_id', 'positional_accuracy', { source: 'positional_accuracy' }),
      vocab('location_type_id', 'location_type', { source: 'location_type' }),
    ],
    primaryKey: ['site_code'],
    checks: [
      { name: 'latitude_limit', sql: 'latitude_dd >= 50.4 AND latitude_dd <= 71.6' },
      { name: 'longitude_limit', sql: '(longitude_dd >= -179.99 AND longitude_dd <= -130) OR longitude_dd > 172' },
    ],
  },
  {
    name: 'site_visit',
    group: 'site_visit',
    source: '03_sitevisit',
    renames: { ...SITE_VISIT_ID, homogenous: 'homogeneous' },
    columns: [
      text('site_visit_code', 65),
      text('project_code', 30, { references: { table: 'project', column: 'project_code' } }),
      text('site_code', 50, { references: { table: 'site', column: 'site_code' } }),
      vocab('data_tier_id', 'data_tier', { source: 'data_tier' }),
      vocab('scope_vascular_id', 'scope', { source: 'scope_vascular' }),
      vocab('scope_bryophyte_id', 'scope', { source: 'scope_bryophyte' }),
      vocab('scope_lichen_id', 'scope', { source: 'scope_lichen' }),
      date('observe_date'),
      vocab('veg_observer_id', 'personnel', { source: 'veg_observer' }),
      vocab('veg_recorder_id', 'personnel', { source: 'veg_recorder', nullable: true }),
      vocab('env_observer_id', 'personnel', { source: 'env_observer', nullable: true }),
      vocab('soils_observer_id', 'personnel', { source: 'soils_observer', nullable: true }),
      vocab('structural_class_code', 'structural_class', { source: 'structural_class' }),
      bool('homogeneous'),
    ],
    primaryKey: ['site_visit_code'],
  },
  {
    name: 'vegetation_cover',
    group: 'observation',
    source: '05_vegetationcover',
    renames: SITE_VISIT_ID,
    serial: 'vegetation_cover_id',
    columns: [
      siteVisitRef(),
      vocab('cover_type_id', 'cover_type', { source: 'cover_type' }),
      text('name_original', 120),
      taxon('code_adjudicated'),
      decimal('cover_percent', PERCENT),
      bool('dead_status'),
    ],
    unique: [['site_visit_code', 'cover_type_id', 'name_original', 'code_adjudicated', 'dead_status']],
  },
  {
    name: 'abiotic_top_cover',
    group: 'observation',
    source: '06_abiotictopcover',
    renames: { ...SITE_VISIT_ID, ground_element: 'abiotic_element' },
    serial: 'abiotic_cover_id',
    columns: [
      siteVisitRef(),
      vocab('abiotic_element_code', 'ground_element', { source: 'abiotic_element', elementTypes: ['abiotic', 'both'] }),
      decimal('abiotic_top_cover_percent', PERCENT),
    ],
    unique: [['site_visit_code', 'abiotic_element_code']],
    checks: [{ name: 'abiotic_percent_range', sql: 'abiotic_top_cover_percent BETWEEN 0 AND 100' }],
  },
  {
    name: 'whole_tussock_cover',
    group: 'observation',
    source: '07_wholetussockcover',
    renames: { ...SITE_VISIT_ID, tussock_percent_cover: 'cover_percent' },
    serial: 'tussock_id',
    columns: [
      siteVisitRef(),
      vocab('cover_type_id', 'cover_type', { source: 'cover_type' }),
      decimal('cover_percent', PERCENT),
    ],
    unique: [['site_visit_code', 'cover_type_id']],
  },
  {
    name: 'ground_cover',
    group: 'observation',
    source: '08_groundcover',
    renames: SITE_VISIT_ID,
    serial: 'ground_cover_id',
    columns: [
      siteVisitRef(),
      vocab('ground_element_code', 'ground_element', { source: 'ground_element' }),
      decimal('ground_cover_percent', PERCENT),
    ],
    unique: [['site_visit_code', 'ground_element_code']],
  },
  {
    name: 'structural_group_cover',
    group: 'observation',
    source: '09_structuralgroupcover',
    renames: { ...SITE_VISIT_ID, structural_cover_percent: 'cover_percent', structural_cover_type: 'cover_type' },
    serial: 'structural_cover_id',
    columns: [
      siteVisitRef(),
      vocab('cover_type_id', 'cover_type', { source: 'cover_type' }),
      vocab('structural_group_id', 'structural_group', { source: 'structural_group' }),
      decimal('cover_percent', PERCENT),
    ],
    unique: [['site_visit_code', 'cover_type_id', 'structural_group_id']],
  },
  {
    name: 'tree_structure',
    group: 'observation',
    source: '10_treestructure',
    renames: SITE_VISIT_ID,
    serial: 'tree_structure_id',
    columns: [
      siteVisitRef(),
      text('name_original', 120),
      taxon('code_adjudicated'),
      vocab('crown_class_id', 'crown_class', { source: 'crown_class' }),
      vocab('height_type_id', 'height_type', { source: 'height_type' }),
      decimal('height_cm', NON_NEGATIVE),
      vocab('cover_type_id', 'cover_type', { source: 'cover_type', nullable: true }),
      decimal('cover_percent', PERCENT, { nullable: true }),
      decimal('mean_dbh_cm', NON_NEGATIVE, { nullable: true }),
      integer('number_stems', NON_NEGATIVE, { nullable: true }),
      integer('mean_tree_age_y', NON_NEGATIVE, { nullable: true }),
      decimal('tree_subplot_area_m2', { above: 0 }, { nullable: true }),
    ],
  },
  {
    name: 'shrub_structure',
    group: 'observation',
    source: '11_shrubstructure',
    renames: SITE_VISIT_ID,
    serial: 'shrub_structure_id',
    columns: [
      siteVisitRef(),
      text('name_original', 120),
      taxon('code_adjudicated'),
      vocab('shrub_class_id', 'shrub_class', { source: 'shrub_class' }),
      vocab('height_type_id', 'height_type', { source: 'height_type' }),
      decimal('height_cm', NON_NEGATIVE),
      vocab('cover_type_id', 'cover_type', { source: 'cover_type', nullable: true }),
      decimal('cover_percent', PERCENT, { nullable: true }),
      decimal('mean_diameter_cm', NON_NEGATIVE, { nullable: true }),
      integer('number_stems', NON_NEGATIVE, { nullable: true }),
      decimal('shrub_subplot_area_m2', { above: 0 }, { nullable: true }),
    ],
  },
  {
    name: 'environment',
    group: 'environment',
    source: '12_environment',
    renames: SITE_VISIT_ID,
    serial: 'environment_id',
    columns: [
      siteVisitRef(),
      vocab('physiography_id', 'physiography', { source: 'physiography', nullable: true }),
      vocab('geomorphology_id', 'geomorphology', { source: 'geomorphology', nullable: true }),
      vocab('macrotopography_id', 'macrotopography', { source: 'macrotopography', nullable: true }),
      vocab('microtopography_id', 'microtopography', { source: 'microtopography', nullable: true }),
      measure('microrelief_cm', DEPTH_CM),
      vocab('drainage_id', 'drainage', { source: 'drainage', nullable: true }),
      vocab('moisture_id', 'moisture', { source: 'moisture_regime', nullable: true }),
      // Negative when water stands above the ground surface
      measure('depth_water_cm', { min: -200, max: 999 }),
      measure('depth_moss_duff_cm', DEPTH_CM),
      measure('depth_restrictive_layer_cm', DEPTH_CM),
      vocab('restrictive_type_id', 'restrictive_type', { source: 'restrictive_type', nullable: true }),
      vocab('disturbance_id', 'disturbance', { source: 'disturbance', nullable: true }),
      vocab('disturbance_severity_id', 'disturbance_severity', { source: 'disturbance_severity', nullable: true }),
      measure('disturbance_time_y', NON_NEGATIVE, true),
      bool('surface_water', { nullable: true }),
      vocab('soil_class_id', 'soil_class', { source: 'soil_class', nullable: true }),
      bool('cryoturbation', { nullable: true }),
      vocab('dominant_texture_40_cm_code', 'soil_texture', { source: 'dominant_texture_40_cm', nullable: true }),
      measure('depth_15_percent_coarse_fragments_cm', DEPTH_CM),
    ],
    unique: [['site_visit_code']],
  },
  {
    name: 'soil_metrics',
    group: 'soil',
    source: '13_soilmetrics',
    renames: SITE_VISIT_ID,
    serial: 'soil_metric_id',
    columns: [
      siteVisitRef(),
      bool('water_measurement', { whenMissing: false }),
      measure('measure_depth_cm', DEPTH_CM),
      measure('ph', { min: 0, max: 14 }),
      measure('conductivity_mus', NON_NEGATIVE),
      measure('temperature_deg_c', { min: -60, max: 60 }),
    ],
    unique: [['site_visit_code', 'water_measurement', 'measure_depth_cm']],
  },
  {
    name: 'soil_horizons',
    group: 'soil',
    source: '14_soilhorizons',
    renames: {
      ...SITE_VISIT_ID,
      depth_upper: 'depth_upper_cm',
      depth_lower: 'depth_lower_cm',
      horizon_primary: 'horizon_primary_code',
      horizon_suffix_1: 'horizon_suffix_1_code',
      horizon_suffix_2: 'horizon_suffix_2_code',
      horizon_secondary: 'horizon_secondary_code',
      horizon_suffix_3: 'horizon_suffix_3_code',
      horizon_suffix_4: 'horizon_suffix_4_code',
      matrix_hue: 'matrix_hue_code',
      nonmatrix_hue: 'nonmatrix_hue_code',
    },
    serial: 'soil_horizon_id',
    columns: [
      siteVisitRef(),
      measure('horizon_order', { min: 1 }, true),
      measure('thickness_cm', DEPTH_CM),
      measure('depth_upper_cm', DEPTH_CM),
      measure('depth_lower_cm', DEPTH_CM),
      bool('depth_extend'),
      vocab('horizon_primary_code', 'soil_horizon_type', { input: 'key', nullable: true }),
      vocab('horizon_suffix_1_code', 'soil_horizon_suffix', { input: 'key', nullable: true }),
      vocab('horizon_suffix_2_code', 'soil_horizon_suffix', { input: 'key', nullable: true }),
      vocab('horizon_secondary_code', 'soil_horizon_type', { input: 'key', nullable: true }),
      vocab('horizon_suffix_3_code', 'soil_horizon_suffix', { input: 'key', nullable: true }),
      vocab('horizon_suffix_4_code', 'soil_horizon_suffix', { input: 'key', nullable: true }),
      vocab('texture_code', 'soil_texture', { source: 'texture', nullable: true }),
      measure('clay_percent', PERCENT),
      measure('total_coarse_fragment_percent', PERCENT),
      measure('gravel_percent', PERCENT),
      measure('cobble_percent', PERCENT),
      measure('stone_percent', PERCENT),
      measure('boulder_percent', PERCENT),
      vocab('structure_code', 'soil_structure', { source: 'structure', nullable: true }),
      vocab('matrix_hue_code', 'soil_hue', { input: 'key', nullable: true }),
      measure('matrix_value', MUNSELL_VALUE),
      measure('matrix_chroma', MUNSELL_CHROMA, true),
      vocab('nonmatrix_feature_code', 'soil_nonmatrix_features', { source: 'nonmatrix_feature', nullable: true }),
      vocab('nonmatrix_hue_code', 'soil_hue', { input: 'key', nullable: true }),
      measure('nonmatrix_value', MUNSELL_VALUE),
      measure('nonmatrix_chroma', MUNSELL_CHROMA, true),
    ],
    unique: [['site_visit_code', 'horizon_order']],
  },
]

// Foreign-key dependency order; every table comes after the tables it references
export const TABLES: readonly TableSpec[] = [
  ...VOCABULARY_TABLES.filter(t => t.name !== 'organization'),
  ...VOCABULARY_TABLES.filter(t => t.name === 'organization'),
  ...TAXONOMY_TABLES,
  ...PLOT_TABLES,
]

export const LOAD_ORDER: readonly string[] = TABLES.map(t => t.name)

const byName = new Map(TABLES.map(t => [t.name, t]))

export function getTable(name: string): TableSpec {
  const spec = byName.get(name)
  if (!spec) throw new Error(`Unknown table ${name}`)
  return spec
}

// Columns the loader writes; serial ids are left to the destination
export const insertColumns = (spec: TableSpec): string[] => spec.columns.map(c => c.name)

export const sourceColumn = (column: ColumnSpec): string => column.source ?? column.name

/** Throws when a numeric domain admits the NODATA value. */
export function checkMeasurementDomains(tables: readonly TableSpec[] = TABLES): void {
  for (const table of tables) {
    for (const column of table.columns) {
      if (column.type.kind === 'integer' || column.type.kind === 'decimal') {
        assertExcludesNodata(`${table.name}.${column.name}`, column.type.domain)
      }
    }
  }
}

checkMeasurementDomains()
