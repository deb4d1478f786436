export * from './errors.js'
export * from './csv.js'
export * from './keys.js'

export * from './taxonomy/source.js'
export * from './taxonomy/codes.js'
export * from './taxonomy/hierarchy.js'
export * from './taxonomy/store.js'
export * from './taxonomy/overrides.js'
export * from './taxonomy/resolver.js'

export * from './vocabulary/domains.js'
export * from './vocabulary/nodata.js'
export * from './vocabulary/normalizer.js'

export * from './tables/schema.js'
export * from './tables/normalize.js'
export * from './tables/sources.js'
export * from './tables/geo.js'
export * from './tables/batch.js'

export * from './load/sql.js'
export * from './load/destination.js'
export * from './load/retry.js'
export * from './load/loader.js'
export * from './load/verify.js'
export * from './load/sqlite-destination.js'
export * from './load/pg-destination.js'

export * from './pipeline/context.js'
export * from './pipeline/runner.js'
export { pipelineSteps, BUILD_STEPS, LOAD_STEPS, VALIDATE_STEPS } from './pipeline/config.js'
export type { PipelineStep, BuildReport } from './pipeline/types.js'
