import 'dotenv/config'
import { z } from 'zod'
import { PATHS, resolvePath } from './paths.js'

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // Curated reference data
  TAXONOMY_PATH: z.string().default(resolvePath(PATHS.taxonomy)),
  CITATIONS_PATH: z.string().default(resolvePath(PATHS.citations)),
  DICTIONARY_PATH: z.string().default(resolvePath(PATHS.dictionary)),
  ORGANIZATION_PATH: z.string().default(resolvePath(PATHS.organization)),
  OVERRIDES_PATH: z.string().default(resolvePath(PATHS.overrides)),
  ALIASES_PATH: z.string().default(resolvePath(PATHS.aliases)),
  // Plot data
  DATA_ROOT: z.string().default(resolvePath(PATHS.plotsRoot)),
  PROJECT_LIST_PATH: z.string().default(resolvePath(PATHS.projectList)),
  // Outputs
  OUTPUT_DIR: z.string().default(resolvePath(PATHS.buildRoot)),
  KEY_REGISTRY_PATH: z.string().default(resolvePath(PATHS.keyRegistry)),
  // Destinations: DATABASE_URL wins over SQLITE_PATH when both are set
  DATABASE_URL: z.string().url().optional(),
  SQLITE_PATH: z.string().default(resolvePath(PATHS.sqlite)),
  LOAD_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  LOAD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  LOAD_CHUNK_SIZE: z.coerce.number().int().min(1).max(5000).default(500),
})

export type Env = z.infer<typeof schema>

export const env: Env = schema.parse(process.env)

export { PATHS, resolvePath } from './paths.js'
