import path from 'path'
import { fileURLToPath } from 'url'
import { readFileSync, existsSync } from 'fs'

// Find workspace root by looking for a package.json with a "workspaces" field
const findWorkspaceRoot = (startDir: string): string => {
  let current = startDir
  while (current !== '/' && current !== '') {
    const packageJsonPath = path.join(current, 'package.json')
    if (existsSync(packageJsonPath)) {
      const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'))
      if (typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg) {
        return current
      }
    }

    const parent = path.dirname(current)
    if (parent === current) break // Reached root
    current = parent
  }
  throw new Error('Workspace root not found')
}

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const workspaceRoot = findWorkspaceRoot(__dirname)

export const PATHS = {
  workspaceRoot,

  // Reference data (curated, rebuilt once per release)
  taxonomy: 'data/reference/taxonomy.csv',
  citations: 'data/reference/citations.csv',
  dictionary: 'data/reference/database_dictionary.csv',
  organization: 'data/reference/organization.csv',
  overrides: 'data/reference/name_overrides.csv',
  aliases: 'data/reference/vocabulary_aliases.json',

  // Plot data
  plotsRoot: 'data/plots',
  projectList: 'data/plots/included_projects.json',

  // Build outputs
  buildRoot: 'etl/build',
  keyRegistry: 'etl/build/taxonomy/key-registry.json',
  sqlite: 'etl/build/database/plots.dev.sqlite',
} as const

// Helper function to resolve paths relative to workspace root
export const resolvePath = (relativePath: string): string => {
  return path.isAbsolute(relativePath) ? relativePath : path.join(workspaceRoot, relativePath)
}
