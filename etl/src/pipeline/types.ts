import type { PipelineContext } from './context.js'

export interface PipelineStep {
  id: string
  name: string
  description: string
  dependencies?: string[]
  // Returns a one-line summary for the spinner
  run(ctx: PipelineContext): Promise<string>
}

export interface BuildReport {
  success: boolean
  startedAt: string
  duration: number
  steps: Array<{
    id: string
    success: boolean
    duration: number
    output?: string
    error?: string
    code?: string
  }>
  summary: {
    taxa: number
    acceptedTaxa: number
    genera: number
    rows: Record<string, number>
    duplicatesDropped: Record<string, number>
    unresolvedNames: number
    excludedNames: number
    loaded?: { destination: string; rows: number }
  }
}
