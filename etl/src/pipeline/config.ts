import type { PipelineStep } from './types.js'
import { runTaxonomyStep } from './steps/taxonomy.js'
import { runVocabularyStep } from './steps/vocabulary.js'
import { runCombineStep } from './steps/combine.js'
import { runReportStep } from './steps/report.js'
import { runEmitStep } from './steps/emit.js'
import { runLoadStep } from './steps/load.js'
import { runVerifyStep } from './steps/verify.js'

export const pipelineSteps: PipelineStep[] = [
  {
    id: 'taxonomy',
    name: 'Build taxonomy',
    description: 'Build the taxon concept store, check the release and write the taxonomy tables',
    run: runTaxonomyStep,
  },
  {
    id: 'vocabulary',
    name: 'Load vocabularies',
    description: 'Read the database dictionary, organizations and label aliases',
    run: runVocabularyStep,
  },
  {
    id: 'combine',
    name: 'Combine project tables',
    description: 'Normalize every included project table, resolve names and check the batch',
    run: runCombineStep,
    dependencies: ['taxonomy', 'vocabulary'],
  },
  {
    id: 'report',
    name: 'Write problem reports',
    description: 'Write unresolved names and excluded names',
    run: runReportStep,
    dependencies: ['combine'],
  },
  {
    id: 'emit',
    name: 'Write tables and SQL',
    description: 'Write normalized CSV per table and the insert script',
    run: runEmitStep,
    dependencies: ['combine'],
  },
  {
    id: 'load',
    name: 'Load destination',
    description: 'Write the batch into the destination database in one transaction',
    run: runLoadStep,
    dependencies: ['combine'],
  },
  {
    id: 'verify',
    name: 'Verify load',
    description: 'Compare destination row counts with the batch and re-check the taxonomy',
    run: runVerifyStep,
    dependencies: ['load'],
  },
]

// Steps run by `build`; loading is opt-in
export const BUILD_STEPS = ['taxonomy', 'vocabulary', 'combine', 'report', 'emit']
export const LOAD_STEPS = [...BUILD_STEPS, 'load', 'verify']
// Steps run by `validate`; dependencies are added by the runner
export const VALIDATE_STEPS = ['combine', 'report']
