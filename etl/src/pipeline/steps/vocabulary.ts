import { buildVocabulary } from '../../vocabulary/normalizer.js'
import type { PipelineContext } from '../context.js'

export async function runVocabularyStep(ctx: PipelineContext): Promise<string> {
  const { settings } = ctx
  const vocabulary = buildVocabulary({
    dictionaryPath: settings.dictionaryPath,
    organizationPath: settings.organizationPath,
    aliasesPath: settings.aliasesPath,
  })
  const tables = vocabulary.tableRows()
  let terms = 0
  for (const [name, rows] of Object.entries(tables)) {
    ctx.batch.add(name, rows)
    terms += rows.length
  }
  ctx.vocabulary = vocabulary
  return `${terms} terms in ${Object.keys(tables).length} vocabularies`
}
