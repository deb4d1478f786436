import { HardFailure } from '../../errors.js'
import { verifyLoad } from '../../load/verify.js'
import { connectDestination, type PipelineContext } from '../context.js'

export class VerificationError extends HardFailure {
  problems: string[]

  constructor(problems: string[]) {
    super('LOAD', `Post-load verification failed:\n  - ${problems.join('\n  - ')}`)
    this.name = 'VerificationError'
    this.problems = problems
  }
}

export async function runVerifyStep(ctx: PipelineContext): Promise<string> {
  const dest = connectDestination(ctx.settings)
  try {
    await dest.open()
    const result = await verifyLoad(dest, ctx.batch)
    if (result.problems.length) throw new VerificationError(result.problems)
    return `${Object.keys(result.counts).length} tables match the batch, taxonomy invariants hold`
  } finally {
    await dest.close()
  }
}
