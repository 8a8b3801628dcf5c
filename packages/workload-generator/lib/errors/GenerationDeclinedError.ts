import { BenchToolErrorCodes } from '@bench-tools/core'
import { InternalError } from '@lokalise/node-core'

export class GenerationDeclinedError extends InternalError {
  constructor(numPartitions: number) {
    super({
      message: 'Workload generation was declined, no files were written',
      errorCode: BenchToolErrorCodes.GENERATION_DECLINED,
      details: { numPartitions },
    })
    this.name = 'GenerationDeclinedError'
  }
}
