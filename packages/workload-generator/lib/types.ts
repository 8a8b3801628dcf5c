export type GenerationRequest = {
  recordCount: number
  operationCount: number
  insertCountPerPartition: number
  /**
   * Comma separated host list, passed to the template as is
   */
  hosts: string
  threadCount: number
  templatePath: string
  outputPathPrefix: string
}

export type Partition = {
  index: number
  insertStart: number
  insertCount: number
}

export type PartitionPlan = {
  numPartitions: number
  partitions: Partition[]
}

export type RenderedConfig = {
  partition: Partition
  path: string
  content: string
}

export type GenerationResult =
  | {
      status: 'generated'
      plan: PartitionPlan
      files: string[]
    }
  | {
      status: 'declined'
      plan: PartitionPlan
    }

export type ConfirmationRequest = {
  numPartitions: number
  outputPathPrefix: string
}

/**
 * Asks the operator whether the planned files should be written.
 * Resolving to false cancels the generation before anything is written.
 */
export type ConfirmGeneration = (request: ConfirmationRequest) => Promise<boolean>
