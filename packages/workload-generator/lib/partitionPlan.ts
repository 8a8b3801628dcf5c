import { InvalidConfigurationError } from '@bench-tools/core'

import type { PartitionPlan } from './types.ts'

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidConfigurationError({
      message: `${name} must be a positive integer`,
      details: { [name]: value },
    })
  }
}

/**
 * Splits `recordCount` records into slices of `insertCountPerPartition`.
 * The last slice keeps the full insert count even when it reaches past `recordCount`.
 */
export function planPartitions(recordCount: number, insertCountPerPartition: number): PartitionPlan {
  assertPositiveInteger('recordCount', recordCount)
  assertPositiveInteger('insertCountPerPartition', insertCountPerPartition)

  if (recordCount < insertCountPerPartition) {
    throw new InvalidConfigurationError({
      message: 'Record count must not be smaller than the insert count per partition',
      details: { recordCount, insertCountPerPartition },
    })
  }

  const numPartitions = Math.ceil(recordCount / insertCountPerPartition)
  const partitions = Array.from({ length: numPartitions }, (_, index) => ({
    index,
    insertStart: index * insertCountPerPartition,
    insertCount: insertCountPerPartition,
  }))

  return { numPartitions, partitions }
}
