import { readTextFile, writeTextFile } from '@bench-tools/core'
import type { CommonLogger } from '@lokalise/node-core'

import { planPartitions } from './partitionPlan.ts'
import { findUnresolvedPlaceholders, renderTemplate } from './templateRenderer.ts'
import type {
  ConfirmGeneration,
  GenerationRequest,
  GenerationResult,
  PartitionPlan,
  RenderedConfig,
} from './types.ts'
import { buildWorkloadContext } from './workloadContext.ts'

export type WorkloadConfigGeneratorDependencies = {
  logger: CommonLogger
  confirm: ConfirmGeneration
}

export function partitionFilePath(outputPathPrefix: string, index: number): string {
  return `${outputPathPrefix}_${index}`
}

/**
 * Renders the template for each partition of the plan, in partition order.
 */
export function* renderWorkloadConfigs(
  template: string,
  request: GenerationRequest,
  plan: PartitionPlan,
): Generator<RenderedConfig, void, undefined> {
  for (const partition of plan.partitions) {
    yield {
      partition,
      path: partitionFilePath(request.outputPathPrefix, partition.index),
      content: renderTemplate(template, buildWorkloadContext(request, partition)),
    }
  }
}

export class WorkloadConfigGenerator {
  private readonly logger: CommonLogger
  private readonly confirm: ConfirmGeneration

  constructor(dependencies: WorkloadConfigGeneratorDependencies) {
    this.logger = dependencies.logger
    this.confirm = dependencies.confirm
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const plan = planPartitions(request.recordCount, request.insertCountPerPartition)
    this.logger.info({
      message: 'Partition plan computed',
      numPartitions: plan.numPartitions,
      recordCount: request.recordCount,
      insertCountPerPartition: request.insertCountPerPartition,
    })

    const template = await readTextFile(request.templatePath)
    this.warnAboutUnresolvedPlaceholders(template, request, plan)

    const confirmed = await this.confirm({
      numPartitions: plan.numPartitions,
      outputPathPrefix: request.outputPathPrefix,
    })
    if (!confirmed) {
      this.logger.info({
        message: 'Workload generation declined',
        numPartitions: plan.numPartitions,
      })
      return { status: 'declined', plan }
    }

    const files: string[] = []
    for (const rendered of renderWorkloadConfigs(template, request, plan)) {
      await writeTextFile(rendered.path, rendered.content)
      files.push(rendered.path)
      this.logger.debug({
        message: 'Workload file written',
        path: rendered.path,
        insertStart: rendered.partition.insertStart,
      })
    }

    this.logger.info({ message: 'Workload files generated', fileCount: files.length })
    return { status: 'generated', plan, files }
  }

  private warnAboutUnresolvedPlaceholders(
    template: string,
    request: GenerationRequest,
    plan: PartitionPlan,
  ) {
    const [firstPartition] = plan.partitions
    if (!firstPartition) {
      return
    }

    const unresolved = findUnresolvedPlaceholders(
      template,
      buildWorkloadContext(request, firstPartition),
    )
    if (unresolved.length > 0) {
      this.logger.warn({
        message: 'Template references parameters that will render empty',
        templatePath: request.templatePath,
        placeholders: unresolved,
      })
    }
  }
}
