export {
  WorkloadConfigGenerator,
  partitionFilePath,
  renderWorkloadConfigs,
} from './lib/WorkloadConfigGenerator.ts'
export type { WorkloadConfigGeneratorDependencies } from './lib/WorkloadConfigGenerator.ts'
export { planPartitions } from './lib/partitionPlan.ts'
export { buildWorkloadContext, WORKLOAD_DEFAULTS } from './lib/workloadContext.ts'
export type { WorkloadContext } from './lib/workloadContext.ts'
export { findUnresolvedPlaceholders, renderTemplate } from './lib/templateRenderer.ts'
export type { TemplateContext } from './lib/templateRenderer.ts'
export { autoConfirm, createConsoleConfirmation } from './lib/confirmation.ts'
export type { ConsoleConfirmationOptions } from './lib/confirmation.ts'
export { GenerationDeclinedError } from './lib/errors/GenerationDeclinedError.ts'
export {
  GENERATE_OPTIONS_SCHEMA,
  parseGenerateArgs,
  toGenerationRequest,
} from './lib/cliOptions.ts'
export type { GenerateOptions } from './lib/cliOptions.ts'
export type {
  ConfirmationRequest,
  ConfirmGeneration,
  GenerationRequest,
  GenerationResult,
  Partition,
  PartitionPlan,
  RenderedConfig,
} from './lib/types.ts'
