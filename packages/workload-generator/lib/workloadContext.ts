import type { GenerationRequest, Partition } from './types.ts'

export const WORKLOAD_DEFAULTS = {
  fieldlength: 200,
  fieldcount: 10,
  workload: 'com.yahoo.ycsb.workloads.CoreWorkload',
  readallfields: 'true',
  readproportion: 0.9,
  updateproportion: 0.1,
  scanproportion: 0,
  insertproportion: 0,
  requestdistribution: 'uniform',
  readconsistencylevel: 'QUORUM',
  writeconsistencylevel: 'QUORUM',
} as const

export type WorkloadContext = typeof WORKLOAD_DEFAULTS & {
  recordcount: number
  operationcount: number
  insertstart: number
  insertcount: number
  hosts: string
  threadcount: number
}

export function buildWorkloadContext(
  request: GenerationRequest,
  partition: Partition,
): WorkloadContext {
  return {
    recordcount: request.recordCount,
    operationcount: request.operationCount,
    insertstart: partition.insertStart,
    insertcount: partition.insertCount,
    ...WORKLOAD_DEFAULTS,
    hosts: request.hosts,
    threadcount: request.threadCount,
  }
}
