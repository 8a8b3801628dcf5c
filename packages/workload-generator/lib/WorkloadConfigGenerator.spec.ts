import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  InputFileNotFoundError,
  InvalidConfigurationError,
  OutputWriteError,
} from '@bench-tools/core'
import { FakeLogger } from '@bench-tools/core/testing'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { buildRequest, expectedWorkloadFile } from '../test/testUtils.ts'
import { autoConfirm } from './confirmation.ts'
import { renderWorkloadConfigs, WorkloadConfigGenerator } from './WorkloadConfigGenerator.ts'
import { planPartitions } from './partitionPlan.ts'

describe('WorkloadConfigGenerator', () => {
  let outputDir: string
  let logger: FakeLogger

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'bench-workload-'))
    logger = new FakeLogger()
  })

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true })
  })

  it('writes one rendered file per partition', async () => {
    const outputPathPrefix = join(outputDir, 'workload')
    const confirm = vi.fn(autoConfirm)
    const generator = new WorkloadConfigGenerator({ logger, confirm })

    const result = await generator.generate(buildRequest({ outputPathPrefix }))

    expect(confirm).toHaveBeenCalledWith({ numPartitions: 4, outputPathPrefix })
    expect(result).toEqual({
      status: 'generated',
      plan: planPartitions(100, 30),
      files: [0, 1, 2, 3].map((index) => `${outputPathPrefix}_${index}`),
    })
    expect(await readFile(`${outputPathPrefix}_0`, 'utf8')).toBe(expectedWorkloadFile(0))
    expect(await readFile(`${outputPathPrefix}_3`, 'utf8')).toBe(expectedWorkloadFile(90))
    expect(logger.loggedAt('info')).toContainEqual({
      message: 'Workload files generated',
      fileCount: 4,
    })
  })

  it('validates the request before reading the template or asking for confirmation', async () => {
    const confirm = vi.fn(autoConfirm)
    const generator = new WorkloadConfigGenerator({ logger, confirm })

    await expect(
      generator.generate(
        buildRequest({
          recordCount: 10,
          insertCountPerPartition: 50,
          templatePath: join(outputDir, 'missing.template'),
          outputPathPrefix: join(outputDir, 'workload'),
        }),
      ),
    ).rejects.toBeInstanceOf(InvalidConfigurationError)
    expect(confirm).not.toHaveBeenCalled()
    expect(await readdir(outputDir)).toEqual([])
  })

  it('writes nothing when the operator declines', async () => {
    const generator = new WorkloadConfigGenerator({
      logger,
      confirm: () => Promise.resolve(false),
    })

    const result = await generator.generate(
      buildRequest({ outputPathPrefix: join(outputDir, 'workload') }),
    )

    expect(result).toEqual({ status: 'declined', plan: planPartitions(100, 30) })
    expect(await readdir(outputDir)).toEqual([])
  })

  it('fails with InputFileNotFoundError when the template is missing', async () => {
    const confirm = vi.fn(autoConfirm)
    const generator = new WorkloadConfigGenerator({ logger, confirm })

    await expect(
      generator.generate(buildRequest({ templatePath: join(outputDir, 'missing.template') })),
    ).rejects.toBeInstanceOf(InputFileNotFoundError)
    expect(confirm).not.toHaveBeenCalled()
  })

  it('stops at the first partition that cannot be written', async () => {
    const outputPathPrefix = join(outputDir, 'workload')
    await mkdir(`${outputPathPrefix}_1`)
    const generator = new WorkloadConfigGenerator({ logger, confirm: autoConfirm })

    await expect(generator.generate(buildRequest({ outputPathPrefix }))).rejects.toMatchObject({
      errorCode: 'OUTPUT_WRITE_FAILED',
      details: { filePath: `${outputPathPrefix}_1` },
    })
    expect((await readdir(outputDir)).sort()).toEqual(['workload_0', 'workload_1'])
  })

  it('raises OutputWriteError when the output directory does not exist', async () => {
    const generator = new WorkloadConfigGenerator({ logger, confirm: autoConfirm })

    await expect(
      generator.generate(buildRequest({ outputPathPrefix: join(outputDir, 'absent', 'workload') })),
    ).rejects.toBeInstanceOf(OutputWriteError)
  })

  it('warns about template parameters it cannot fill', async () => {
    const templatePath = join(outputDir, 'custom.template')
    await writeFile(templatePath, 'insertstart={{insertstart}}\nbatchsize={{batchsize}}\n')
    const generator = new WorkloadConfigGenerator({ logger, confirm: autoConfirm })

    await generator.generate(
      buildRequest({ templatePath, outputPathPrefix: join(outputDir, 'workload') }),
    )

    expect(logger.loggedAt('warn')).toEqual([
      {
        message: 'Template references parameters that will render empty',
        templatePath,
        placeholders: ['batchsize'],
      },
    ])
    expect(await readFile(join(outputDir, 'workload_2'), 'utf8')).toBe(
      'insertstart=60\nbatchsize=\n',
    )
  })
})

describe('renderWorkloadConfigs', () => {
  it('renders partitions in order with their offsets', () => {
    const request = buildRequest({ outputPathPrefix: 'out/workload' })
    const plan = planPartitions(100, 30)

    const rendered = [...renderWorkloadConfigs('{{insertstart}}+{{insertcount}}', request, plan)]

    expect(rendered.map(({ path, content }) => ({ path, content }))).toEqual([
      { path: 'out/workload_0', content: '0+30' },
      { path: 'out/workload_1', content: '30+30' },
      { path: 'out/workload_2', content: '60+30' },
      { path: 'out/workload_3', content: '90+30' },
    ])
  })
})
