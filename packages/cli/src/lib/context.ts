import {
  type Env,
  loadEnvFile,
  type PredictionSettings,
  type TrainingSettings,
} from '@lenslab/config'
import { toLensLabError } from '@lenslab/shared'
import type { WorkflowResult } from '@lenslab/training'
import {
  createPredictionClient,
  createTrainingClient,
  type PredictionApi,
  type TrainingApi,
} from '@lenslab/vision'
import { type CliLogger, logger } from './logger'

/** Everything a command touches outside its own arguments */
export interface CliContext {
  env: Env
  loadEnv: () => void
  logger: CliLogger
  trainingClient: (settings: TrainingSettings) => TrainingApi
  predictionClient: (settings: PredictionSettings) => PredictionApi
  setExitCode: (code: number) => void
  sleep?: (ms: number) => Promise<void>
}

export function defaultContext(): CliContext {
  return {
    env: process.env,
    loadEnv: () => {
      loadEnvFile()
    },
    logger,
    trainingClient: (settings) =>
      createTrainingClient(settings.endpoint, settings.trainingKey),
    predictionClient: (settings) =>
      createPredictionClient(settings.endpoint, settings.predictionKey),
    setExitCode: (code) => {
      process.exitCode = code
    },
  }
}

/**
 * Run a command body and turn a failed result (or anything it throws while
 * loading settings) into a red error line and exit code 1.
 */
export async function runCommand<T>(
  ctx: CliContext,
  work: () => Promise<WorkflowResult<T>>,
): Promise<T | undefined> {
  let result: WorkflowResult<T>
  try {
    result = await work()
  } catch (error) {
    result = { ok: false, error: toLensLabError(error) }
  }

  if (!result.ok) {
    ctx.logger.error(`Error: ${result.error.message}`)
    ctx.logger.debug(JSON.stringify(result.error.toJSON()))
    ctx.setExitCode(1)
    return undefined
  }
  return result.value
}
