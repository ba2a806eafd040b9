import { getLogger, JobFailedError } from '@lenslab/shared'
import { IterationJobSource } from './iteration-source'
import { createLineReporter } from './reporter'
import {
  type JobStatus,
  type Output,
  type TerminalStatuses,
  TRAINING_TERMINAL_STATUSES,
} from './types'
import type { TrainingContext } from './uploads'
import { checkTerminalStatuses, JobWatcher } from './watcher'

const log = getLogger('train')

export interface PublishTarget {
  publishName: string
  predictionResourceId: string
}

export interface TrainModelOptions {
  intervalMs: number
  terminal?: TerminalStatuses
  publish?: PublishTarget
  out: Output
  sleep?: (ms: number) => Promise<void>
}

export interface TrainedModel {
  iterationId: string
  status: JobStatus
  polls: number
  publishedAs?: string
}

/**
 * Train the project and block until the iteration reaches a terminal
 * status. A failure status becomes a JobFailedError.
 */
export async function trainModel(
  ctx: TrainingContext,
  options: TrainModelOptions,
): Promise<TrainedModel> {
  const { out } = options
  const terminal = options.terminal ?? TRAINING_TERMINAL_STATUSES
  checkTerminalStatuses(terminal)

  const watcher = new JobWatcher(new IterationJobSource(ctx.client))
  const handle = await watcher.submit(ctx.project)
  const outcome = await watcher.watch(handle, {
    intervalMs: options.intervalMs,
    terminal,
    reporter: createLineReporter(out),
    sleep: options.sleep,
  })

  if (outcome.kind === 'failed') {
    throw new JobFailedError(outcome.jobId, outcome.status)
  }

  const trained: TrainedModel = {
    iterationId: outcome.jobId,
    status: outcome.status,
    polls: outcome.polls,
  }

  if (options.publish) {
    const { publishName, predictionResourceId } = options.publish
    await ctx.client.publishIteration(
      ctx.project.id,
      outcome.jobId,
      publishName,
      predictionResourceId,
    )
    out(`Published iteration as ${publishName}`)
    trained.publishedAs = publishName
  }

  log.debug('Model trained', { ...trained })
  return trained
}
