/**
 * Remote job watcher
 *
 * Fixed-interval polling of a remote job until it reports one of the
 * caller's terminal statuses. There is no iteration bound, no backoff and
 * no cancellation: the loop ends on a terminal status, on the first failed
 * poll, or when the process is killed.
 */

import { getLogger, TransportError, ValidationError } from '@lenslab/shared'
import type {
  JobHandle,
  JobSource,
  JobStatus,
  TerminalStatuses,
  WatchOptions,
  WatchOutcome,
} from './types'

const log = getLogger('job-watcher')

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Reject a terminal set that could never end a watch cleanly. Callers that
 * start remote work before watching run this first.
 */
export function checkTerminalStatuses(terminal: TerminalStatuses): void {
  if (terminal.success.length === 0) {
    throw new ValidationError('At least one success status is required')
  }
  const overlap = terminal.success.filter((s) => terminal.failure.includes(s))
  if (overlap.length > 0) {
    throw new ValidationError(
      `Statuses cannot be both success and failure: ${overlap.join(', ')}`,
      { overlap },
    )
  }
}

export class JobWatcher<TSpec> {
  constructor(private readonly source: JobSource<TSpec>) {}

  async submit(spec: TSpec): Promise<JobHandle> {
    const handle = await this.source.submit(spec)
    log.debug('Job submitted', { jobId: handle.id, status: handle.status })
    return handle
  }

  /**
   * Query the job status once. Anything thrown by the source that is not
   * already a TransportError is wrapped in one.
   */
  async poll(handle: JobHandle): Promise<JobStatus> {
    try {
      return await this.source.poll(handle)
    } catch (error) {
      if (error instanceof TransportError) {
        throw error
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new TransportError(`Polling job ${handle.id} failed: ${reason}`, {
        cause: error,
      })
    }
  }

  /**
   * Poll until a terminal status. The first poll is immediate; each
   * non-terminal status is reported, then the watcher waits `intervalMs`.
   */
  async watch(handle: JobHandle, options: WatchOptions): Promise<WatchOutcome> {
    checkTerminalStatuses(options.terminal)
    const wait = options.sleep ?? sleep
    const { reporter, terminal } = options
    let polls = 0

    while (true) {
      const status = await this.poll(handle)
      polls++
      log.debug('Job polled', { jobId: handle.id, status, polls })

      if (terminal.success.includes(status)) {
        reporter?.completed(status)
        return { kind: 'succeeded', jobId: handle.id, status, polls }
      }

      if (terminal.failure.includes(status)) {
        reporter?.failed(status)
        return { kind: 'failed', jobId: handle.id, status, polls }
      }

      reporter?.progress(status)
      await wait(options.intervalMs)
    }
  }
}
