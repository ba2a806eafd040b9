import type { LensLabError } from '@lenslab/shared'

/**
 * Provider-defined status string. The set is open: anything that is not
 * listed as terminal counts as "still running".
 */
export type JobStatus = string

/**
 * Read handle on a remote job. The watcher never mutates it.
 */
export interface JobHandle {
  id: string
  /** Status reported by the submission call */
  status: JobStatus
  /** Owner of the job (a project id) when the status query needs one */
  parentId?: string
}

/**
 * Remote side of a long-running job: one submission call and one status
 * query. Failures to reach the service are TransportErrors.
 */
export interface JobSource<TSpec> {
  submit(spec: TSpec): Promise<JobHandle>
  poll(handle: JobHandle): Promise<JobStatus>
}

export interface TerminalStatuses {
  success: readonly JobStatus[]
  failure: readonly JobStatus[]
}

export const TRAINING_TERMINAL_STATUSES: TerminalStatuses = {
  success: ['Completed'],
  failure: ['Failed'],
}

export type WatchOutcome =
  | { kind: 'succeeded'; jobId: string; status: JobStatus; polls: number }
  | { kind: 'failed'; jobId: string; status: JobStatus; polls: number }

export interface WatchReporter {
  progress(status: JobStatus): void
  completed(status: JobStatus): void
  failed(status: JobStatus): void
}

export interface WatchOptions {
  intervalMs: number
  terminal: TerminalStatuses
  reporter?: WatchReporter
  /** Replaces the timer between polls (tests) */
  sleep?: (ms: number) => Promise<void>
}

/** Sink for the human-readable lines a workflow prints */
export type Output = (line: string) => void

export type WorkflowResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LensLabError }
