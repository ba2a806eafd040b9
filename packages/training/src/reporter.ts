import type { JobStatus, Output, WatchReporter } from './types'

export interface LineReporterMessages {
  completed?: string
  failed?: (status: JobStatus) => string
}

/**
 * One line per non-terminal status ("Training ..."), then a completion or
 * failure line.
 */
export function createLineReporter(
  write: Output = (line) => console.log(line),
  messages: LineReporterMessages = {},
): WatchReporter {
  const completed = messages.completed ?? 'Model trained!'
  const failed =
    messages.failed ??
    ((status: JobStatus) => `Training failed with status ${status}`)

  return {
    progress: (status) => write(`${status} ...`),
    completed: () => write(completed),
    failed: (status) => write(failed(status)),
  }
}
