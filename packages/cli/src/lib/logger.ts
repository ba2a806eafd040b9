/**
 * Console output for commands
 *
 * Command results go to stdout, failures to stderr. Structured
 * diagnostics from the packages stay on pino (see @lenslab/shared).
 */

import { resetLogLevel, setLogLevel } from '@lenslab/shared'
import chalk from 'chalk'

export interface ConsoleWriter {
  out: (line: string) => void
  err: (line: string) => void
}

export interface CliLoggerConfig {
  verbose?: boolean
  silent?: boolean
}

export interface CliLogger {
  configure: (config: CliLoggerConfig) => void
  /** Plain result line; suppressed by --quiet */
  line: (message: string) => void
  /** Always printed */
  error: (message: string) => void
  debug: (message: string) => void
}

const consoleWriter: ConsoleWriter = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

export function createCliLogger(writer: ConsoleWriter = consoleWriter): CliLogger {
  let verbose = false
  let silent = false

  return {
    configure(config) {
      verbose = config.verbose ?? false
      silent = config.silent ?? false
      if (verbose) {
        setLogLevel('debug')
      } else if (silent) {
        setLogLevel('error')
      } else {
        resetLogLevel()
      }
    },
    line(message) {
      if (!silent) writer.out(message)
    },
    error(message) {
      writer.err(chalk.red(message))
    },
    debug(message) {
      if (verbose) writer.err(chalk.dim(message))
    },
  }
}

export const logger = createCliLogger()
