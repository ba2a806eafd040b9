import { Command, type OutputConfiguration } from 'commander'
import { classifyCommand } from './commands/classify'
import { detectCommand } from './commands/detect'
import { trainCommand } from './commands/train'
import { uploadTaggedCommand } from './commands/upload-tagged'
import { type CliContext, defaultContext } from './lib/context'
import { GlobalOptionsSchema, validate } from './schemas'

export interface ProgramOptions {
  version: string
  context?: CliContext
  /** Where commander writes help and usage errors */
  output?: OutputConfiguration
}

/**
 * Build the command tree. Every command throws a CommanderError instead
 * of exiting on help, version and usage errors.
 */
export function createProgram(options: ProgramOptions): Command {
  const ctx = options.context ?? defaultContext()
  const program = new Command()

  program
    .name('lenslab')
    .description('Train and query image classification and detection models')
    .version(options.version)
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet mode')
    .hook('preAction', (thisCommand) => {
      const opts = validate(thisCommand.opts(), GlobalOptionsSchema, 'options')
      ctx.logger.configure({
        verbose: opts.verbose,
        silent: opts.quiet,
      })
      ctx.loadEnv()
    })

  const commands = [
    trainCommand(ctx),
    uploadTaggedCommand(ctx),
    classifyCommand(ctx),
    detectCommand(ctx),
  ]

  for (const command of [program, ...commands]) {
    command.exitOverride()
    if (options.output) {
      command.configureOutput(options.output)
    }
  }
  for (const command of commands) {
    program.addCommand(command)
  }

  return program
}
