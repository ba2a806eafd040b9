import { loadTrainingSettings } from '@lenslab/config'
import { ConfigError } from '@lenslab/shared'
import {
  type PublishTarget,
  runClassifierTraining,
  TRAINING_TERMINAL_STATUSES,
} from '@lenslab/training'
import { Command } from 'commander'
import { type CliContext, runCommand } from '../lib/context'
import { TrainOptionsSchema, validate } from '../schemas'

export function trainCommand(ctx: CliContext): Command {
  return new Command('train')
    .description('Upload tagged folders of images, then train and wait')
    .argument(
      '[folder]',
      'Folder with one subfolder per tag',
      'more-training-images',
    )
    .option('--interval <ms>', 'Milliseconds between status polls')
    .option(
      '--terminal-failure <status...>',
      'Statuses that end training as failed (default: Failed)',
    )
    .option('--publish <name>', 'Publish the trained iteration under a name')
    .action(async (folder: string, options: unknown) => {
      const report = await runCommand(ctx, async () => {
        const opts = validate(options, TrainOptionsSchema, 'train options')
        const settings = loadTrainingSettings(ctx.env)

        let publish: PublishTarget | undefined
        if (opts.publish) {
          if (!settings.predictionResourceId) {
            throw new ConfigError(['PredictionResourceId'])
          }
          publish = {
            publishName: opts.publish,
            predictionResourceId: settings.predictionResourceId,
          }
        }

        return runClassifierTraining({
          client: ctx.trainingClient(settings),
          projectId: settings.projectId,
          folder,
          training: {
            intervalMs: opts.interval ?? settings.pollIntervalMs,
            terminal: {
              success: TRAINING_TERMINAL_STATUSES.success,
              failure: opts.terminalFailure ?? TRAINING_TERMINAL_STATUSES.failure,
            },
            publish,
            out: ctx.logger.line,
            sleep: ctx.sleep,
          },
        })
      })

      if (report) {
        ctx.logger.debug(
          `Iteration ${report.iterationId}: ${report.uploaded} images, ${report.polls} polls`,
        )
      }
    })
}
