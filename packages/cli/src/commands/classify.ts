import { loadPredictionSettings } from '@lenslab/config'
import { runClassification } from '@lenslab/training'
import { Command } from 'commander'
import { type CliContext, runCommand } from '../lib/context'
import { ClassifyOptionsSchema, validate } from '../schemas'

export function classifyCommand(ctx: CliContext): Command {
  return new Command('classify')
    .description('Classify every image in a folder with the published model')
    .argument('[folder]', 'Folder of images to classify', 'test-images')
    .option('--threshold <p>', 'Minimum probability to report (0-1)')
    .action(async (folder: string, options: unknown) => {
      await runCommand(ctx, async () => {
        const opts = validate(options, ClassifyOptionsSchema, 'classify options')
        const settings = loadPredictionSettings(ctx.env)
        return runClassification({
          client: ctx.predictionClient(settings),
          projectId: settings.projectId,
          modelName: settings.modelName,
          threshold: opts.threshold,
          folder,
          out: ctx.logger.line,
        })
      })
    })
}
