import { loadPredictionSettings } from '@lenslab/config'
import { runDetection } from '@lenslab/training'
import { Command } from 'commander'
import { type CliContext, runCommand } from '../lib/context'
import { DetectOptionsSchema, validate } from '../schemas'

export function detectCommand(ctx: CliContext): Command {
  return new Command('detect')
    .description('Detect objects in an image with the published model')
    .argument('[image]', 'Image file', 'produce.jpg')
    .option('--threshold <p>', 'Minimum probability to report (0-1)')
    .option('--size <WxH>', 'Image size, to print boxes in pixels')
    .action(async (image: string, options: unknown) => {
      await runCommand(ctx, async () => {
        const opts = validate(options, DetectOptionsSchema, 'detect options')
        const settings = loadPredictionSettings(ctx.env)
        return runDetection({
          client: ctx.predictionClient(settings),
          projectId: settings.projectId,
          modelName: settings.modelName,
          threshold: opts.threshold,
          size: opts.size,
          imagePath: image,
          out: ctx.logger.line,
        })
      })
    })
}
