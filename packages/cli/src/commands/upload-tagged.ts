import { loadTrainingSettings } from '@lenslab/config'
import { runDetectorUpload } from '@lenslab/training'
import { Command } from 'commander'
import { type CliContext, runCommand } from '../lib/context'
import { UploadTaggedOptionsSchema, validate } from '../schemas'

export function uploadTaggedCommand(ctx: CliContext): Command {
  return new Command('upload-tagged')
    .description('Upload images with the regions listed in a manifest')
    .argument('[folder]', 'Folder holding the images', 'images')
    .option(
      '--manifest <path>',
      'JSON manifest of files, tags and regions',
      'tagged-images.json',
    )
    .action(async (folder: string, options: unknown) => {
      await runCommand(ctx, async () => {
        const opts = validate(
          options,
          UploadTaggedOptionsSchema,
          'upload-tagged options',
        )
        const settings = loadTrainingSettings(ctx.env)
        return runDetectorUpload({
          client: ctx.trainingClient(settings),
          projectId: settings.projectId,
          folder,
          manifestPath: opts.manifest,
          out: ctx.logger.line,
        })
      })
    })
}
