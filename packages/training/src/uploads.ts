/**
 * Image uploads for the two project kinds.
 *
 * Classification folders hold one sub-folder per tag:
 *
 *   more-training-images/
 *   ├── apple/
 *   │   ├── image1.jpg
 *   └── banana/
 *       └── image1.jpg
 *
 * Detection uploads read `tagged-images.json`, whose regions are
 * normalized to the image size.
 */

import { join } from 'node:path'
import {
  expectValid,
  getLogger,
  NotFoundError,
  ValidationError,
} from '@lenslab/shared'
import type {
  ImageCreateSummary,
  ImageFileEntry,
  Project,
  Region,
  Tag,
  TrainingApi,
} from '@lenslab/vision'
import { z } from 'zod'
import { listFiles, readBytes, readText } from './files'
import type { Output } from './types'

const log = getLogger('uploads')

/**
 * Explicit replacement for module-level client/project globals
 */
export interface TrainingContext {
  client: TrainingApi
  project: Project
}

export async function openTrainingContext(
  client: TrainingApi,
  projectId: string,
): Promise<TrainingContext> {
  const project = await client.getProject(projectId)
  log.debug('Project opened', { projectId: project.id, name: project.name })
  return { client, project }
}

const NormalizedSchema = z.number().min(0).max(1)

export const TaggedRegionSchema = z.object({
  tag: z.string().min(1),
  left: NormalizedSchema,
  top: NormalizedSchema,
  width: NormalizedSchema,
  height: NormalizedSchema,
})
export type TaggedRegion = z.infer<typeof TaggedRegionSchema>

export const TaggedImagesManifestSchema = z.object({
  files: z.array(
    z.object({
      filename: z.string().min(1),
      tags: z.array(TaggedRegionSchema),
    }),
  ),
})
export type TaggedImagesManifest = z.infer<typeof TaggedImagesManifestSchema>

/**
 * Upload every image under `folder/<tag name>` with that tag, one call per
 * image. Returns the number of images sent.
 */
export async function uploadClassificationImages(
  ctx: TrainingContext,
  folder: string,
  out: Output,
): Promise<number> {
  out('Uploading images...')
  const tags = await ctx.client.getTags(ctx.project.id)
  let uploaded = 0

  for (const tag of tags) {
    out(tag.name)
    const tagFolder = join(folder, tag.name)
    for (const file of await listFiles(tagFolder)) {
      const data = await readBytes(join(tagFolder, file))
      await ctx.client.createImagesFromData(ctx.project.id, data, [tag.id])
      uploaded++
    }
  }

  log.debug('Classification images uploaded', { uploaded })
  return uploaded
}

function resolveTagId(tags: Tag[], name: string): string {
  const tag = tags.find((t) => t.name === name)
  if (!tag) {
    throw new NotFoundError('Tag', name)
  }
  return tag.id
}

export async function readTaggedImagesManifest(
  path: string,
): Promise<TaggedImagesManifest> {
  const raw = await readText(path)
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Invalid ${path}: ${reason}`)
  }
  return expectValid(TaggedImagesManifestSchema, data, path)
}

/**
 * Upload the images listed in the manifest with their regions as a single
 * batch. A partially failed batch is reported image by image.
 */
export async function uploadTaggedImages(
  ctx: TrainingContext,
  folder: string,
  manifestPath: string,
  out: Output,
): Promise<ImageCreateSummary> {
  out('Uploading images...')
  const tags = await ctx.client.getTags(ctx.project.id)
  const manifest = await readTaggedImagesManifest(manifestPath)

  const entries: ImageFileEntry[] = []
  for (const image of manifest.files) {
    const regions: Region[] = image.tags.map((region) => ({
      tagId: resolveTagId(tags, region.tag),
      left: region.left,
      top: region.top,
      width: region.width,
      height: region.height,
    }))
    const contents = await readBytes(join(folder, image.filename))
    entries.push({ name: image.filename, contents, regions })
  }

  const summary = await ctx.client.createImagesFromFiles(
    ctx.project.id,
    entries,
  )

  if (!summary.isBatchSuccessful) {
    out('Image batch upload failed.')
    for (const image of summary.images) {
      out(`Image status: ${image.status}`)
    }
  } else {
    out('Images uploaded.')
  }

  return summary
}
