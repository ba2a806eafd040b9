import { basename, join } from 'node:path'
import type { BoundingBox, PredictionApi } from '@lenslab/vision'
import { listFiles, readBytes } from './files'
import type { Output } from './types'

export const DEFAULT_PROBABILITY_THRESHOLD = 0.5

export interface PredictionContext {
  client: PredictionApi
  projectId: string
  modelName: string
}

export interface ImageSize {
  width: number
  height: number
}

export interface PixelRect {
  left: number
  top: number
  width: number
  height: number
}

export interface Classification {
  file: string
  tagName: string
  probability: number
}

export interface DetectedObject {
  tagName: string
  probability: number
  boundingBox?: BoundingBox
  pixelRect?: PixelRect
}

export interface PredictOptions {
  threshold?: number
  out: Output
}

/**
 * Map a box normalized to 0..1 into pixels of an image of the given size
 */
export function toPixelRect(box: BoundingBox, size: ImageSize): PixelRect {
  return {
    left: box.left * size.width,
    top: box.top * size.height,
    width: box.width * size.width,
    height: box.height * size.height,
  }
}

/**
 * Parse "640x480" into an image size
 */
export function parseImageSize(value: string): ImageSize | undefined {
  const match = /^(\d+)x(\d+)$/i.exec(value.trim())
  if (!match) return undefined
  const width = Number(match[1])
  const height = Number(match[2])
  if (width === 0 || height === 0) return undefined
  return { width, height }
}

function percent(probability: number, digits: number): string {
  return (probability * 100).toFixed(digits)
}

/**
 * Classify every file in the folder and print the predictions above the
 * threshold as "<file>: <tag> (<pct>%)".
 */
export async function classifyFolder(
  ctx: PredictionContext,
  folder: string,
  options: PredictOptions,
): Promise<Classification[]> {
  const threshold = options.threshold ?? DEFAULT_PROBABILITY_THRESHOLD
  const files = await listFiles(folder)
  const results: Classification[] = []

  for (const file of files) {
    const data = await readBytes(join(folder, file))
    const prediction = await ctx.client.classifyImage(
      ctx.projectId,
      ctx.modelName,
      data,
    )

    for (const p of prediction.predictions) {
      if (p.probability > threshold) {
        options.out(`${file}: ${p.tagName} (${percent(p.probability, 0)}%)`)
        results.push({ file, tagName: p.tagName, probability: p.probability })
      }
    }
  }

  return results
}

/**
 * Detect objects in one image. With `size`, each box is also printed in
 * pixels.
 */
export async function detectObjects(
  ctx: PredictionContext,
  imagePath: string,
  options: PredictOptions & { size?: ImageSize },
): Promise<DetectedObject[]> {
  const threshold = options.threshold ?? DEFAULT_PROBABILITY_THRESHOLD
  options.out(`Detecting objects in ${basename(imagePath)}`)

  const data = await readBytes(imagePath)
  const prediction = await ctx.client.detectImage(
    ctx.projectId,
    ctx.modelName,
    data,
  )
  const detected: DetectedObject[] = []

  for (const p of prediction.predictions) {
    if (p.probability <= threshold) continue

    const object: DetectedObject = {
      tagName: p.tagName,
      probability: p.probability,
    }
    let line = `${p.tagName}: ${percent(p.probability, 2)}%`

    if (p.boundingBox) {
      object.boundingBox = p.boundingBox
      if (options.size) {
        const rect = toPixelRect(p.boundingBox, options.size)
        object.pixelRect = rect
        line += ` at (${Math.round(rect.left)}, ${Math.round(rect.top)}) ${Math.round(rect.width)}x${Math.round(rect.height)}`
      }
    }

    options.out(line)
    detected.push(object)
  }

  return detected
}
