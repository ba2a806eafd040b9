/**
 * @lenslab/vision - Type Definitions
 *
 * Only the fields the toolkit reads are modelled; zod strips the rest.
 */

import { z } from 'zod'

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

/**
 * Training API client configuration
 */
export interface TrainingClientConfig {
  /** Resource endpoint, e.g. https://my-resource.cognitiveservices.azure.com/ */
  endpoint: string
  /** Sent as the Training-key header */
  trainingKey: string
  /** Replaces global fetch (tests) */
  fetch?: FetchFn
}

/**
 * Prediction API client configuration
 */
export interface PredictionClientConfig {
  endpoint: string
  /** Sent as the Prediction-key header */
  predictionKey: string
  fetch?: FetchFn
}

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
})
export type Project = z.infer<typeof ProjectSchema>

export const TagSchema = z.object({
  id: z.string(),
  name: z.string(),
  imageCount: z.number().optional(),
})
export type Tag = z.infer<typeof TagSchema>

export const IterationSchema = z.object({
  id: z.string(),
  name: z.string(),
  /** Open-ended: Training, Completed, Failed, ... */
  status: z.string(),
  created: z.string().optional(),
  lastModified: z.string().optional(),
  trainedAt: z.string().nullish(),
  publishName: z.string().nullish(),
})
export type Iteration = z.infer<typeof IterationSchema>

export const ImageCreateResultSchema = z.object({
  sourceUrl: z.string().nullish(),
  status: z.string(),
})
export type ImageCreateResult = z.infer<typeof ImageCreateResultSchema>

export const ImageCreateSummarySchema = z.object({
  isBatchSuccessful: z.boolean(),
  images: z.array(ImageCreateResultSchema),
})
export type ImageCreateSummary = z.infer<typeof ImageCreateSummarySchema>

export const BoundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number(),
})
export type BoundingBox = z.infer<typeof BoundingBoxSchema>

export const PredictionSchema = z.object({
  probability: z.number(),
  tagId: z.string(),
  tagName: z.string(),
  boundingBox: BoundingBoxSchema.nullish(),
})
export type Prediction = z.infer<typeof PredictionSchema>

export const ImagePredictionSchema = z.object({
  id: z.string(),
  project: z.string(),
  iteration: z.string(),
  created: z.string(),
  predictions: z.array(PredictionSchema),
})
export type ImagePrediction = z.infer<typeof ImagePredictionSchema>

/**
 * Region of an uploaded detection image, normalized to 0..1
 */
export interface Region {
  tagId: string
  left: number
  top: number
  width: number
  height: number
}

export interface ImageFileEntry {
  name: string
  contents: Uint8Array
  regions?: Region[]
}
