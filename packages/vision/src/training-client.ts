/**
 * Training API Client
 *
 * @example
 * ```typescript
 * import { TrainingClient } from '@lenslab/vision'
 *
 * const client = new TrainingClient({
 *   endpoint: 'https://my-resource.cognitiveservices.azure.com/',
 *   trainingKey: process.env.TrainingKey ?? '',
 * })
 *
 * const project = await client.getProject(projectId)
 * const iteration = await client.trainProject(project.id)
 * ```
 */

import { Buffer } from 'node:buffer'
import { z } from 'zod'
import { RestTransport } from './http'
import {
  type ImageCreateSummary,
  ImageCreateSummarySchema,
  type ImageFileEntry,
  type Iteration,
  IterationSchema,
  type Project,
  ProjectSchema,
  type Tag,
  TagSchema,
  type TrainingClientConfig,
} from './types'

const TRAINING_API_PATH = '/customvision/v3.3/training'

/**
 * Operations of the training API used by the workflows.
 * TrainingClient implements it; tests provide in-memory fakes.
 */
export interface TrainingApi {
  getProject(projectId: string): Promise<Project>
  getTags(projectId: string): Promise<Tag[]>
  createImagesFromData(
    projectId: string,
    data: Uint8Array,
    tagIds: string[],
  ): Promise<ImageCreateSummary>
  createImagesFromFiles(
    projectId: string,
    images: ImageFileEntry[],
  ): Promise<ImageCreateSummary>
  trainProject(projectId: string): Promise<Iteration>
  getIteration(projectId: string, iterationId: string): Promise<Iteration>
  publishIteration(
    projectId: string,
    iterationId: string,
    publishName: string,
    predictionResourceId: string,
  ): Promise<boolean>
}

export class TrainingClient implements TrainingApi {
  private transport: RestTransport

  constructor(config: TrainingClientConfig) {
    const base = config.endpoint.replace(/\/$/, '')
    this.transport = new RestTransport(
      `${base}${TRAINING_API_PATH}`,
      { 'Training-key': config.trainingKey },
      config.fetch,
    )
  }

  async getProject(projectId: string): Promise<Project> {
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}`,
      'GET',
      ProjectSchema,
    )
  }

  async getTags(projectId: string): Promise<Tag[]> {
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/tags`,
      'GET',
      z.array(TagSchema),
    )
  }

  /**
   * Upload one image as raw bytes, labelled with the given tags
   */
  async createImagesFromData(
    projectId: string,
    data: Uint8Array,
    tagIds: string[],
  ): Promise<ImageCreateSummary> {
    const params = new URLSearchParams({ tagIds: tagIds.join(',') })
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/images?${params}`,
      'POST',
      ImageCreateSummarySchema,
      { kind: 'binary', value: data },
    )
  }

  /**
   * Upload a batch of images, each with optional regions
   */
  async createImagesFromFiles(
    projectId: string,
    images: ImageFileEntry[],
  ): Promise<ImageCreateSummary> {
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/images/files`,
      'POST',
      ImageCreateSummarySchema,
      {
        kind: 'json',
        value: {
          images: images.map((image) => ({
            name: image.name,
            contents: Buffer.from(image.contents).toString('base64'),
            regions: image.regions ?? [],
          })),
        },
      },
    )
  }

  /**
   * Queue a training iteration; the returned iteration is usually "Training"
   */
  async trainProject(projectId: string): Promise<Iteration> {
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/train`,
      'POST',
      IterationSchema,
    )
  }

  async getIteration(
    projectId: string,
    iterationId: string,
  ): Promise<Iteration> {
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/iterations/${encodeURIComponent(iterationId)}`,
      'GET',
      IterationSchema,
    )
  }

  async publishIteration(
    projectId: string,
    iterationId: string,
    publishName: string,
    predictionResourceId: string,
  ): Promise<boolean> {
    const params = new URLSearchParams({
      publishName,
      predictionId: predictionResourceId,
    })
    return this.transport.request(
      `/projects/${encodeURIComponent(projectId)}/iterations/${encodeURIComponent(iterationId)}/publish?${params}`,
      'POST',
      z.boolean(),
    )
  }
}

/**
 * Create a training client with the default fetch
 */
export function createTrainingClient(
  endpoint: string,
  trainingKey: string,
): TrainingClient {
  return new TrainingClient({ endpoint, trainingKey })
}
