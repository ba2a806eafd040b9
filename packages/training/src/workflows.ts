/**
 * Top-level workflows. Each one returns a WorkflowResult; the caller picks
 * how to present a failure (log line, exit code, retry).
 */

import { getLogger, toLensLabError } from '@lenslab/shared'
import type {
  ImageCreateSummary,
  PredictionApi,
  TrainingApi,
} from '@lenslab/vision'
import {
  type Classification,
  classifyFolder,
  type DetectedObject,
  detectObjects,
  type ImageSize,
} from './predict'
import { type TrainedModel, type TrainModelOptions, trainModel } from './train'
import {
  type Output,
  TRAINING_TERMINAL_STATUSES,
  type WorkflowResult,
} from './types'
import {
  openTrainingContext,
  uploadClassificationImages,
  uploadTaggedImages,
} from './uploads'
import { checkTerminalStatuses } from './watcher'

const log = getLogger('workflows')

export async function runWorkflow<T>(
  name: string,
  work: () => Promise<T>,
): Promise<WorkflowResult<T>> {
  try {
    return { ok: true, value: await work() }
  } catch (error) {
    const failure = toLensLabError(error)
    log.debug('Workflow failed', { workflow: name, code: failure.code })
    return { ok: false, error: failure }
  }
}

export interface ClassifierTrainingRequest {
  client: TrainingApi
  projectId: string
  folder: string
  training: TrainModelOptions
}

export interface ClassifierTrainingReport extends TrainedModel {
  uploaded: number
}

export function runClassifierTraining(
  request: ClassifierTrainingRequest,
): Promise<WorkflowResult<ClassifierTrainingReport>> {
  return runWorkflow('train-classifier', async () => {
    checkTerminalStatuses(
      request.training.terminal ?? TRAINING_TERMINAL_STATUSES,
    )
    const ctx = await openTrainingContext(request.client, request.projectId)
    const uploaded = await uploadClassificationImages(
      ctx,
      request.folder,
      request.training.out,
    )
    const trained = await trainModel(ctx, request.training)
    return { ...trained, uploaded }
  })
}

export interface DetectorUploadRequest {
  client: TrainingApi
  projectId: string
  folder: string
  manifestPath: string
  out: Output
}

export function runDetectorUpload(
  request: DetectorUploadRequest,
): Promise<WorkflowResult<ImageCreateSummary>> {
  return runWorkflow('upload-tagged', async () => {
    const ctx = await openTrainingContext(request.client, request.projectId)
    return uploadTaggedImages(
      ctx,
      request.folder,
      request.manifestPath,
      request.out,
    )
  })
}

export interface PredictionRequest {
  client: PredictionApi
  projectId: string
  modelName: string
  threshold?: number
  out: Output
}

export function runClassification(
  request: PredictionRequest & { folder: string },
): Promise<WorkflowResult<Classification[]>> {
  return runWorkflow('classify', () =>
    classifyFolder(request, request.folder, request),
  )
}

export function runDetection(
  request: PredictionRequest & { imagePath: string; size?: ImageSize },
): Promise<WorkflowResult<DetectedObject[]>> {
  return runWorkflow('detect', () =>
    detectObjects(request, request.imagePath, request),
  )
}
