/**
 * @lenslab/vision
 *
 * REST clients for the image classification / object detection service:
 * - TrainingClient: projects, tags, image uploads, training iterations
 * - PredictionClient: classify and detect against a published iteration
 *
 * @packageDocumentation
 */

export { type HttpMethod, type RequestBody, RestTransport } from './http'
export {
  createPredictionClient,
  type PredictionApi,
  PredictionClient,
} from './prediction-client'
export {
  createTrainingClient,
  type TrainingApi,
  TrainingClient,
} from './training-client'
export {
  type BoundingBox,
  BoundingBoxSchema,
  type FetchFn,
  type ImageCreateResult,
  ImageCreateResultSchema,
  type ImageCreateSummary,
  ImageCreateSummarySchema,
  type ImageFileEntry,
  type ImagePrediction,
  ImagePredictionSchema,
  type Iteration,
  IterationSchema,
  type Prediction,
  type PredictionClientConfig,
  PredictionSchema,
  type Project,
  ProjectSchema,
  type Region,
  type Tag,
  TagSchema,
  type TrainingClientConfig,
} from './types'
