/**
 * @lenslab/training
 *
 * Training and prediction workflows including:
 * - JobWatcher: fixed-interval polling of a remote job until a terminal status
 * - Classification and detection image uploads
 * - Training (with optional publishing) of a project iteration
 * - Classification and detection against a published model
 *
 * @packageDocumentation
 */

// ============================================================================
// Job watching
// ============================================================================

export { IterationJobSource } from './iteration-source'
export { createLineReporter, type LineReporterMessages } from './reporter'
export {
  type JobHandle,
  type JobSource,
  type JobStatus,
  type Output,
  type TerminalStatuses,
  TRAINING_TERMINAL_STATUSES,
  type WatchOptions,
  type WatchOutcome,
  type WatchReporter,
  type WorkflowResult,
} from './types'
export { checkTerminalStatuses, JobWatcher } from './watcher'

// ============================================================================
// Uploads and training
// ============================================================================

export {
  openTrainingContext,
  readTaggedImagesManifest,
  type TaggedImagesManifest,
  TaggedImagesManifestSchema,
  type TaggedRegion,
  TaggedRegionSchema,
  type TrainingContext,
  uploadClassificationImages,
  uploadTaggedImages,
} from './uploads'
export {
  type PublishTarget,
  type TrainedModel,
  type TrainModelOptions,
  trainModel,
} from './train'

// ============================================================================
// Prediction
// ============================================================================

export {
  type Classification,
  classifyFolder,
  DEFAULT_PROBABILITY_THRESHOLD,
  type DetectedObject,
  detectObjects,
  type ImageSize,
  parseImageSize,
  type PixelRect,
  type PredictionContext,
  type PredictOptions,
  toPixelRect,
} from './predict'

// ============================================================================
// Workflows
// ============================================================================

export {
  type ClassifierTrainingReport,
  type ClassifierTrainingRequest,
  type DetectorUploadRequest,
  type PredictionRequest,
  runClassification,
  runClassifierTraining,
  runDetection,
  runDetectorUpload,
  runWorkflow,
} from './workflows'
