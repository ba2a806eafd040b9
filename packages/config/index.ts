/**
 * @fileoverview Environment configuration
 * @module config
 *
 * @example
 * ```ts
 * import { loadEnvFile, loadTrainingSettings } from '@lenslab/config'
 *
 * loadEnvFile()
 * const settings = loadTrainingSettings()
 * ```
 */

export {
  assertEnvVars,
  type Env,
  findMissingEnvVars,
  getEnvNumber,
  getEnvVar,
  loadEnvFile,
} from './app-config'
export {
  DEFAULT_POLL_INTERVAL_MS,
  loadPredictionSettings,
  loadTrainingSettings,
  type PredictionSettings,
  PredictionSettingsSchema,
  type TrainingSettings,
  TrainingSettingsSchema,
} from './vision-settings'
