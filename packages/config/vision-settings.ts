/**
 * Typed settings for the training and prediction endpoints.
 *
 * Variable names match the ones the service portal hands out
 * (`TrainingEndpoint`, `TrainingKey`, `ProjectID`, ...).
 */

import { expectValid } from '@lenslab/shared'
import { z } from 'zod'
import { assertEnvVars, type Env, getEnvNumber, getEnvVar } from './app-config'

export const DEFAULT_POLL_INTERVAL_MS = 5000

const TRAINING_VARS = ['TrainingEndpoint', 'TrainingKey', 'ProjectID'] as const
const PREDICTION_VARS = [
  'PredictionEndpoint',
  'PredictionKey',
  'ProjectID',
  'ModelName',
] as const

export const TrainingSettingsSchema = z.object({
  endpoint: z.string().url(),
  trainingKey: z.string().min(1),
  projectId: z.string().min(1),
  pollIntervalMs: z.number().int().positive(),
  predictionResourceId: z.string().min(1).optional(),
})
export type TrainingSettings = z.infer<typeof TrainingSettingsSchema>

export const PredictionSettingsSchema = z.object({
  endpoint: z.string().url(),
  predictionKey: z.string().min(1),
  projectId: z.string().min(1),
  modelName: z.string().min(1),
})
export type PredictionSettings = z.infer<typeof PredictionSettingsSchema>

export function loadTrainingSettings(env: Env = process.env): TrainingSettings {
  assertEnvVars(TRAINING_VARS, env)
  return expectValid(
    TrainingSettingsSchema,
    {
      endpoint: getEnvVar('TrainingEndpoint', undefined, env),
      trainingKey: getEnvVar('TrainingKey', undefined, env),
      projectId: getEnvVar('ProjectID', undefined, env),
      pollIntervalMs: getEnvNumber(
        'POLL_INTERVAL_MS',
        DEFAULT_POLL_INTERVAL_MS,
        env,
      ),
      predictionResourceId: getEnvVar('PredictionResourceId', undefined, env),
    },
    'training settings',
  )
}

export function loadPredictionSettings(
  env: Env = process.env,
): PredictionSettings {
  assertEnvVars(PREDICTION_VARS, env)
  return expectValid(
    PredictionSettingsSchema,
    {
      endpoint: getEnvVar('PredictionEndpoint', undefined, env),
      predictionKey: getEnvVar('PredictionKey', undefined, env),
      projectId: getEnvVar('ProjectID', undefined, env),
      modelName: getEnvVar('ModelName', undefined, env),
    },
    'prediction settings',
  )
}
