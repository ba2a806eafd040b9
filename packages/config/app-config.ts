/**
 * Environment access
 *
 * Every setting of the toolkit comes from process.env, optionally seeded
 * from a `.env` file in the working directory.
 *
 * Usage:
 * ```typescript
 * import { assertEnvVars, getEnvNumber, loadEnvFile } from '@lenslab/config'
 *
 * loadEnvFile()
 * assertEnvVars(['TrainingEndpoint', 'TrainingKey'])
 * const interval = getEnvNumber('POLL_INTERVAL_MS', 5000)
 * ```
 */

import { ConfigError } from '@lenslab/shared'
import dotenv from 'dotenv'

export type Env = Record<string, string | undefined>

/**
 * Load a `.env` file into process.env. Variables already set win.
 * Returns false when the file does not exist.
 */
export function loadEnvFile(path?: string): boolean {
  const result = dotenv.config(path ? { path } : undefined)
  return result.error === undefined
}

/**
 * Helper to safely read process.env with fallback
 */
export function getEnvVar(
  key: string,
  defaultValue?: string,
  env: Env = process.env,
): string | undefined {
  const value = env[key]
  if (value === undefined || value === '') {
    return defaultValue
  }
  return value
}

/**
 * Helper to safely read process.env as number
 */
export function getEnvNumber(
  key: string,
  defaultValue?: number,
  env: Env = process.env,
): number | undefined {
  const value = getEnvVar(key, undefined, env)
  if (value === undefined) return defaultValue
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return defaultValue
  return parsed
}

/**
 * Names of the variables in `keys` that are unset or empty
 */
export function findMissingEnvVars(
  keys: readonly string[],
  env: Env = process.env,
): string[] {
  return keys.filter((key) => getEnvVar(key, undefined, env) === undefined)
}

/**
 * Throw one ConfigError naming every missing key
 */
export function assertEnvVars(
  keys: readonly string[],
  env: Env = process.env,
): void {
  const missing = findMissingEnvVars(keys, env)
  if (missing.length > 0) {
    throw new ConfigError(missing)
  }
}
