import { z } from 'zod'

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export const LensLabErrorCode = {
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  JOB_FAILED: 'JOB_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const

export type LensLabErrorCode =
  (typeof LensLabErrorCode)[keyof typeof LensLabErrorCode]

export interface ErrorDescription {
  error: string
  code: LensLabErrorCode
  details?: Record<string, JsonValue>
}

export class LensLabError extends Error {
  constructor(
    message: string,
    public readonly code: LensLabErrorCode,
    public readonly details?: Record<string, JsonValue>,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'LensLabError'
  }

  toJSON(): ErrorDescription {
    return {
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * A remote call could not complete or did not return a valid response.
 * Never retried by the callers in this repo.
 */
export class TransportError extends LensLabError {
  readonly statusCode?: number

  constructor(
    message: string,
    options?: { statusCode?: number; cause?: unknown },
  ) {
    super(
      message,
      LensLabErrorCode.TRANSPORT_ERROR,
      options?.statusCode !== undefined
        ? { statusCode: options.statusCode }
        : undefined,
      { cause: options?.cause },
    )
    this.name = 'TransportError'
    this.statusCode = options?.statusCode
  }
}

export class ValidationError extends LensLabError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super(message, LensLabErrorCode.VALIDATION_ERROR, details)
    this.name = 'ValidationError'
  }
}

export class ConfigError extends LensLabError {
  constructor(public readonly missing: string[]) {
    super(
      `Missing required environment variables: ${missing.join(', ')}`,
      LensLabErrorCode.CONFIG_ERROR,
      { missing },
    )
    this.name = 'ConfigError'
  }
}

export class NotFoundError extends LensLabError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} not found: ${id}`
      : `${resource} not found`
    super(message, LensLabErrorCode.NOT_FOUND, id ? { resource, id } : { resource })
    this.name = 'NotFoundError'
  }
}

export class JobFailedError extends LensLabError {
  constructor(
    public readonly jobId: string,
    public readonly status: string,
  ) {
    super(
      `Job ${jobId} ended with status ${status}`,
      LensLabErrorCode.JOB_FAILED,
      { jobId, status },
    )
    this.name = 'JobFailedError'
  }
}

/**
 * Normalise anything thrown into the LensLabError hierarchy
 */
export function toLensLabError(error: unknown): LensLabError {
  if (error instanceof LensLabError) {
    return error
  }

  if (error instanceof z.ZodError) {
    return new ValidationError(
      `Validation failed: ${formatIssues(error.issues)}`,
      { issues: serializeIssues(error.issues) },
    )
  }

  const message = error instanceof Error ? error.message : String(error)
  return new LensLabError(message, LensLabErrorCode.INTERNAL_ERROR, undefined, {
    cause: error,
  })
}

export function expectDefined<T>(
  value: T | null | undefined,
  message: string,
): T {
  if (value === null || value === undefined) {
    throw new ValidationError(message)
  }
  return value
}

/**
 * Validate unknown external data against a Zod schema.
 */
export function expectValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string = 'data',
): T {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${context}: ${formatIssues(result.error.issues)}`,
      { issues: serializeIssues(result.error.issues) },
    )
  }
  return result.data
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')
}

function serializeIssues(issues: z.ZodIssue[]): JsonValue[] {
  return issues.map((i) => ({
    path: i.path.map(String),
    message: i.message,
    code: i.code,
  }))
}
