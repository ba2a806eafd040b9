/**
 * CLI Zod Schemas
 *
 * Validation for command options and local files. Uses fail-fast
 * validation: invalid input throws instead of falling back to defaults.
 */

import { expectValid } from '@lenslab/shared'
import { parseImageSize } from '@lenslab/training'
import { z } from 'zod'

export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
})
export type PackageJson = z.infer<typeof PackageJsonSchema>

/** Shape of the errors commander throws under exitOverride */
export const CommanderErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  exitCode: z.number().optional(),
})
export type CommanderErrorInfo = z.infer<typeof CommanderErrorSchema>

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
})

const ThresholdSchema = z.coerce.number().min(0).max(1).optional()

export const TrainOptionsSchema = z.object({
  interval: z.coerce.number().int().positive().optional(),
  terminalFailure: z.array(z.string().min(1)).nonempty().optional(),
  publish: z.string().min(1).optional(),
})
export type TrainOptions = z.infer<typeof TrainOptionsSchema>

export const UploadTaggedOptionsSchema = z.object({
  manifest: z.string().min(1),
})

export const ClassifyOptionsSchema = z.object({
  threshold: ThresholdSchema,
})

export const DetectOptionsSchema = z.object({
  threshold: ThresholdSchema,
  size: z
    .string()
    .transform((value, ctx) => {
      const size = parseImageSize(value)
      if (!size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'must look like 640x480',
        })
        return z.NEVER
      }
      return size
    })
    .optional(),
})

export function validate<T>(
  data: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context?: string,
): T {
  return expectValid(schema, data, context)
}
