import { z } from "zod"

import { InvalidConfigurationError } from "../errors.js"

export const pageSizeSchema = z.number().int().positive().safe()

/** Same rule as `pageSizeSchema`, for a value read from the environment. */
export const pageSizeEnvSchema = z
  .string()
  .trim()
  .regex(/^[0-9]+$/, "must be a whole number")
  .transform((value) => Number.parseInt(value, 10))
  .pipe(pageSizeSchema)

const parseOrThrow = <TOutput, TInput>(
  schema: z.ZodType<TOutput, z.ZodTypeDef, TInput>,
  value: unknown,
  setting: string,
): TOutput => {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidConfigurationError(setting, issue?.message ?? "unknown error")
  }
  return parsed.data
}

export const validatePageSize = (value: unknown, setting = "pageSize"): number =>
  parseOrThrow(pageSizeSchema, value, setting)

export const parsePageSizeEnv = (value: string, setting: string): number =>
  parseOrThrow(pageSizeEnvSchema, value, setting)
