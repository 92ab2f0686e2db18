import { z } from "zod"

export const ModeSchema = z.enum(["configure", "compose"])
export const OptionModesSchema = z.enum(["configure", "compose", "both"])

// Tool configuration (.preset-composer/config.yml)
export const DriverSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict()

export const ToolConfigSchema = z
  .object({
    presetFiles: z.array(z.string().min(1)).optional(),
    driver: DriverSchema.optional(),
  })
  .strict()

// Option values coming from preset files or the command line
export const IntegerValueSchema = z
  .string()
  .regex(/^[+-]?\d+$/, { message: "must be an integer" })
  .transform((value) => Number.parseInt(value, 10))
  .refine(Number.isSafeInteger, { message: "must be a safe integer" })

export const createChoiceSchema = (choices: ReadonlyArray<string>): z.ZodType<string> =>
  z.string().refine((value) => choices.includes(value), {
    message: `must be one of: ${choices.join(", ")}`,
  })
