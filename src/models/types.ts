import type { z } from "zod"
import type { DriverSchema, ModeSchema, OptionModesSchema, ToolConfigSchema } from "./schema"

export type Mode = z.infer<typeof ModeSchema>
export type OptionModes = z.infer<typeof OptionModesSchema>
export type ToolConfig = z.infer<typeof ToolConfigSchema>
export type DriverConfig = z.infer<typeof DriverSchema>

// Shown by the list command
export type PresetInfo = {
  readonly name: string
  readonly modes: ReadonlyArray<Mode>
  readonly source: string
}
