import chalk from "chalk"

import type { DriverCommand } from "../contracts"
import {
  listPresetNames,
  PASS_THROUGH_SEPARATOR,
  toSectionKey,
  type Invocation,
  type OptionDefinition,
  type PresetTable,
} from "../core/index"
import type { DriverConfig, Mode, PresetInfo } from "../models/types"

export const collect = (value: string, previous: string[] = []): string[] => {
  return [...previous, value]
}

/**
 * Splits raw argv at the first bare `--`. Everything after it is handed to the
 * driver untouched and never reaches the option parser.
 */
export const splitPassThrough = (
  args: ReadonlyArray<string>,
): { readonly head: string[]; readonly passThrough: string[] } => {
  const separatorIndex = args.indexOf(PASS_THROUGH_SEPARATOR)
  if (separatorIndex === -1) {
    return { head: [...args], passThrough: [] }
  }
  return {
    head: args.slice(0, separatorIndex),
    passThrough: args.slice(separatorIndex + 1),
  }
}

export const resolveDriver = ({
  configured,
  override,
}: {
  readonly configured?: DriverConfig
  readonly override?: string
}): DriverConfig | undefined => {
  if (typeof override === "string" && override.length > 0) {
    return { command: override, args: [] }
  }
  return configured
}

// Without a driver the invocation itself is printed, the mode word in command position.
export const toDriverCommand = ({
  driver,
  invocation,
}: {
  readonly driver?: DriverConfig
  readonly invocation: Invocation
}): DriverCommand => {
  if (driver !== undefined) {
    return { command: driver.command, args: [...driver.args, ...invocation.args] }
  }
  const [command = invocation.mode, ...args] = invocation.args
  return { command, args }
}

const MODES: ReadonlyArray<Mode> = ["configure", "compose"]

export const describePresets = (table: PresetTable): PresetInfo[] => {
  return listPresetNames(table).map((name) => {
    const shared = table.sections.get(toSectionKey(name))
    const modeSections = MODES.filter((mode) => table.sections.has(toSectionKey(name, mode)))
    const source = shared?.source ?? table.sections.get(toSectionKey(name, modeSections[0]))?.source ?? ""
    return { name, modes: modeSections, source }
  })
}

export const renderPresetList = (
  presets: ReadonlyArray<PresetInfo>,
  output: (line: string) => void = (line): void => console.log(line),
): void => {
  output(chalk.bold("Available presets:\n"))

  const maxNameLength = Math.max(...presets.map((preset) => preset.name.length))
  presets.forEach((preset) => {
    const paddedName = preset.name.padEnd(maxNameLength + 2)
    const modes = preset.modes.length > 0 ? `[${preset.modes.join(", ")}]` : ""
    output(`  ${chalk.cyan(paddedName)} ${modes}`.trimEnd())
  })
}

const describeUsage = (definition: OptionDefinition): string => {
  if (definition.kind === "flag") {
    return `--${definition.name}`
  }
  const placeholder = definition.choices !== undefined ? definition.choices.join("|") : definition.valueType.toUpperCase()
  return `--${definition.name} <${placeholder}>`
}

export const renderOptionList = (
  definitions: ReadonlyArray<OptionDefinition>,
  output: (line: string) => void = (line): void => console.log(line),
): void => {
  const usages = definitions.map((definition) => describeUsage(definition))
  const width = Math.max(...usages.map((usage) => usage.length))

  definitions.forEach((definition, index) => {
    const usage = (usages[index] ?? "").padEnd(width + 2)
    const defaultValue =
      definition.kind === "value" && definition.defaultValue !== undefined ? ` (default: ${definition.defaultValue})` : ""
    const modes = definition.modes === "both" ? "" : ` (${definition.modes} only)`
    output(`  ${chalk.cyan(usage)} ${definition.description}${defaultValue}${modes}`)
  })
}
