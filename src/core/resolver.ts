import type { Mode } from "../models/types"
import { createChoiceSchema, IntegerValueSchema } from "../models/schema"
import { replaceTemplateTokens, TemplateTokenError } from "../utils/template-tokens"
import { COMMAND_LINE_SOURCE, type CommandLineOption } from "./command-line"
import { CoreErrorCodes, createCoreError, formatLocation, type CoreError } from "./errors"
import { toSectionKey, type PresetEntry, type PresetSection, type PresetTable } from "./preset-parser"
import { appliesToMode, type OptionDefinition, type OptionRegistry, type ValueOptionDefinition } from "./registry"

export type OptionOrigin = "preset" | "mode-preset" | "command-line"

export type ResolvedValue = true | string | number

export type ResolvedOption = {
  readonly name: string
  readonly value: ResolvedValue
  readonly origin: OptionOrigin
  readonly location?: string
}

export type ResolvedOptionSet = {
  readonly preset?: string
  readonly mode: Mode
  readonly options: ReadonlyMap<string, ResolvedOption>
  readonly passThrough: ReadonlyArray<string>
}

export type ResolvePresetInput = {
  readonly presetName: string
  readonly mode: Mode
  readonly table: PresetTable
  readonly registry: OptionRegistry
  readonly commandLine?: ReadonlyArray<CommandLineOption>
  readonly passThrough?: ReadonlyArray<string>
  readonly substitutions?: ReadonlyMap<string, string>
}

export type ResolveDirectInput = {
  readonly mode: Mode
  readonly registry: OptionRegistry
  readonly commandLine?: ReadonlyArray<CommandLineOption>
  readonly passThrough?: ReadonlyArray<string>
}

type EntryContext = {
  readonly source: string
  readonly line?: number
  readonly path: string
}

type MergedEntry = {
  readonly entry: PresetEntry
  readonly section: PresetSection
  readonly origin: OptionOrigin
}

const resolutionError = (
  code: string,
  message: string,
  context: EntryContext,
  details?: Readonly<Record<string, unknown>>,
): CoreError => {
  return createCoreError("resolution", {
    code,
    message,
    source: context.source,
    line: context.line,
    path: context.path,
    details,
  })
}

const entryContext = ({ entry, section }: MergedEntry): EntryContext => ({
  source: section.source,
  line: entry.line,
  path: `${section.key}.${entry.name}`,
})

/**
 * Resolves `[presetName]` plus the optional `[mode:presetName]` section into a
 * typed option set, then lets the command line override preset values.
 */
export const resolvePreset = ({
  presetName,
  mode,
  table,
  registry,
  commandLine = [],
  passThrough = [],
  substitutions = new Map<string, string>(),
}: ResolvePresetInput): ResolvedOptionSet => {
  const shared = table.sections.get(toSectionKey(presetName))
  if (shared === undefined) {
    const available = Array.from(table.sections.values())
      .filter((section) => section.mode === undefined)
      .map((section) => section.preset)
    throw createCoreError("resolution", {
      code: CoreErrorCodes.PRESET_NOT_FOUND,
      message: `Preset "${presetName}" not found`,
      path: presetName,
      details: { preset: presetName, availablePresets: available, files: table.files },
    })
  }

  const modeSpecific = table.sections.get(toSectionKey(presetName, mode))
  const merged = mergeSections(shared, modeSpecific)

  const placeholders = new Map<string, string>([
    ["preset", presetName],
    ["mode", mode],
  ])
  substitutions.forEach((value, key) => placeholders.set(key, value))

  const options = new Map<string, ResolvedOption>()
  const presetPassThrough: string[] = []

  for (const item of merged) {
    const { name, value: rawValue } = item.entry
    const context = entryContext(item)

    if (item.entry.passThrough) {
      presetPassThrough.push(
        rawValue === undefined
          ? toPassThroughFlag(name)
          : `${toPassThroughFlag(name)}=${expandValue(rawValue, placeholders, context)}`,
      )
      continue
    }

    const definition = validateEntry({ name, value: rawValue, mode, registry, context })
    const value = rawValue === undefined ? undefined : expandValue(rawValue, placeholders, context)
    options.set(definition.name, {
      name: definition.name,
      value: toResolvedValue(definition, value, context),
      origin: item.origin,
      location: formatLocation(context),
    })
  }

  applyCommandLine({ options, commandLine, mode, registry })

  return {
    preset: presetName,
    mode,
    options,
    passThrough: [...presetPassThrough, ...passThrough],
  }
}

/**
 * Resolves options given directly on the command line, without a preset.
 */
export const resolveDirect = ({
  mode,
  registry,
  commandLine = [],
  passThrough = [],
}: ResolveDirectInput): ResolvedOptionSet => {
  const options = new Map<string, ResolvedOption>()
  applyCommandLine({ options, commandLine, mode, registry })
  return {
    mode,
    options,
    passThrough: [...passThrough],
  }
}

// Pass-through lines may be written with their own dashes.
const toPassThroughFlag = (name: string): string => (name.startsWith("-") ? name : `--${name}`)

const mergeSections = (shared: PresetSection, modeSpecific: PresetSection | undefined): MergedEntry[] => {
  const toMerged = (section: PresetSection, origin: OptionOrigin): MergedEntry[] =>
    section.entries.map((entry) => ({ entry, section, origin }))

  const merged = [
    ...toMerged(shared, "preset"),
    ...(modeSpecific === undefined ? [] : toMerged(modeSpecific, "mode-preset")),
  ]

  const seen = new Map<string, MergedEntry>()
  for (const item of merged) {
    if (item.entry.passThrough) {
      continue
    }

    const previous = seen.get(item.entry.name)
    if (previous !== undefined) {
      const first = formatLocation(entryContext(previous))
      const second = formatLocation(entryContext(item))
      throw resolutionError(
        CoreErrorCodes.DUPLICATE_OPTION,
        `Option "${item.entry.name}" is set by both [${previous.section.key}] and [${item.section.key}]`,
        entryContext(item),
        { option: item.entry.name, locations: [first, second] },
      )
    }
    seen.set(item.entry.name, item)
  }

  return merged
}

const validateEntry = ({
  name,
  value,
  mode,
  registry,
  context,
}: {
  readonly name: string
  readonly value: string | undefined
  readonly mode: Mode
  readonly registry: OptionRegistry
  readonly context: EntryContext
}): OptionDefinition => {
  const definition = registry.lookup(name)
  if (definition === undefined) {
    throw resolutionError(CoreErrorCodes.UNKNOWN_OPTION, `Unknown option "${name}"`, context, { option: name })
  }

  if (definition.kind === "flag" && value !== undefined) {
    throw resolutionError(CoreErrorCodes.ARITY_MISMATCH, `Flag "${name}" does not take a value`, context, {
      option: name,
    })
  }

  if (definition.kind === "value" && (value === undefined || value.length === 0)) {
    throw resolutionError(CoreErrorCodes.ARITY_MISMATCH, `Option "${name}" requires a value`, context, {
      option: name,
    })
  }

  if (!appliesToMode(definition, mode)) {
    throw resolutionError(
      CoreErrorCodes.MODE_MISMATCH,
      `Option "${name}" is only available in ${definition.modes} mode, not in ${mode} mode`,
      context,
      { option: name, modes: definition.modes, mode },
    )
  }

  return definition
}

const expandValue = (value: string, placeholders: ReadonlyMap<string, string>, context: EntryContext): string => {
  try {
    return replaceTemplateTokens({ text: value, substitutions: placeholders })
  } catch (error) {
    if (error instanceof TemplateTokenError) {
      throw resolutionError(CoreErrorCodes.UNDEFINED_PLACEHOLDER, error.message, context, {
        placeholder: error.token,
        available: error.available,
      })
    }
    throw error
  }
}

const toResolvedValue = (
  definition: OptionDefinition,
  value: string | undefined,
  context: EntryContext,
): ResolvedValue => {
  if (definition.kind === "flag") {
    return true
  }
  return coerceValue(definition, value ?? "", context)
}

const coerceValue = (definition: ValueOptionDefinition, raw: string, context: EntryContext): string | number => {
  const invalid = (reason: string): CoreError =>
    resolutionError(
      CoreErrorCodes.INVALID_VALUE,
      `Invalid value "${raw}" for option "${definition.name}": ${reason}`,
      context,
      { option: definition.name, value: raw },
    )

  if (raw.length === 0) {
    throw invalid("value must not be empty")
  }

  if (definition.valueType === "integer") {
    const parsed = IntegerValueSchema.safeParse(raw)
    if (!parsed.success) {
      throw invalid(parsed.error.issues[0]?.message ?? "must be an integer")
    }
    if (definition.minimum !== undefined && parsed.data < definition.minimum) {
      throw invalid(`must be at least ${definition.minimum}`)
    }
    return parsed.data
  }

  if (definition.choices !== undefined) {
    const parsed = createChoiceSchema(definition.choices).safeParse(raw)
    if (!parsed.success) {
      throw invalid(parsed.error.issues[0]?.message ?? "unsupported value")
    }
    return parsed.data
  }

  return raw
}

// The one place a later value replaces an earlier one: the command line wins.
const applyCommandLine = ({
  options,
  commandLine,
  mode,
  registry,
}: {
  readonly options: Map<string, ResolvedOption>
  readonly commandLine: ReadonlyArray<CommandLineOption>
  readonly mode: Mode
  readonly registry: OptionRegistry
}): void => {
  for (const option of commandLine) {
    const context: EntryContext = { source: COMMAND_LINE_SOURCE, path: option.name }
    const definition = validateEntry({ name: option.name, value: option.value, mode, registry, context })

    if (option.negated) {
      options.delete(definition.name)
      continue
    }

    options.set(definition.name, {
      name: definition.name,
      value: toResolvedValue(definition, option.value, context),
      origin: "command-line",
    })
  }
}
