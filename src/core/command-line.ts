import type { OptionRegistry } from "./registry"
import { CoreErrorCodes, createCoreError, type CoreError } from "./errors"

export type CommandLineOption = {
  readonly name: string
  readonly value?: string
  readonly negated: boolean
}

export const COMMAND_LINE_SOURCE = "command line"

type ParseCommandLineOptionsInput = {
  readonly tokens: ReadonlyArray<string>
  readonly registry: OptionRegistry
}

const NEGATION_PREFIX = "no-"

const resolutionError = (
  code: string,
  message: string,
  path?: string,
  details?: Readonly<Record<string, unknown>>,
): CoreError =>
  createCoreError("resolution", {
    code,
    message,
    source: COMMAND_LINE_SOURCE,
    path,
    details,
  })

/**
 * Splits the option tokens left over after argument parsing into
 * `--name`, `--name=value`, `--name value` and `--no-name` records.
 * Whether `--name` takes the following token depends on the registry.
 */
export const parseCommandLineOptions = ({ tokens, registry }: ParseCommandLineOptionsInput): CommandLineOption[] => {
  const options: CommandLineOption[] = []
  const seen = new Set<string>()

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index] ?? ""
    if (!token.startsWith("--") || token.length === 2) {
      throw resolutionError(CoreErrorCodes.UNEXPECTED_ARGUMENT, `Unexpected argument "${token}"`, undefined, {
        token,
      })
    }

    const body = token.slice(2)
    const separator = body.indexOf("=")
    const rawName = separator === -1 ? body : body.slice(0, separator)
    const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)

    const { name, negated } = resolveName(rawName, registry)
    const definition = registry.lookup(name)
    if (definition === undefined) {
      throw resolutionError(CoreErrorCodes.UNKNOWN_OPTION, `Unknown option "--${rawName}"`, rawName, {
        option: rawName,
      })
    }

    if (seen.has(name)) {
      throw resolutionError(CoreErrorCodes.DUPLICATE_OPTION, `Option "--${name}" is given more than once`, name, {
        option: name,
      })
    }
    seen.add(name)

    if (definition.kind === "flag") {
      if (inlineValue !== undefined) {
        throw resolutionError(CoreErrorCodes.ARITY_MISMATCH, `Flag "--${rawName}" does not take a value`, name, {
          option: name,
          value: inlineValue,
        })
      }
      options.push({ name, negated })
      continue
    }

    if (inlineValue !== undefined) {
      options.push({ name, value: inlineValue, negated: false })
      continue
    }

    const next = tokens[index + 1]
    if (next === undefined || next.startsWith("--")) {
      throw resolutionError(CoreErrorCodes.ARITY_MISMATCH, `Option "--${name}" requires a value`, name, {
        option: name,
      })
    }
    options.push({ name, value: next, negated: false })
    index += 1
  }

  return options
}

const resolveName = (rawName: string, registry: OptionRegistry): { name: string; negated: boolean } => {
  if (registry.isKnown(rawName) || !rawName.startsWith(NEGATION_PREFIX)) {
    return { name: rawName, negated: false }
  }

  const stripped = rawName.slice(NEGATION_PREFIX.length)
  if (registry.lookup(stripped)?.kind === "flag") {
    return { name: stripped, negated: true }
  }
  return { name: rawName, negated: false }
}

/**
 * Parses `--define key=value` arguments into placeholder substitutions.
 * A later definition of the same key replaces an earlier one.
 */
export const parseDefinitions = (definitions: ReadonlyArray<string>): Map<string, string> => {
  const substitutions = new Map<string, string>()

  for (const definition of definitions) {
    const separator = definition.indexOf("=")
    const key = separator === -1 ? "" : definition.slice(0, separator).trim()
    if (key.length === 0) {
      throw resolutionError(
        CoreErrorCodes.INVALID_DEFINITION,
        `Invalid definition "${definition}" (expected key=value)`,
        undefined,
        { definition },
      )
    }
    substitutions.set(key, definition.slice(separator + 1))
  }

  return substitutions
}
