import type { Mode, OptionModes } from "../models/types"
import { CoreErrorCodes, createCoreError } from "./errors"
import { builtinOptionDefinitions } from "./option-catalog"

export type OptionValueType = "string" | "integer"

export type FlagOptionDefinition = {
  readonly name: string
  readonly kind: "flag"
  readonly modes: OptionModes
  readonly description: string
}

export type ValueOptionDefinition = {
  readonly name: string
  readonly kind: "value"
  readonly valueType: OptionValueType
  readonly modes: OptionModes
  readonly description: string
  readonly choices?: ReadonlyArray<string>
  readonly minimum?: number
  readonly defaultValue?: string | number
}

export type OptionDefinition = FlagOptionDefinition | ValueOptionDefinition

export type OptionRegistry = {
  readonly lookup: (name: string) => OptionDefinition | undefined
  readonly isKnown: (name: string) => boolean
  readonly indexOf: (name: string) => number
  readonly list: (mode?: Mode) => ReadonlyArray<OptionDefinition>
}

export const appliesToMode = (definition: OptionDefinition, mode: Mode): boolean => {
  return definition.modes === "both" || definition.modes === mode
}

export const createOptionRegistry = (definitions: ReadonlyArray<OptionDefinition>): OptionRegistry => {
  const byName = new Map<string, { readonly index: number; readonly definition: OptionDefinition }>()

  definitions.forEach((definition, index) => {
    const existing = byName.get(definition.name)
    if (existing !== undefined) {
      throw createCoreError("invocation", {
        code: CoreErrorCodes.DUPLICATE_REGISTRY_OPTION,
        message: `Option "${definition.name}" is registered twice`,
        path: definition.name,
        details: { positions: [existing.index, index] },
      })
    }
    byName.set(definition.name, { index, definition: Object.freeze({ ...definition }) })
  })

  const ordered = Object.freeze(Array.from(byName.values(), (entry) => entry.definition))

  return {
    lookup: (name) => byName.get(name)?.definition,
    isKnown: (name) => byName.has(name),
    indexOf: (name) => byName.get(name)?.index ?? -1,
    list: (mode) => (mode === undefined ? ordered : ordered.filter((definition) => appliesToMode(definition, mode))),
  }
}

export const defaultOptionRegistry: OptionRegistry = createOptionRegistry(builtinOptionDefinitions)
