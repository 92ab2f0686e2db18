import type { Mode } from "../models/types"
import { parseCommandLineOptions, parseDefinitions } from "./command-line"
import { buildInvocation, type Invocation } from "./invocation"
import {
  buildPresetTable,
  parsePresetDocument,
  type ParsePresetDocumentInput,
  type PresetTable,
} from "./preset-parser"
import { defaultOptionRegistry, type OptionRegistry } from "./registry"
import { resolveDirect, resolvePreset, type ResolvedOptionSet } from "./resolver"

export type ComposeInvocationInput = {
  readonly mode: Mode
  readonly presetName?: string
  readonly documents?: ReadonlyArray<ParsePresetDocumentInput>
  readonly tokens?: ReadonlyArray<string>
  readonly passThrough?: ReadonlyArray<string>
  readonly definitions?: ReadonlyArray<string>
  readonly registry?: OptionRegistry
}

export type ComposeInvocationSuccess = {
  readonly table?: PresetTable
  readonly resolved: ResolvedOptionSet
  readonly invocation: Invocation
}

/**
 * Parses the preset documents, resolves the preset (or the bare command line
 * when no preset is named) and builds the driver invocation. Any failure is
 * thrown as a core error before an invocation exists.
 */
export const composeInvocation = ({
  mode,
  presetName,
  documents = [],
  tokens = [],
  passThrough = [],
  definitions = [],
  registry = defaultOptionRegistry,
}: ComposeInvocationInput): ComposeInvocationSuccess => {
  const commandLine = parseCommandLineOptions({ tokens, registry })
  const substitutions = parseDefinitions(definitions)

  if (presetName === undefined) {
    const resolved = resolveDirect({ mode, registry, commandLine, passThrough })
    return { resolved, invocation: buildInvocation({ resolved, registry }) }
  }

  const table = buildPresetTable(documents.map((document) => parsePresetDocument(document)))
  const resolved = resolvePreset({
    presetName,
    mode,
    table,
    registry,
    commandLine,
    passThrough,
    substitutions,
  })

  return { table, resolved, invocation: buildInvocation({ resolved, registry }) }
}
