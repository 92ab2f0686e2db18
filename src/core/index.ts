export { createOptionRegistry, defaultOptionRegistry, appliesToMode } from "./registry"
export { parsePresetDocument, buildPresetTable, listPresetNames, toSectionKey } from "./preset-parser"
export { parseCommandLineOptions, parseDefinitions, COMMAND_LINE_SOURCE } from "./command-line"
export { resolvePreset, resolveDirect } from "./resolver"
export { buildInvocation, PASS_THROUGH_SEPARATOR } from "./invocation"
export { composeInvocation } from "./pipeline"

export type {
  FlagOptionDefinition,
  OptionDefinition,
  OptionRegistry,
  OptionValueType,
  ValueOptionDefinition,
} from "./registry"

export type {
  ParsePresetDocumentInput,
  PresetDocument,
  PresetEntry,
  PresetSection,
  PresetTable,
} from "./preset-parser"

export type { CommandLineOption } from "./command-line"

export type {
  OptionOrigin,
  ResolveDirectInput,
  ResolvePresetInput,
  ResolvedOption,
  ResolvedOptionSet,
  ResolvedValue,
} from "./resolver"

export type { Invocation } from "./invocation"

export type { ComposeInvocationInput, ComposeInvocationSuccess } from "./pipeline"

export type { CoreError, CoreErrorKind } from "./errors"
export { CoreErrorCodes, createCoreError, formatLocation, isCoreError } from "./errors"
