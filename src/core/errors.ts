export type CoreErrorKind = "file" | "parse" | "resolution" | "invocation"

export type CoreError = {
  readonly kind: CoreErrorKind
  readonly code: string
  readonly message: string
  readonly source?: string
  readonly line?: number
  readonly path?: string
  readonly details?: Readonly<Record<string, unknown>>
}

export const CoreErrorCodes = {
  PRESET_FILE_NOT_FOUND: "PRESET_FILE_NOT_FOUND",
  PRESET_FILE_UNREADABLE: "PRESET_FILE_UNREADABLE",
  DUPLICATE_PRESET_SECTION: "DUPLICATE_PRESET_SECTION",
  MALFORMED_SECTION_HEADER: "MALFORMED_SECTION_HEADER",
  ENTRY_OUTSIDE_SECTION: "ENTRY_OUTSIDE_SECTION",
  MALFORMED_ENTRY: "MALFORMED_ENTRY",
  PRESET_NOT_FOUND: "PRESET_NOT_FOUND",
  DUPLICATE_OPTION: "DUPLICATE_OPTION",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  ARITY_MISMATCH: "ARITY_MISMATCH",
  MODE_MISMATCH: "MODE_MISMATCH",
  INVALID_VALUE: "INVALID_VALUE",
  UNDEFINED_PLACEHOLDER: "UNDEFINED_PLACEHOLDER",
  UNEXPECTED_ARGUMENT: "UNEXPECTED_ARGUMENT",
  INVALID_DEFINITION: "INVALID_DEFINITION",
  DUPLICATE_REGISTRY_OPTION: "DUPLICATE_REGISTRY_OPTION",
  UNREGISTERED_OPTION: "UNREGISTERED_OPTION",
  KIND_MISMATCH: "KIND_MISMATCH",
} as const

export const createCoreError = (
  kind: CoreErrorKind,
  error: {
    readonly code: string
    readonly message: string
    readonly source?: string
    readonly line?: number
    readonly path?: string
    readonly details?: Readonly<Record<string, unknown>>
  },
): CoreError => ({
  kind,
  code: error.code,
  message: error.message,
  source: error.source,
  line: error.line,
  path: error.path,
  details: error.details,
})

export const isCoreError = (value: unknown): value is CoreError => {
  if (typeof value !== "object" || value === null) {
    return false
  }
  const candidate = value as Partial<CoreError>
  return (
    (candidate.kind === "file" ||
      candidate.kind === "parse" ||
      candidate.kind === "resolution" ||
      candidate.kind === "invocation") &&
    typeof candidate.code === "string" &&
    typeof candidate.message === "string"
  )
}

/**
 * Formats `source` and `line` as `file:line` for messages.
 */
export const formatLocation = (error: Pick<CoreError, "source" | "line">): string | undefined => {
  if (typeof error.source !== "string" || error.source.length === 0) {
    return undefined
  }
  return typeof error.line === "number" ? `${error.source}:${error.line}` : error.source
}
