export type ComposerError = Error & {
  readonly code: string
  readonly details: Readonly<Record<string, unknown>>
}

export const ErrorCodes = {
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_ERROR: "CONFIG_PARSE_ERROR",
  CONFIG_PERMISSION_ERROR: "CONFIG_PERMISSION_ERROR",
  NO_PRESET_FILES: "NO_PRESET_FILES",
  PRESET_REQUIRED: "PRESET_REQUIRED",
  DRIVER_NOT_CONFIGURED: "DRIVER_NOT_CONFIGURED",
  DRIVER_FAILED: "DRIVER_FAILED",
  INVALID_MODE: "INVALID_MODE",
} as const

const createBaseError = (
  name: string,
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): ComposerError => {
  const error = new Error(message)
  error.name = name
  return Object.assign(error, { code, details })
}

export const createConfigError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): ComposerError => {
  return createBaseError("ConfigError", message, code, details)
}

export const createValidationError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): ComposerError => {
  return createBaseError("ValidationError", message, code, details)
}

export const createDriverError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): ComposerError => {
  return createBaseError("DriverError", message, code, details)
}

export const isComposerError = (error: unknown): error is ComposerError => {
  if (!(error instanceof Error)) {
    return false
  }

  if (!("code" in error) || typeof error.code !== "string") {
    return false
  }

  return "details" in error && typeof error.details === "object" && error.details !== null
}

const formatters: Record<string, (error: ComposerError) => string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: (error) => {
    const searchPaths = error.details.searchPaths
    if (!Array.isArray(searchPaths)) {
      return ""
    }

    const lines = ["", "Searched in the following locations:"]
    searchPaths.forEach((location) => lines.push(`  - ${String(location)}`))
    return lines.join("\n")
  },
  [ErrorCodes.NO_PRESET_FILES]: () => {
    return (
      "\nPass one or more preset files with --file <path>,\n" +
      "or list them under presetFiles in .preset-composer/config.yml\n"
    )
  },
  [ErrorCodes.DRIVER_NOT_CONFIGURED]: () => {
    return (
      "\nSet driver.command in .preset-composer/config.yml, pass --driver <command>,\n" +
      "or use --print-invocation to only print the expanded command\n"
    )
  },
}

/**
 * Renders the hint and detail lines that follow an error's message.
 */
export const formatErrorDetails = (error: ComposerError): string => {
  let message = ""

  const formatter = formatters[error.code]
  if (formatter) {
    message += `\n${formatter(error)}`
  }

  const commandDetail = error.details.command
  if (commandDetail !== undefined) {
    message += `\nCommand: ${JSON.stringify(commandDetail)}`
  }

  const exitCodeDetail = error.details.exitCode
  if (exitCodeDetail !== undefined) {
    message += `\nexit code: ${String(exitCodeDetail)}`
  }

  const filePathDetail = error.details.filePath
  if (filePathDetail !== undefined) {
    message += `\nfile: ${String(filePathDetail)}`
  }

  const nestedErrors = error.details.errors
  if (Array.isArray(nestedErrors) && nestedErrors.length > 0) {
    message += "\nValidation errors:\n"
    nestedErrors.forEach((item) => {
      message += `  - ${String(item)}\n`
    })
  }

  return message
}

export const formatError = (error: Error): string => {
  if (!isComposerError(error)) {
    return `${error.name}: ${error.message}`
  }

  return `Error: ${error.message}${formatErrorDetails(error)}`
}
