import { formatLocation, isCoreError, type CoreError } from "../core/index"
import { ErrorCodes, formatErrorDetails, isComposerError } from "../utils/errors"
import type { Logger } from "../utils/logger"

type CliErrorHandlers = {
  handleCoreError: (error: CoreError) => number
  handleError: (error: unknown) => number
  handlePipelineFailure: (error: unknown) => number
}

const toStringList = (value: unknown): string[] => {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : []
}

export const createCliErrorHandlers = ({ getLogger }: { getLogger: () => Logger }): CliErrorHandlers => {
  const handleCoreError = (error: CoreError): number => {
    const header = [`[${error.kind}]`, `[${error.code}]`]
    if (typeof error.path === "string" && error.path.length > 0) {
      header.push(`[${error.path}]`)
    }

    const lines = [`${header.join(" ")} ${error.message}`.trim()]

    const location = formatLocation(error)
    if (location !== undefined) {
      lines.push(`source: ${location}`)
    }

    const files = toStringList(error.details?.files)
    if (files.length > 0) {
      lines.push(`files: ${files.join(", ")}`)
    }

    const locations = toStringList(error.details?.locations)
    if (locations.length > 0) {
      lines.push(`locations: ${locations.join(", ")}`)
    }

    const availablePresets = toStringList(error.details?.availablePresets)
    if (error.details?.availablePresets !== undefined) {
      lines.push(`available presets: ${availablePresets.length > 0 ? availablePresets.join(", ") : "(none)"}`)
    }

    getLogger().error(lines.join("\n"))
    return 1
  }

  const handleError = (error: unknown): number => {
    if (isComposerError(error)) {
      getLogger().error(`${error.message}${formatErrorDetails(error)}`, error)
      const exitCode = error.details.exitCode
      if (error.code === ErrorCodes.DRIVER_FAILED && typeof exitCode === "number" && exitCode > 0) {
        return exitCode
      }
      return 1
    }

    if (error instanceof Error) {
      getLogger().error(error.message, error)
    } else {
      getLogger().error("An unexpected error occurred")
    }

    return 1
  }

  const handlePipelineFailure = (error: unknown): number => {
    if (isCoreError(error)) {
      return handleCoreError(error)
    }
    return handleError(error)
  }

  return {
    handleCoreError,
    handleError,
    handlePipelineFailure,
  }
}
