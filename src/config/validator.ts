import * as YAML from "yaml"
import { z } from "zod"
import { ToolConfigSchema } from "../models/schema"
import type { ToolConfig } from "../models/types"
import { createValidationError, ErrorCodes } from "../utils/errors"

/**
 * Parse YAML text into a plain value
 * @throws {ValidationError} When YAML parsing fails
 */
const parseYAML = (yamlText: string, filePath?: string): unknown => {
  try {
    return YAML.parse(yamlText)
  } catch (error) {
    throw createValidationError("Failed to parse YAML", ErrorCodes.CONFIG_PARSE_ERROR, {
      filePath,
      parseError: error instanceof Error ? error.message : String(error),
      yamlSnippet: yamlText.substring(0, 200),
    })
  }
}

const describeExpectedType = (expected: string): string => {
  switch (expected) {
    case "array":
      return "a list"
    case "object":
      return "a mapping"
    default:
      return `a ${expected}`
  }
}

const formatZodIssues = (error: z.ZodError): Array<{ path: string; message: string; code: string }> => {
  return error.issues.map((issue) => {
    const path = issue.path.join(".")
    let message = issue.message

    if (issue.code === "unrecognized_keys") {
      message = `unknown field${issue.keys.length > 1 ? "s" : ""} ${issue.keys.join(", ")}`
    } else if (issue.code === "invalid_type" && issue.received === "undefined") {
      message = "field is required"
    } else if (issue.code === "invalid_type") {
      message = `must be ${describeExpectedType(issue.expected)}`
    } else if (issue.code === "too_small" && issue.type === "string") {
      message = "must not be empty"
    }

    return {
      path,
      message: path.length > 0 ? `${path}: ${message}` : message,
      code: issue.code,
    }
  })
}

/**
 * Validates YAML text of the tool configuration file.
 * An empty document is an empty configuration.
 * @throws {ValidationError} When the YAML is malformed or does not match the schema
 */
export const validateConfigYAML = (yamlText: string, filePath?: string): ToolConfig => {
  const parsed = parseYAML(yamlText, filePath)

  if (parsed === null || parsed === undefined) {
    return {}
  }

  const result = ToolConfigSchema.safeParse(parsed)
  if (result.success) {
    return result.data
  }

  const issues = formatZodIssues(result.error)
  const primaryMessage = issues[0]?.message ?? "Configuration validation failed"

  throw createValidationError(`Invalid configuration: ${primaryMessage}`, ErrorCodes.CONFIG_PARSE_ERROR, {
    filePath,
    errors: issues.map((issue) => issue.message),
  })
}
