import { describe, it, expect } from "vitest"
import {
  createConfigError,
  createDriverError,
  createValidationError,
  formatError,
  formatErrorDetails,
  isComposerError,
  ErrorCodes,
} from "./errors"

describe("error helpers", () => {
  it("creates configuration errors with metadata", () => {
    const error = createConfigError("Configuration file not found", ErrorCodes.CONFIG_NOT_FOUND, {
      searchPaths: ["/path1", "/path2"],
    })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("ConfigError")
    expect(error.code).toBe(ErrorCodes.CONFIG_NOT_FOUND)
    expect(error.details).toEqual({ searchPaths: ["/path1", "/path2"] })
    expect(isComposerError(error)).toBe(true)
  })

  it("creates validation errors", () => {
    const error = createValidationError("Invalid configuration", ErrorCodes.CONFIG_PARSE_ERROR, {
      errors: ["driver: field is required"],
    })

    expect(error.name).toBe("ValidationError")
    expect(error.details.errors).toEqual(["driver: field is required"])
  })

  it("creates driver errors", () => {
    const error = createDriverError("Build driver failed", ErrorCodes.DRIVER_FAILED, {
      command: "./build.sh compose",
      exitCode: 2,
    })

    expect(error.name).toBe("DriverError")
    expect(error.details.exitCode).toBe(2)
  })

  it("does not treat plain errors as tool errors", () => {
    expect(isComposerError(new Error("plain"))).toBe(false)
    expect(isComposerError({ code: "X", details: {} })).toBe(false)
  })
})

describe("formatError", () => {
  it("lists the searched locations for a missing configuration", () => {
    const error = createConfigError("Configuration file not found", ErrorCodes.CONFIG_NOT_FOUND, {
      searchPaths: ["/a/config.yml", "/b/config.yml"],
    })

    expect(formatError(error)).toBe(
      "Error: Configuration file not found\n\nSearched in the following locations:\n  - /a/config.yml\n  - /b/config.yml",
    )
  })

  it("renders the command and exit code of a failed driver", () => {
    const error = createDriverError("Build driver failed", ErrorCodes.DRIVER_FAILED, {
      command: "./build.sh compose",
      exitCode: 3,
    })

    expect(formatErrorDetails(error)).toBe('\nCommand: "./build.sh compose"\nexit code: 3')
  })

  it("renders the file and validation errors", () => {
    const error = createValidationError("Invalid configuration", ErrorCodes.CONFIG_PARSE_ERROR, {
      filePath: "/p/config.yml",
      errors: ["presetFiles: must be a list"],
    })

    expect(formatError(error)).toBe(
      "Error: Invalid configuration\nfile: /p/config.yml\nValidation errors:\n  - presetFiles: must be a list\n",
    )
  })

  it("uses the error name for other errors", () => {
    expect(formatError(new TypeError("bad input"))).toBe("TypeError: bad input")
  })
})
