import fs from "fs-extra"
import { CoreErrorCodes, createCoreError, type ParsePresetDocumentInput } from "../core/index"

/**
 * Reads preset files synchronously in the order given.
 * @throws {CoreError} `file` errors for missing or unreadable paths
 */
export const readPresetFiles = (filePaths: ReadonlyArray<string>): ParsePresetDocumentInput[] => {
  return filePaths.map((filePath) => ({
    source: filePath,
    text: readPresetFile(filePath),
  }))
}

const readPresetFile = (filePath: string): string => {
  if (!fs.existsSync(filePath)) {
    throw createCoreError("file", {
      code: CoreErrorCodes.PRESET_FILE_NOT_FOUND,
      message: `Preset file not found: ${filePath}`,
      source: filePath,
      details: { filePath },
    })
  }

  try {
    return fs.readFileSync(filePath, "utf8")
  } catch (error) {
    throw createCoreError("file", {
      code: CoreErrorCodes.PRESET_FILE_UNREADABLE,
      message: `Failed to read preset file: ${filePath}`,
      source: filePath,
      details: {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      },
    })
  }
}
