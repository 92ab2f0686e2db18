import type { ConfigLoader, LoadedConfig } from "../config/loader"
import { readPresetFiles } from "../config/preset-files"
import { buildPresetTable, defaultOptionRegistry, parsePresetDocument, type OptionRegistry } from "../core/index"
import { ModeSchema } from "../models/schema"
import { createConfigError, createValidationError, ErrorCodes } from "../utils/errors"
import type { Logger } from "../utils/logger"
import { describePresets, renderOptionList, renderPresetList } from "./command-helpers"

/**
 * Preset files given with `--file` replace the configured list.
 */
export const selectPresetFiles = ({
  cliFiles,
  config,
}: {
  readonly cliFiles: ReadonlyArray<string>
  readonly config: LoadedConfig
}): ReadonlyArray<string> => {
  return cliFiles.length > 0 ? cliFiles : config.presetFiles
}

export const requirePresetFiles = (files: ReadonlyArray<string>, config: LoadedConfig): void => {
  if (files.length === 0) {
    throw createConfigError("No preset files given", ErrorCodes.NO_PRESET_FILES, {
      configSources: config.sources,
    })
  }
}

export const listPresets = async ({
  cliFiles,
  configLoader,
  logger,
  onError,
  output = (line: string): void => console.log(line),
}: {
  readonly cliFiles: ReadonlyArray<string>
  readonly configLoader: ConfigLoader
  readonly logger: Logger
  readonly onError: (error: unknown) => number
  readonly output?: (line: string) => void
}): Promise<number> => {
  try {
    const config = await configLoader.loadConfig()
    const files = selectPresetFiles({ cliFiles, config })
    requirePresetFiles(files, config)

    const table = buildPresetTable(readPresetFiles(files).map((document) => parsePresetDocument(document)))
    const presets = describePresets(table)

    if (presets.length === 0) {
      logger.warn("No presets defined")
      return 0
    }

    renderPresetList(presets, output)
    return 0
  } catch (error) {
    return onError(error)
  }
}

export const listOptions = ({
  mode,
  registry = defaultOptionRegistry,
  onError,
  output = (line: string): void => console.log(line),
}: {
  readonly mode?: string
  readonly registry?: OptionRegistry
  readonly onError: (error: unknown) => number
  readonly output?: (line: string) => void
}): number => {
  try {
    if (mode === undefined) {
      renderOptionList(registry.list(), output)
      return 0
    }

    const parsed = ModeSchema.safeParse(mode)
    if (!parsed.success) {
      throw createValidationError(`Unknown mode "${mode}"`, ErrorCodes.INVALID_MODE, {
        errors: [`mode must be one of: ${ModeSchema.options.join(", ")}`],
      })
    }

    renderOptionList(registry.list(parsed.data), output)
    return 0
  } catch (error) {
    return onError(error)
  }
}
