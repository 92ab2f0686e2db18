import type { ConfigLoader } from "../config/loader"
import { readPresetFiles } from "../config/preset-files"
import type { CommandExecutor } from "../contracts"
import { composeInvocation, type ComposeInvocationSuccess, type ParsePresetDocumentInput } from "../core/index"
import type { Mode } from "../models/types"
import { createConfigError, createValidationError, ErrorCodes } from "../utils/errors"
import { createLogger, LogLevel, type Logger } from "../utils/logger"
import { formatCommand } from "../executor/command-format"
import { resolveDriver, toDriverCommand } from "./command-helpers"
import { requirePresetFiles, selectPresetFiles } from "./runtime-and-list"

export type ModeCliOptions = {
  readonly presetName?: string
  readonly files: ReadonlyArray<string>
  readonly definitions: ReadonlyArray<string>
  readonly printInvocation: boolean
  readonly driver?: string
}

type ExecuteModeInput = {
  readonly mode: Mode
  readonly tokens: ReadonlyArray<string>
  readonly passThrough: ReadonlyArray<string>
  readonly options: ModeCliOptions
  readonly configLoader: ConfigLoader
  readonly createCommandExecutor: (options: { verbose: boolean; printOnly: boolean }) => CommandExecutor
  readonly logger: Logger
  readonly setLogger: (logger: Logger) => void
  readonly handleError: (error: unknown) => number
  readonly handlePipelineFailure: (error: unknown) => number
}

// --file and --define only feed a preset.
const requirePresetForPresetOptions = (options: ModeCliOptions): void => {
  if (options.presetName !== undefined) {
    return
  }

  const given = [
    ...(options.files.length > 0 ? ["--file"] : []),
    ...(options.definitions.length > 0 ? ["--define"] : []),
  ]
  if (given.length > 0) {
    throw createValidationError(`${given.join(" and ")} can only be used with --name`, ErrorCodes.PRESET_REQUIRED, {
      options: given,
    })
  }
}

/**
 * Runs one `configure` or `compose` invocation: load configuration, read the
 * preset files, resolve, then hand the expanded command to the driver.
 */
export const executeMode = async ({
  mode,
  tokens,
  passThrough,
  options,
  configLoader,
  createCommandExecutor,
  logger: initialLogger,
  setLogger,
  handleError,
  handlePipelineFailure,
}: ExecuteModeInput): Promise<number> => {
  let logger = initialLogger

  try {
    requirePresetForPresetOptions(options)

    const config = await configLoader.loadConfig()
    if (config.sources.length > 0) {
      logger.debug(`Configuration: ${config.sources.join(", ")}`)
    }

    let files: ReadonlyArray<string> = []
    if (options.presetName !== undefined) {
      files = selectPresetFiles({ cliFiles: options.files, config })
      requirePresetFiles(files, config)
    }

    let result: ComposeInvocationSuccess
    try {
      const documents: ParsePresetDocumentInput[] = readPresetFiles(files)
      result = composeInvocation({
        mode,
        presetName: options.presetName,
        documents,
        tokens,
        passThrough,
        definitions: options.definitions,
      })
    } catch (error) {
      return handlePipelineFailure(error)
    }

    // A resolved --verbose also makes this tool chatty.
    if (result.resolved.options.has("verbose") && logger.level < LogLevel.INFO) {
      logger = createLogger({ level: LogLevel.INFO })
      setLogger(logger)
    }

    const verbose = logger.level >= LogLevel.INFO
    const driver = resolveDriver({ configured: config.driver, override: options.driver })
    if (driver === undefined && !options.printInvocation) {
      throw createConfigError("No build driver configured", ErrorCodes.DRIVER_NOT_CONFIGURED, {
        configSources: config.sources,
      })
    }

    const driverCommand = toDriverCommand({ driver, invocation: result.invocation })

    if (options.presetName !== undefined) {
      logger.info(`Using preset "${options.presetName}" (${mode}), which expands to\n\n${formatCommand(driverCommand)}\n`)
      logger.debug(`Preset files: ${files.join(", ")}`)
    }
    logger.debug(`Invocation hash: ${result.invocation.hash}`)

    const executor = createCommandExecutor({ verbose, printOnly: options.printInvocation })
    const exitCode = await executor.execute(driverCommand)
    if (exitCode === 0 && !executor.isPrintOnly()) {
      logger.success(`Build driver finished ${mode}`)
    }
    return exitCode
  } catch (error) {
    return handleError(error)
  }
}
