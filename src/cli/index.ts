import { Command, CommanderError } from "commander"
import { createRequire } from "module"
import { createConfigLoader as defaultCreateConfigLoader, type ConfigLoader, type ConfigLoaderOptions } from "../config/loader"
import type { CommandExecutor } from "../contracts"
import { createPrintExecutor, createRealExecutor } from "../executor/index"
import type { Mode } from "../models/types"
import { createLogger, type Logger } from "../utils/logger"
import { collect, splitPassThrough } from "./command-helpers"
import { createCliErrorHandlers } from "./error-handling"
import { loadPackageVersion } from "./package-version"
import { executeMode } from "./preset-execution"
import { listOptions, listPresets } from "./runtime-and-list"

export type CLIOptions = {
  readonly createCommandExecutor?: (options: { verbose: boolean; printOnly: boolean }) => CommandExecutor
  readonly createConfigLoader?: (options: ConfigLoaderOptions) => ConfigLoader
  readonly output?: (line: string) => void
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
}

export type CLI = {
  run(args?: string[]): Promise<number>
}

type GlobalOptions = {
  readonly config?: string
  readonly driver?: string
}

type ModeCommandOptions = {
  readonly name?: string
  readonly preset?: string
  readonly file?: string[]
  readonly define?: string[]
  readonly printInvocation?: boolean
}

export const createCli = (options: CLIOptions = {}): CLI => {
  const output = options.output ?? ((line: string): void => console.log(line))
  const createConfigLoader = options.createConfigLoader ?? defaultCreateConfigLoader
  const createCommandExecutor =
    options.createCommandExecutor ??
    ((opts: { verbose: boolean; printOnly: boolean }): CommandExecutor => {
      if (opts.printOnly) {
        return createPrintExecutor({ verbose: opts.verbose, output })
      }
      return createRealExecutor({ verbose: opts.verbose })
    })

  const require = createRequire(import.meta.url)
  const version = loadPackageVersion(require)
  let logger: Logger = createLogger()
  const errorHandlers = createCliErrorHandlers({
    getLogger: () => logger,
  })

  const buildConfigLoader = (globals: GlobalOptions): ConfigLoader => {
    return createConfigLoader({
      configPaths: typeof globals.config === "string" && globals.config.length > 0 ? [globals.config] : undefined,
      cwd: options.cwd,
      env: options.env,
    })
  }

  const buildProgram = (passThrough: ReadonlyArray<string>, setExitCode: (code: number) => void): Command => {
    const program = new Command()
    program.exitOverride()
    program.configureOutput({
      writeOut: (text) => output(text.trimEnd()),
    })

    program
      .name("preset-composer")
      .description("Expand named option presets into build driver invocations")
      .version(version, "-v, --version", "Show version")
      .helpOption("-h, --help", "Show help")

    program.option("--config <path>", "Path to configuration file")
    program.option("--driver <command>", "Build driver to run instead of the configured one")

    const addModeCommand = (mode: Mode, description: string): void => {
      program
        .command(mode)
        .description(description)
        .allowUnknownOption()
        .argument("[options...]", "Build options, for example --jobs 4 --clean")
        .option("-n, --name <preset>", "Preset to expand")
        .option("--preset <preset>", "Alias of --name")
        .option("-f, --file <path>", "Preset file (repeatable)", collect)
        .option("-D, --define <key=value>", "Value for a {{key}} placeholder (repeatable)", collect)
        .option("--print-invocation", "Print the expanded command instead of running it", false)
        .action(async (tokens: string[], commandOptions: ModeCommandOptions) => {
          const globals = program.opts<GlobalOptions>()
          const exitCode = await executeMode({
            mode,
            tokens,
            passThrough,
            options: {
              presetName: commandOptions.name ?? commandOptions.preset,
              files: commandOptions.file ?? [],
              definitions: commandOptions.define ?? [],
              printInvocation: commandOptions.printInvocation === true,
              driver: globals.driver,
            },
            configLoader: buildConfigLoader(globals),
            createCommandExecutor,
            logger,
            setLogger: (next) => {
              logger = next
            },
            handleError: errorHandlers.handleError,
            handlePipelineFailure: errorHandlers.handlePipelineFailure,
          })
          setExitCode(exitCode)
        })
    }

    addModeCommand("configure", "Run the configure step with a preset")
    addModeCommand("compose", "Run the compose step with a preset")

    program
      .command("list")
      .description("List available presets")
      .option("-f, --file <path>", "Preset file (repeatable)", collect)
      .action(async (commandOptions: { file?: string[] }) => {
        const exitCode = await listPresets({
          cliFiles: commandOptions.file ?? [],
          configLoader: buildConfigLoader(program.opts<GlobalOptions>()),
          logger,
          onError: errorHandlers.handlePipelineFailure,
          output,
        })
        setExitCode(exitCode)
      })

    program
      .command("options")
      .description("List the options a mode accepts")
      .argument("[mode]", "configure or compose")
      .action((mode: string | undefined) => {
        setExitCode(
          listOptions({
            mode,
            onError: errorHandlers.handleError,
            output,
          }),
        )
      })

    return program
  }

  const run = async (args: string[] = process.argv.slice(2)): Promise<number> => {
    let exitCode = 0
    logger = createLogger()

    const { head, passThrough } = splitPassThrough(args)
    const program = buildProgram(passThrough, (code) => {
      exitCode = code
    })

    try {
      await program.parseAsync(head, { from: "user" })
    } catch (error) {
      if (error instanceof CommanderError) {
        // Commander claims a value such as "-n" even after a build option.
        if (error.code === "commander.optionMissingArgument") {
          logger.warn('Attach build option values that start with "-" with "=", for example --repository=-n')
        }
        return error.exitCode
      }
      return errorHandlers.handleError(error)
    }

    return exitCode
  }

  return { run }
}
