import { execa } from "execa"
import type { CommandExecutor, DriverCommand } from "../contracts"
import { createDriverError, ErrorCodes } from "../utils/errors"
import { createLogger, LogLevel } from "../utils/logger"
import { formatCommand } from "./command-format"

export type RealExecutorOptions = {
  readonly verbose?: boolean
}

const readExitCode = (error: unknown): number | undefined => {
  if (typeof error === "object" && error !== null && "exitCode" in error && typeof error.exitCode === "number") {
    return error.exitCode
  }
  return undefined
}

export const createRealExecutor = (options: RealExecutorOptions = {}): CommandExecutor => {
  const verbose = options.verbose ?? false
  const logger = createLogger({
    level: verbose ? LogLevel.INFO : LogLevel.WARN,
    prefix: "[driver]",
  })

  const execute = async (driverCommand: DriverCommand): Promise<number> => {
    const commandString = formatCommand(driverCommand)
    logger.info(`Executing: ${commandString}`)

    try {
      await execa(driverCommand.command, [...driverCommand.args], { stdio: "inherit" })
      return 0
    } catch (error) {
      throw createDriverError("Build driver failed", ErrorCodes.DRIVER_FAILED, {
        command: commandString,
        exitCode: readExitCode(error),
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  return {
    execute,
    isPrintOnly(): boolean {
      return false
    },
  }
}
