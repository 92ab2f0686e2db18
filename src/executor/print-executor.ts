import type { CommandExecutor, DriverCommand } from "../contracts"
import { createLogger, LogLevel } from "../utils/logger"
import { formatCommand } from "./command-format"

export type PrintExecutorOptions = {
  readonly verbose?: boolean
  readonly output?: (line: string) => void
}

/**
 * Prints the expanded driver command instead of running it.
 */
export const createPrintExecutor = (options: PrintExecutorOptions = {}): CommandExecutor => {
  const verbose = options.verbose ?? false
  const output = options.output ?? ((line: string): void => console.log(line))
  const logger = createLogger({
    level: verbose ? LogLevel.INFO : LogLevel.WARN,
    prefix: "[driver] [PRINT ONLY]",
  })

  return {
    async execute(driverCommand: DriverCommand): Promise<number> {
      const commandString = formatCommand(driverCommand)
      logger.info(`Would execute: ${commandString}`)
      output(commandString)
      return 0
    },
    isPrintOnly(): boolean {
      return true
    },
  }
}
