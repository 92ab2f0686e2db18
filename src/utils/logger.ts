import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LoggerOptions = {
  readonly level?: LogLevel
  readonly prefix?: string
}

export type Logger = {
  readonly level: LogLevel
  readonly prefix: string
  readonly error: (message: string, error?: Error) => void
  readonly warn: (message: string) => void
  readonly info: (message: string) => void
  readonly debug: (message: string) => void
  readonly success: (message: string) => void
  readonly createChild: (prefix: string) => Logger
}

const isDebugEnabled = (): boolean => process.env.PRESET_COMPOSER_DEBUG === "true"

const resolveDefaultLevel = (): LogLevel => {
  if (isDebugEnabled()) {
    return LogLevel.DEBUG
  }
  if (process.env.PRESET_COMPOSER_VERBOSE === "true") {
    return LogLevel.INFO
  }
  return LogLevel.WARN
}

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? resolveDefaultLevel()
  const prefix = options.prefix ?? ""

  const format = (message: string): string => (prefix ? `${prefix} ${message}` : message)

  return {
    level,
    prefix,
    error(message: string, error?: Error): void {
      if (level >= LogLevel.ERROR) {
        console.error(chalk.red(format(`Error: ${message}`)))
        if (error && isDebugEnabled()) {
          console.error(chalk.gray(error.stack))
        }
      }
    },
    warn(message: string): void {
      if (level >= LogLevel.WARN) {
        console.warn(chalk.yellow(format(message)))
      }
    },
    info(message: string): void {
      if (level >= LogLevel.INFO) {
        console.log(format(message))
      }
    },
    debug(message: string): void {
      if (level >= LogLevel.DEBUG) {
        console.log(chalk.gray(format(`[DEBUG] ${message}`)))
      }
    },
    success(message: string): void {
      // always shown
      console.log(chalk.green(format(message)))
    },
    createChild(childPrefix: string): Logger {
      return createLogger({
        level,
        prefix: prefix ? `${prefix} ${childPrefix}` : childPrefix,
      })
    },
  }
}
