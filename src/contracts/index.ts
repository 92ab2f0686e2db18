export type { CommandExecutor, DriverCommand } from "./command-executor"
