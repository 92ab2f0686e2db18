export type DriverCommand = {
  readonly command: string
  readonly args: ReadonlyArray<string>
}

export type CommandExecutor = {
  readonly execute: (command: DriverCommand) => Promise<number>
  readonly isPrintOnly: () => boolean
}
