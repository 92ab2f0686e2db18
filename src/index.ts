#!/usr/bin/env node
import { createCli } from "./cli/index"
import { formatError } from "./utils/errors"

const cli = createCli()

cli
  .run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? formatError(error) : `Error: ${String(error)}`)
    process.exitCode = 1
  })
