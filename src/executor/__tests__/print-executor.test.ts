import { describe, expect, it, vi } from "vitest"
import { createPrintExecutor } from "../print-executor"

describe("createPrintExecutor", () => {
  it("prints the command line instead of running it", async () => {
    const output = vi.fn()
    const executor = createPrintExecutor({ output })

    const exitCode = await executor.execute({ command: "./build.sh", args: ["compose", "--repository", "my repo"] })

    expect(exitCode).toBe(0)
    expect(output).toHaveBeenCalledTimes(1)
    expect(output).toHaveBeenCalledWith("./build.sh compose --repository 'my repo'")
    expect(executor.isPrintOnly()).toBe(true)
  })
})
