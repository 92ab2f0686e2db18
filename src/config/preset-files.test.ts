import fs from "fs-extra"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { isCoreError } from "../core/index"
import { readPresetFiles } from "./preset-files"

describe("readPresetFiles", () => {
  let workspace: string

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), "preset-composer-presets-"))
  })

  afterEach(async () => {
    await fs.remove(workspace)
  })

  it("reads files in the order given", async () => {
    const first = path.join(workspace, "b.ini")
    const second = path.join(workspace, "a.ini")
    await fs.writeFile(first, "[dev]\nclean\n")
    await fs.writeFile(second, "[release]\n")

    expect(readPresetFiles([first, second])).toEqual([
      { source: first, text: "[dev]\nclean\n" },
      { source: second, text: "[release]\n" },
    ])
  })

  it("reports a missing file as a file error", () => {
    const missing = path.join(workspace, "missing.ini")

    expect.assertions(2)
    try {
      readPresetFiles([missing])
    } catch (error) {
      expect(isCoreError(error)).toBe(true)
      expect(error).toMatchObject({
        kind: "file",
        code: "PRESET_FILE_NOT_FOUND",
        message: `Preset file not found: ${missing}`,
        details: { filePath: missing },
      })
    }
  })
})
