import { describe, expect, it } from "vitest"
import type { CommandLineOption } from "./command-line"
import { isCoreError } from "./errors"
import { buildPresetTable, parsePresetDocument, type PresetTable } from "./preset-parser"
import { defaultOptionRegistry as registry } from "./registry"
import { resolveDirect, resolvePreset } from "./resolver"

const PRESETS = [
  "[dev]",
  "jobs = 8",
  "clean",
  "repository = {{preset}}-src",
  "--",
  "sanitize=address",
  "[compose:dev]",
  "coverage",
  "build-variant = Release",
  "[configure:dev]",
  "auth-token-file = /etc/{{mode}}/token",
  "[compose:nightly]",
  "docs",
].join("\n")

const tableOf = (text: string): PresetTable => buildPresetTable([parsePresetDocument({ text, source: "p.ini" })])

const valuesOf = (options: ReadonlyMap<string, { readonly value: unknown }>): Record<string, unknown> => {
  return Object.fromEntries(Array.from(options.entries(), ([name, option]) => [name, option.value]))
}

const expectResolutionError = (run: () => unknown, expected: Record<string, unknown>): void => {
  try {
    run()
  } catch (error) {
    expect(isCoreError(error)).toBe(true)
    expect(error).toMatchObject({ kind: "resolution", ...expected })
    return
  }
  throw new Error("expected a core error")
}

describe("resolvePreset", () => {
  const table = tableOf(PRESETS)

  it("merges the shared and compose sections", () => {
    const resolved = resolvePreset({ presetName: "dev", mode: "compose", table, registry })

    expect(resolved.preset).toBe("dev")
    expect(resolved.mode).toBe("compose")
    expect(valuesOf(resolved.options)).toEqual({
      jobs: 8,
      clean: true,
      repository: "dev-src",
      coverage: true,
      "build-variant": "Release",
    })
    expect(resolved.passThrough).toEqual(["--sanitize=address"])
  })

  it("records where each option came from", () => {
    const resolved = resolvePreset({ presetName: "dev", mode: "compose", table, registry })

    expect(resolved.options.get("jobs")).toEqual({ name: "jobs", value: 8, origin: "preset", location: "p.ini:2" })
    expect(resolved.options.get("coverage")).toEqual({
      name: "coverage",
      value: true,
      origin: "mode-preset",
      location: "p.ini:8",
    })
  })

  it("uses the configure section in configure mode", () => {
    const resolved = resolvePreset({ presetName: "dev", mode: "configure", table, registry })

    expect(valuesOf(resolved.options)).toEqual({
      jobs: 8,
      clean: true,
      repository: "dev-src",
      "auth-token-file": "/etc/configure/token",
    })
  })

  it("lets the command line override and negate preset options", () => {
    const commandLine: CommandLineOption[] = [
      { name: "jobs", value: "2", negated: false },
      { name: "clean", negated: true },
      { name: "ninja", negated: false },
    ]

    const resolved = resolvePreset({
      presetName: "dev",
      mode: "compose",
      table,
      registry,
      commandLine,
      passThrough: ["--trace"],
    })

    expect(resolved.options.get("jobs")).toEqual({ name: "jobs", value: 2, origin: "command-line" })
    expect(resolved.options.has("clean")).toBe(false)
    expect(resolved.options.get("ninja")?.value).toBe(true)
    expect(resolved.passThrough).toEqual(["--sanitize=address", "--trace"])
  })

  it("expands caller definitions and lets them override built-ins", () => {
    const text = "[dev]\nrepository = {{branch}}\ninstall-prefix = /opt/{{preset}}\n"

    const resolved = resolvePreset({
      presetName: "dev",
      mode: "compose",
      table: tableOf(text),
      registry,
      substitutions: new Map([
        ["branch", "main"],
        ["preset", "custom"],
      ]),
    })

    expect(valuesOf(resolved.options)).toEqual({ repository: "main", "install-prefix": "/opt/custom" })
  })

  it("reports an unknown preset with the shared presets available", () => {
    expectResolutionError(() => resolvePreset({ presetName: "nightly", mode: "compose", table, registry }), {
      code: "PRESET_NOT_FOUND",
      message: 'Preset "nightly" not found',
      details: { preset: "nightly", availablePresets: ["dev"], files: ["p.ini"] },
    })
  })

  it("rejects an option set by both sections", () => {
    const text = "[dev]\njobs = 8\n[compose:dev]\njobs = 4\n"

    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "compose", table: tableOf(text), registry }),
      {
        code: "DUPLICATE_OPTION",
        message: 'Option "jobs" is set by both [dev] and [compose:dev]',
        path: "compose:dev.jobs",
        line: 4,
        details: { option: "jobs", locations: ["p.ini:2", "p.ini:4"] },
      },
    )
  })

  it("rejects an option given twice in one section", () => {
    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "compose", table: tableOf("[dev]\ndebug\ndebug\n"), registry }),
      {
        code: "DUPLICATE_OPTION",
        message: 'Option "debug" is set by both [dev] and [dev]',
        path: "dev.debug",
        line: 3,
        details: { option: "debug", locations: ["p.ini:2", "p.ini:3"] },
      },
    )
  })

  describe("with shared flags and a compose-only flag", () => {
    const flags = tableOf(
      ["[dev]", "test", "benchmark", "debug", "ninja", "[compose:dev]", "developer-build", "[configure:dev]", "debug"].join(
        "\n",
      ),
    )

    it("adds the compose flag to the shared ones", () => {
      const resolved = resolvePreset({ presetName: "dev", mode: "compose", table: flags, registry })

      expect(valuesOf(resolved.options)).toEqual({
        test: true,
        benchmark: true,
        debug: true,
        ninja: true,
        "developer-build": true,
      })
      expect(resolved.passThrough).toEqual([])
    })

    it("rejects the configure section repeating a shared flag", () => {
      expectResolutionError(() => resolvePreset({ presetName: "dev", mode: "configure", table: flags, registry }), {
        code: "DUPLICATE_OPTION",
        message: 'Option "debug" is set by both [dev] and [configure:dev]',
        path: "configure:dev.debug",
        line: 9,
        details: { option: "debug", locations: ["p.ini:4", "p.ini:9"] },
      })
    })
  })

  it("keeps the dashes written on pass-through lines", () => {
    const resolved = resolvePreset({
      presetName: "dev",
      mode: "compose",
      table: tableOf("[dev]\n--\n--foo\n-j4\nbar=1\n--mode={{mode}}\n"),
      registry,
    })

    expect(resolved.passThrough).toEqual(["--foo", "-j4", "--bar=1", "--mode=compose"])
  })

  it("ignores the other mode's section when looking for duplicates", () => {
    const text = "[dev]\njobs = 8\n[configure:dev]\njobs = 4\n"

    const resolved = resolvePreset({ presetName: "dev", mode: "compose", table: tableOf(text), registry })

    expect(valuesOf(resolved.options)).toEqual({ jobs: 8 })
  })

  it("rejects unknown options before expanding their values", () => {
    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "compose", table: tableOf("[dev]\nturbo = {{x}}\n"), registry }),
      { code: "UNKNOWN_OPTION", path: "dev.turbo", source: "p.ini", line: 2 },
    )
  })

  it.each([
    ["[dev]\nclean = yes\n", "clean"],
    ["[dev]\nclean =\n", "clean"],
    ["[dev]\njobs\n", "jobs"],
    ["[dev]\njobs =\n", "jobs"],
  ])("rejects a value that does not match the option kind (%s)", (text, option) => {
    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "compose", table: tableOf(text), registry }),
      { code: "ARITY_MISMATCH", path: `dev.${option}` },
    )
  })

  it("rejects options of the other mode", () => {
    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "configure", table: tableOf("[dev]\ncoverage\n"), registry }),
      {
        code: "MODE_MISMATCH",
        message: 'Option "coverage" is only available in compose mode, not in configure mode',
      },
    )
  })

  it.each([
    ["jobs = 0", 'Invalid value "0" for option "jobs": must be at least 1'],
    ["jobs = four", 'Invalid value "four" for option "jobs": must be an integer'],
    ["jobs = 9007199254740993", 'Invalid value "9007199254740993" for option "jobs": must be a safe integer'],
    [
      "build-variant = Fast",
      'Invalid value "Fast" for option "build-variant": must be one of: Debug, Release, RelWithDebInfo, MinSizeRel',
    ],
  ])("rejects invalid values (%s)", (entry, message) => {
    expectResolutionError(
      () => resolvePreset({ presetName: "dev", mode: "compose", table: tableOf(`[dev]\n${entry}\n`), registry }),
      { code: "INVALID_VALUE", message },
    )
  })

  it("rejects placeholders without a value", () => {
    expectResolutionError(
      () =>
        resolvePreset({
          presetName: "dev",
          mode: "compose",
          table: tableOf("[dev]\nrepository = {{branch}}\n"),
          registry,
        }),
      {
        code: "UNDEFINED_PLACEHOLDER",
        message: 'Placeholder "{{branch}}" has no value. Available placeholders: mode, preset',
        details: { placeholder: "branch", available: ["mode", "preset"] },
      },
    )
  })

  it("validates command-line options against the mode", () => {
    expectResolutionError(
      () =>
        resolvePreset({
          presetName: "dev",
          mode: "configure",
          table,
          registry,
          commandLine: [{ name: "docs", negated: false }],
        }),
      { code: "MODE_MISMATCH", source: "command line", path: "docs" },
    )
  })

  it("validates command-line values", () => {
    expectResolutionError(
      () =>
        resolvePreset({
          presetName: "dev",
          mode: "compose",
          table,
          registry,
          commandLine: [{ name: "jobs", value: "many", negated: false }],
        }),
      { code: "INVALID_VALUE", source: "command line" },
    )
  })
})

describe("resolveDirect", () => {
  it("resolves the command line without a preset", () => {
    const resolved = resolveDirect({
      mode: "configure",
      registry,
      commandLine: [
        { name: "jobs", value: "3", negated: false },
        { name: "cmake-version", value: "3.28", negated: false },
      ],
      passThrough: ["--fresh"],
    })

    expect(resolved.preset).toBeUndefined()
    expect(valuesOf(resolved.options)).toEqual({ jobs: 3, "cmake-version": "3.28" })
    expect(resolved.passThrough).toEqual(["--fresh"])
  })
})
