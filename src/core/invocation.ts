import { createHash } from "crypto"
import type { Mode } from "../models/types"
import { CoreErrorCodes, createCoreError } from "./errors"
import type { OptionRegistry } from "./registry"
import type { ResolvedOption, ResolvedOptionSet } from "./resolver"

type BuildInvocationInput = {
  readonly resolved: ResolvedOptionSet
  readonly registry: OptionRegistry
}

export type Invocation = {
  readonly mode: Mode
  readonly args: ReadonlyArray<string>
  readonly hash: string
}

export const PASS_THROUGH_SEPARATOR = "--"

/**
 * Turns a resolved option set into the driver's argument vector:
 * `[mode, ...options in registry order, "--", ...pass-through]`.
 */
export const buildInvocation = ({ resolved, registry }: BuildInvocationInput): Invocation => {
  const ordered = Array.from(resolved.options.values()).map((option) => {
    const index = registry.indexOf(option.name)
    if (index === -1) {
      throw createCoreError("invocation", {
        code: CoreErrorCodes.UNREGISTERED_OPTION,
        message: `Resolved option "${option.name}" is not in the option registry`,
        path: option.name,
        details: { option: option.name },
      })
    }
    return { index, option }
  })
  ordered.sort((left, right) => left.index - right.index)

  const args: string[] = [resolved.mode]
  for (const { option } of ordered) {
    args.push(...renderOption(option, registry))
  }

  if (resolved.passThrough.length > 0) {
    args.push(PASS_THROUGH_SEPARATOR, ...resolved.passThrough)
  }

  return {
    mode: resolved.mode,
    args,
    hash: createInvocationHash(args),
  }
}

const renderOption = (option: ResolvedOption, registry: OptionRegistry): string[] => {
  const definition = registry.lookup(option.name)
  const token = `--${option.name}`

  if (definition?.kind === "flag" && option.value === true) {
    return [token]
  }

  if (definition?.kind === "value" && option.value !== true) {
    return [token, String(option.value)]
  }

  throw createCoreError("invocation", {
    code: CoreErrorCodes.KIND_MISMATCH,
    message: `Resolved value of "${option.name}" does not match its registered kind`,
    path: option.name,
    details: { option: option.name, kind: definition?.kind, value: option.value },
  })
}

const createInvocationHash = (args: ReadonlyArray<string>): string => {
  const digest = createHash("sha256")
  digest.update(JSON.stringify(args))
  return digest.digest("hex")
}
