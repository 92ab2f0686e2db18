import type { Mode } from "../models/types"
import { ModeSchema } from "../models/schema"
import { CoreErrorCodes, createCoreError, type CoreError } from "./errors"

export type PresetEntry = {
  readonly name: string
  readonly value?: string
  readonly line: number
  readonly passThrough: boolean
}

export type PresetSection = {
  readonly key: string
  readonly preset: string
  readonly mode?: Mode
  readonly source: string
  readonly line: number
  readonly entries: ReadonlyArray<PresetEntry>
}

export type PresetDocument = {
  readonly source: string
  readonly sections: ReadonlyArray<PresetSection>
}

export type PresetTable = {
  readonly sections: ReadonlyMap<string, PresetSection>
  readonly files: ReadonlyArray<string>
}

export type ParsePresetDocumentInput = {
  readonly text: string
  readonly source: string
}

const PASS_THROUGH_MARKER = "--"
const INVALID_NAME_PATTERN = /[\s[\]:=]/

export const toSectionKey = (preset: string, mode?: Mode): string => {
  return mode === undefined ? preset : `${mode}:${preset}`
}

const isCommentLine = (line: string): boolean => line.startsWith("#") || line.startsWith(";")

type SectionHeader = {
  readonly preset: string
  readonly mode?: Mode
}

const parseSectionHeader = (
  line: string,
  context: { readonly source: string; readonly line: number },
): SectionHeader => {
  const malformed = (reason: string): CoreError =>
    parseError(CoreErrorCodes.MALFORMED_SECTION_HEADER, {
      message: `Malformed section header ${line}: ${reason}`,
      source: context.source,
      line: context.line,
      details: { header: line },
    })

  if (!line.endsWith("]")) {
    throw malformed("missing closing bracket")
  }

  const body = line.slice(1, -1).trim()
  const parts = body.split(":")
  if (parts.length > 2) {
    throw malformed("expected [name] or [mode:name]")
  }

  const [first = "", second] = parts.map((part) => part.trim())
  const name = second ?? first
  if (name.length === 0 || INVALID_NAME_PATTERN.test(name)) {
    throw malformed("preset name must be a non-empty word")
  }

  if (second === undefined) {
    return { preset: name }
  }

  const mode = ModeSchema.safeParse(first)
  if (!mode.success) {
    throw malformed(`unknown mode "${first}" (expected ${ModeSchema.options.join(" or ")})`)
  }

  return { preset: name, mode: mode.data }
}

type SectionBuilder = {
  readonly header: SectionHeader
  readonly line: number
  readonly entries: PresetEntry[]
  passThrough: boolean
}

/**
 * Parses the text of one preset file into its sections, in file order.
 * Entries keep their raw values; typing and validation happen in the resolver.
 */
export const parsePresetDocument = ({ text, source }: ParsePresetDocumentInput): PresetDocument => {
  const builders: SectionBuilder[] = []
  const seen = new Map<string, number>()
  let current: SectionBuilder | undefined

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const lineNumber = index + 1
    const line = rawLine.trim()

    if (line.length === 0 || isCommentLine(line)) {
      return
    }

    if (line.startsWith("[")) {
      const header = parseSectionHeader(line, { source, line: lineNumber })
      const key = toSectionKey(header.preset, header.mode)
      const previousLine = seen.get(key)
      if (previousLine !== undefined) {
        throw parseError(CoreErrorCodes.DUPLICATE_PRESET_SECTION, {
          message: `Duplicate preset section [${key}] (first defined on line ${previousLine})`,
          source,
          line: lineNumber,
          path: key,
          details: { section: key, firstLine: previousLine },
        })
      }
      seen.set(key, lineNumber)
      current = { header, line: lineNumber, entries: [], passThrough: false }
      builders.push(current)
      return
    }

    if (current === undefined) {
      throw parseError(CoreErrorCodes.ENTRY_OUTSIDE_SECTION, {
        message: `Entry "${line}" appears before any section header`,
        source,
        line: lineNumber,
      })
    }

    if (line === PASS_THROUGH_MARKER) {
      current.passThrough = true
      return
    }

    current.entries.push(parseEntry(line, { source, line: lineNumber, passThrough: current.passThrough }))
  })

  return {
    source,
    sections: builders.map((builder) => ({
      key: toSectionKey(builder.header.preset, builder.header.mode),
      preset: builder.header.preset,
      mode: builder.header.mode,
      source,
      line: builder.line,
      entries: builder.entries,
    })),
  }
}

const parseEntry = (
  line: string,
  context: { readonly source: string; readonly line: number; readonly passThrough: boolean },
): PresetEntry => {
  const separator = line.indexOf("=")
  const name = (separator === -1 ? line : line.slice(0, separator)).trim()

  if (name.length === 0 || /\s/.test(name)) {
    throw parseError(CoreErrorCodes.MALFORMED_ENTRY, {
      message: `Malformed entry "${line}": option name must be a non-empty word`,
      source: context.source,
      line: context.line,
    })
  }

  if (separator === -1) {
    return { name, line: context.line, passThrough: context.passThrough }
  }

  return {
    name,
    value: line.slice(separator + 1).trim(),
    line: context.line,
    passThrough: context.passThrough,
  }
}

/**
 * Combines parsed documents into one table in the order the files were given.
 * A section key defined by two files is rejected before any resolution starts.
 */
export const buildPresetTable = (documents: ReadonlyArray<PresetDocument>): PresetTable => {
  const sections = new Map<string, PresetSection>()

  for (const document of documents) {
    for (const section of document.sections) {
      const existing = sections.get(section.key)
      if (existing !== undefined) {
        throw createCoreError("file", {
          code: CoreErrorCodes.DUPLICATE_PRESET_SECTION,
          message: `Preset section [${section.key}] is defined in both ${existing.source} and ${section.source}`,
          source: section.source,
          line: section.line,
          path: section.key,
          details: { section: section.key, files: [existing.source, section.source] },
        })
      }
      sections.set(section.key, section)
    }
  }

  return {
    sections,
    files: documents.map((document) => document.source),
  }
}

const compareText = (left: string, right: string): number => {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

/**
 * Every preset name in the table, sorted case-insensitively.
 */
export const listPresetNames = (table: PresetTable): string[] => {
  const names = new Set<string>()
  table.sections.forEach((section) => names.add(section.preset))
  return Array.from(names).sort((left, right) => {
    const byLowerCase = compareText(left.toLowerCase(), right.toLowerCase())
    return byLowerCase !== 0 ? byLowerCase : compareText(left, right)
  })
}

const parseError = (
  code: string,
  error: {
    readonly message: string
    readonly source: string
    readonly line: number
    readonly path?: string
    readonly details?: Readonly<Record<string, unknown>>
  },
): CoreError => {
  return createCoreError("parse", {
    code,
    message: error.message,
    source: error.source,
    line: error.line,
    path: error.path,
    details: error.details,
  })
}
