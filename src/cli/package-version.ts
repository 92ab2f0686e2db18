type PackageJson = {
  readonly version: string
}

const isModuleNotFound = (error: unknown): boolean => {
  return typeof error === "object" && error !== null && "code" in error && error.code === "MODULE_NOT_FOUND"
}

const isPackageJson = (value: unknown): value is PackageJson => {
  return typeof value === "object" && value !== null && "version" in value && typeof value.version === "string"
}

// dist/index.js sits one level below package.json, src/cli/index.ts two
const CANDIDATE_PATHS = ["../package.json", "../../package.json"] as const

export const loadPackageVersion = (requireFn: NodeJS.Require): string => {
  for (const candidate of CANDIDATE_PATHS) {
    let loaded: unknown
    try {
      loaded = requireFn(candidate)
    } catch (error) {
      if (isModuleNotFound(error)) {
        continue
      }
      throw error
    }

    if (isPackageJson(loaded)) {
      return loaded.version
    }
  }

  throw new Error("Unable to locate package.json for version information")
}
