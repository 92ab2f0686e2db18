import fs from "fs-extra"
import os from "os"
import path from "path"
import type { DriverConfig, ToolConfig } from "../models/types"
import { createConfigError, ErrorCodes } from "../utils/errors"
import { validateConfigYAML } from "./validator"

export const CONFIG_DIRECTORY_NAME = ".preset-composer"
export const CONFIG_FILE_NAME = "config.yml"

export type ConfigLoaderOptions = {
  readonly configPaths?: ReadonlyArray<string>
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
}

export type LoadedConfig = {
  readonly presetFiles: ReadonlyArray<string>
  readonly driver?: DriverConfig
  readonly sources: ReadonlyArray<string>
}

export type ConfigLoader = {
  readonly loadConfig: () => Promise<LoadedConfig>
  readonly findConfigFile: () => Promise<string | null>
  readonly getSearchPaths: () => string[]
}

/**
 * Loads the tool configuration (default preset files and build driver).
 *
 * With explicit paths the first existing file is used and a missing file is an
 * error. Otherwise global files and the nearest project file are merged, the
 * project file last; finding no file at all yields an empty configuration.
 */
export const createConfigLoader = (options: ConfigLoaderOptions = {}): ConfigLoader => {
  const explicitConfigPaths = options.configPaths ?? []
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env

  const buildGlobalSearchPaths = (): string[] => {
    const paths: string[] = []

    const configPath = env.PRESET_COMPOSER_CONFIG_PATH
    if (configPath !== undefined && configPath.length > 0) {
      paths.push(path.join(configPath, CONFIG_FILE_NAME))
    }

    const homeDir = env.HOME ?? os.homedir()
    const xdgConfigHome = env.XDG_CONFIG_HOME ?? path.join(homeDir, ".config")
    paths.push(path.join(xdgConfigHome, "preset-composer", CONFIG_FILE_NAME))

    return [...new Set(paths)]
  }

  const findProjectConfigCandidate = (): string | null => {
    let currentDir = path.resolve(cwd)

    while (true) {
      const candidate = path.join(currentDir, CONFIG_DIRECTORY_NAME, CONFIG_FILE_NAME)
      if (fs.existsSync(candidate)) {
        return candidate
      }

      const parent = path.dirname(currentDir)
      if (parent === currentDir) {
        return null
      }
      currentDir = parent
    }
  }

  const getSearchPaths = (): string[] => {
    if (explicitConfigPaths.length > 0) {
      return [...explicitConfigPaths]
    }

    const candidates = buildGlobalSearchPaths()
    const projectCandidate = findProjectConfigCandidate()
    if (projectCandidate !== null) {
      candidates.push(projectCandidate)
    }
    return [...new Set(candidates)]
  }

  const findConfigFile = async (): Promise<string | null> => {
    for (const candidate of getSearchPaths()) {
      if (await fs.pathExists(candidate)) {
        return candidate
      }
    }
    return null
  }

  const readConfigFile = async (filePath: string): Promise<ToolConfig> => {
    let content: string
    try {
      content = await fs.readFile(filePath, "utf8")
    } catch (error) {
      throw createConfigError("Failed to read configuration file", ErrorCodes.CONFIG_PERMISSION_ERROR, {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      })
    }
    return resolveRelativePaths(validateConfigYAML(content, filePath), filePath)
  }

  const loadConfig = async (): Promise<LoadedConfig> => {
    if (explicitConfigPaths.length > 0) {
      const filePath = await findConfigFile()
      if (filePath === null) {
        throw createConfigError("Configuration file not found", ErrorCodes.CONFIG_NOT_FOUND, {
          searchPaths: explicitConfigPaths,
        })
      }
      return toLoadedConfig(await readConfigFile(filePath), [filePath])
    }

    let merged: ToolConfig = {}
    const sources: string[] = []
    for (const candidate of getSearchPaths()) {
      if (await fs.pathExists(candidate)) {
        merged = mergeConfigs(merged, await readConfigFile(candidate))
        sources.push(candidate)
      }
    }

    return toLoadedConfig(merged, sources)
  }

  return {
    loadConfig,
    findConfigFile,
    getSearchPaths,
  }
}

const resolveRelativePaths = (config: ToolConfig, filePath: string): ToolConfig => {
  if (config.presetFiles === undefined) {
    return config
  }

  const baseDir = path.dirname(filePath)
  return {
    ...config,
    presetFiles: config.presetFiles.map((presetFile) => path.resolve(baseDir, presetFile)),
  }
}

const mergeConfigs = (base: ToolConfig, override: ToolConfig): ToolConfig => {
  return {
    presetFiles: override.presetFiles ?? base.presetFiles,
    driver: override.driver ?? base.driver,
  }
}

const toLoadedConfig = (config: ToolConfig, sources: string[]): LoadedConfig => ({
  presetFiles: config.presetFiles ?? [],
  driver: config.driver,
  sources,
})
