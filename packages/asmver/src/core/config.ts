import { loadConfig } from 'c12'
import { resolve } from 'pathe'
import { existsSync } from 'fs'
import { AsmVerConfigSchema, AsmVerError, type AsmVerConfig } from './types.js'
import { configLogger } from '../utils/logger.js'

export interface ConfigOptions {
  /** Explicit configuration file; when omitted the working directory is searched */
  configPath?: string
  /** Directory to search for asmver.config.* and .asmverrc (default: process.cwd()) */
  cwd?: string
}

export const DEFAULT_CONFIG_NAME = 'asmver'

export class ConfigManager {
  private configPath?: string
  private cwd: string

  constructor(options: ConfigOptions = {}) {
    this.cwd = resolve(options.cwd ?? process.cwd())
    this.configPath = options.configPath ? resolve(this.cwd, options.configPath) : undefined
  }

  /**
   * Load and validate the configuration
   *
   * @returns The validated configuration; empty when no file was found
   * @throws {AsmVerError} INVALID_ARGUMENT for a missing explicit file, INVALID_CONFIG for a bad one
   */
  async load(): Promise<AsmVerConfig> {
    if (this.configPath && !existsSync(this.configPath)) {
      throw new AsmVerError(`Configuration file not found: ${this.configPath}`, 'INVALID_ARGUMENT', this.configPath)
    }

    let loaded: { config: Record<string, unknown> | null; configFile?: string }
    try {
      loaded = await loadConfig<Record<string, unknown>>({
        name: DEFAULT_CONFIG_NAME,
        cwd: this.cwd,
        configFile: this.configPath,
        globalRc: false,
        dotenv: false,
      })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new AsmVerError(`Failed to load configuration: ${message}`, 'INVALID_CONFIG', this.configPath, { cause: error })
    }

    const { config } = loaded
    if (!config || Object.keys(config).length === 0) {
      configLogger.debug('No configuration file found, using defaults')
      return {}
    }

    // Validate configuration using Zod schema
    const result = AsmVerConfigSchema.safeParse(config)
    if (!result.success) {
      const details = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ')
      throw new AsmVerError(`Configuration validation failed: ${details}`, 'INVALID_CONFIG', loaded.configFile)
    }

    configLogger.debug(`Configuration loaded from ${loaded.configFile ?? this.cwd}`)
    return result.data
  }

  getConfigPath(): string | undefined {
    return this.configPath
  }
}
