import { SiteScoutConfig, SiteScoutConfigSchema } from '../types'
import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { ConfigLoadError, ConfigValidationError } from './errors'

export const CONFIG_FILENAMES = ['sitescout.config.json', 'sitescout.config.js', 'sitescout.config.cjs']

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  env?: NodeJS.ProcessEnv
  cliArgs?: Record<string, unknown>
}

type EnvValueKind = 'string' | 'number' | 'boolean'

// env suffix -> [config path, value kind]
const ENV_MAPPINGS: Record<string, [string, EnvValueKind]> = {
  CATALOG: ['catalog', 'string'],
  CONCURRENCY: ['concurrency', 'number'],
  CATEGORY_CONCURRENCY: ['categoryConcurrency', 'number'],
  TIMEOUT: ['timeout', 'number'],
  PROBE_ATTEMPTS: ['probeAttempts', 'number'],
  CLASSIFY_ATTEMPTS: ['classifyAttempts', 'number'],
  HEADLESS: ['headless', 'boolean'],
  MAX_SIGNAL_LENGTH: ['maxSignalLength', 'number'],
  MODEL_BASE_URL: ['model.baseUrl', 'string'],
  MODEL_NAME: ['model.name', 'string'],
  MODEL_API_KEY: ['model.apiKey', 'string'],
  MODEL_TIMEOUT: ['model.timeout', 'number'],
  MODEL_TEMPERATURE: ['model.temperature', 'number'],
  OUTPUT_FILE: ['output.file', 'string'],
  OUTPUT_INCLUDE_NOTES: ['output.includeNotes', 'boolean'],
  LOG_FILE: ['logFile', 'string'],
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (sitescout.config.{json,js,cjs})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SiteScoutConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'SITESCOUT_', env = process.env, cliArgs = {} } = options

  let config: Record<string, unknown> = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = mergeConfig(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      'file',
      error instanceof Error ? error : undefined,
    )
  }

  try {
    const envConfig = loadConfigFromEnv(envPrefix, env)
    if (Object.keys(envConfig).length > 0) {
      config = mergeConfig(config, envConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config from environment: ${error instanceof Error ? error.message : String(error)}`,
      'environment',
      error instanceof Error ? error : undefined,
    )
  }

  if (Object.keys(cliArgs).length > 0) {
    config = mergeConfig(config, cliArgs)
  }

  return validateConfig(config)
}

/**
 * Validate a merged configuration and apply defaults. A missing `model`
 * block is reported as the missing endpoint it stands for.
 */
export function validateConfig(config: unknown): SiteScoutConfig {
  const input = isRecord(config) && config.model === undefined ? { ...config, model: {} } : config
  const parsed = SiteScoutConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigValidationError(parsed.error.issues)
  }
  return parsed.data
}

/**
 * Loads configuration from a file, supporting JSON and CommonJS modules
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  let targetPath: string | null = null

  if (configPath) {
    targetPath = resolve(cwd, configPath)
  } else {
    for (const filename of CONFIG_FILENAMES) {
      const filePath = join(cwd, filename)
      try {
        await access(filePath)
        targetPath = filePath
        break
      } catch {
        // not there, keep looking
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      const content = await readFile(targetPath, 'utf-8')
      loaded = JSON.parse(content)
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new Error(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  if (!isRecord(loaded)) {
    throw new Error(`Config file ${targetPath} must contain an object`)
  }

  return loaded
}

function loadConfigFromEnv(prefix: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  Object.entries(ENV_MAPPINGS).forEach(([suffix, [configPath, kind]]) => {
    const envVar = `${prefix}${suffix}`
    const value = env[envVar]
    if (value !== undefined && value !== '') {
      setNestedValue(config, configPath, parseEnvValue(envVar, value, kind))
    }
  })

  return config
}

/**
 * Parses environment variable values to the type the config key expects
 */
function parseEnvValue(envVar: string, value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'number': {
      const parsed = Number(value)
      if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new Error(`${envVar} must be a number, got "${value}"`)
      }
      return parsed
    }
    case 'boolean': {
      const lowered = value.trim().toLowerCase()
      if (['true', '1', 'yes'].includes(lowered)) return true
      if (['false', '0', 'no'].includes(lowered)) return false
      throw new Error(`${envVar} must be a boolean, got "${value}"`)
    }
    default:
      return value
  }
}

/**
 * Sets a nested value in an object using dot notation
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.')
  let current = obj

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i]
    if (!key) continue

    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  const finalKey = keys[keys.length - 1]
  if (finalKey) {
    current[finalKey] = value
  }
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const existing = result[key]
    if (isRecord(existing) && isRecord(value)) {
      result[key] = mergeConfig(existing, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
