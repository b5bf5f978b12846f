import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import { ingestionConfigSchema, type IngestionConfig } from '../interfaces'
import logger from '../utils/logger'
import { applyOverrides, getConfigValue, isRecord } from './config-overrides'

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax
 */
export function expandEnvironmentVariables(str: string): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] ?? ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return process.env[varName] ?? ''
    })
}

/**
 * Recursively expands environment variables in an object
 */
function expandObjectEnvironmentVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return expandEnvironmentVariables(obj)
  }

  if (Array.isArray(obj)) {
    return obj.map(expandObjectEnvironmentVariables)
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value)
    }
    return expanded
  }

  return obj
}

/**
 * Validates a raw configuration object and fills in defaults
 * @throws ConfigValidationError listing every offending path
 */
export function parseIngestionConfig(raw: unknown, filePath = '<inline>'): IngestionConfig {
  const result = ingestionConfigSchema.safeParse(raw)

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.map(String).join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    throw new ConfigValidationError(
      `Invalid configuration in ${filePath}: ${issues.join('; ')}`,
      filePath,
      issues
    )
  }

  return result.data
}

/**
 * Loads, expands and validates an ingestion configuration file
 * @param configPath Path to the configuration file (absolute or relative)
 * @param overrides Dot-notation overrides applied before validation
 * @throws ConfigLoadError if the file cannot be read or parsed
 * @throws ConfigOverrideError if an override is malformed
 * @throws ConfigValidationError if the configuration is invalid
 */
export async function loadIngestionConfig(
  configPath: string,
  overrides: readonly string[] = []
): Promise<IngestionConfig> {
  // Resolve path (convert relative to absolute)
  const resolvedPath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath)

  if (!existsSync(resolvedPath)) {
    throw new ConfigLoadError(
      `Configuration file not found: ${resolvedPath}`,
      resolvedPath
    )
  }

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  let parsedConfig: unknown
  try {
    parsedConfig = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  const expandedConfig = expandObjectEnvironmentVariables(parsedConfig)

  if (!isRecord(expandedConfig)) {
    throw new ConfigValidationError('Configuration must be a JSON object', resolvedPath)
  }

  const withOverrides = applyOverrides(expandedConfig, overrides)
  for (const override of overrides) {
    const key = override.split('=')[0]?.trim()
    if (key) {
      logger.debug('Configuration override applied', { path: key, value: getConfigValue(withOverrides, key) })
    }
  }

  return parseIngestionConfig(withOverrides, resolvedPath)
}
