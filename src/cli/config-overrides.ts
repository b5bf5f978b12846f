import { CONFIG_SECTIONS } from '../interfaces'

/**
 * Error thrown when configuration override fails
 */
export class ConfigOverrideError extends Error {
  constructor(message: string, public readonly override: string) {
    super(message)
    this.name = 'ConfigOverrideError'
  }
}

/**
 * Represents a parsed override with its path and value
 */
interface ParsedOverride {
  /** Dot-notation path to the property */
  path: string[]
  /** Raw string value from command line */
  value: string
  /** Original override string for error reporting */
  original: string
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parses a single override string into path components and value
 * Supports dot notation like "validation.missingThreshold=0.1"
 */
function parseOverride(override: string): ParsedOverride {
  const equalIndex = override.indexOf('=')
  if (equalIndex === -1) {
    throw new ConfigOverrideError(
      `Invalid override syntax: "${override}". Expected format: "path.to.property=value"`,
      override
    )
  }

  const pathString = override.substring(0, equalIndex).trim()
  const value = override.substring(equalIndex + 1)

  const path = pathString.split('.').map(segment => segment.trim()).filter(segment => segment.length > 0)

  if (path.length === 0) {
    throw new ConfigOverrideError(
      `Invalid override syntax: "${override}". Property path cannot be empty`,
      override
    )
  }

  return {
    path,
    value,
    original: override
  }
}

/**
 * Converts a string value to the appropriate type
 * Handles booleans, numbers, null and JSON arrays/objects; anything else stays a string
 */
function convertValue(value: string, original: string): unknown {
  const lower = value.toLowerCase()
  if (lower === 'null') return null
  if (lower === 'true') return true
  if (lower === 'false') return false

  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(value)
      return parsed
    } catch (error) {
      throw new ConfigOverrideError(
        `Invalid JSON value in override "${original}": ${error instanceof Error ? error.message : 'Invalid JSON'}`,
        original
      )
    }
  }

  if (/^-?\d+$/.test(value)) {
    return parseInt(value, 10)
  }
  if (/^-?\d*\.\d+$/.test(value) || /^-?\d*\.?\d+[eE][+-]?\d+$/.test(value)) {
    return parseFloat(value)
  }

  return value
}

/**
 * Sets a nested property value using dot notation path
 * Creates intermediate objects as needed
 */
function setNestedProperty(obj: Record<string, unknown>, path: string[], value: unknown, original: string): void {
  let current = obj

  // Navigate to the parent of the target property
  for (const [i, segment] of path.slice(0, -1).entries()) {
    const next = current[segment]

    if (next === undefined || next === null) {
      const created: Record<string, unknown> = {}
      current[segment] = created
      current = created
    } else if (isRecord(next)) {
      current = next
    } else {
      throw new ConfigOverrideError(
        `Cannot override property "${path.slice(0, i + 1).join('.')}" in "${original}": intermediate value is not an object`,
        original
      )
    }
  }

  const finalKey = path[path.length - 1]
  if (finalKey !== undefined) {
    current[finalKey] = value
  }
}

/**
 * Rejects overrides whose root is not a configuration section
 * Keys below the root are checked by the schema
 */
function validateOverridePath(path: string[], original: string): void {
  const rootProperty = path[0]
  if (rootProperty === undefined || !CONFIG_SECTIONS.includes(rootProperty)) {
    throw new ConfigOverrideError(
      `Invalid root property "${rootProperty ?? ''}" in override "${original}". Valid root properties: ${CONFIG_SECTIONS.join(', ')}`,
      original
    )
  }
}

/**
 * Applies dot-notation overrides to a raw configuration object
 * The input is left untouched; a modified deep copy is returned
 *
 * @throws ConfigOverrideError if any override is invalid
 *
 * @example
 * ```typescript
 * const raw = applyOverrides(fileContents, [
 *   'validation.missingThreshold=0.1',
 *   'collection.symbols=["BTC/USDT","ETH/USDT"]'
 * ])
 * ```
 */
export function applyOverrides(
  config: Record<string, unknown>,
  overrides: readonly string[]
): Record<string, unknown> {
  const cloned = cloneConfig(config)

  // Parse all overrides first to catch syntax errors early
  const parsedOverrides = overrides
    .map(override => override.trim())
    .filter(override => override.length > 0)
    .map(parseOverride)

  for (const parsed of parsedOverrides) {
    validateOverridePath(parsed.path, parsed.original)
  }

  for (const parsed of parsedOverrides) {
    setNestedProperty(cloned, parsed.path, convertValue(parsed.value, parsed.original), parsed.original)
  }

  return cloned
}

/**
 * Creates a deep copy of a configuration object
 */
export function cloneConfig(config: Record<string, unknown>): Record<string, unknown> {
  return structuredClone(config)
}

/**
 * Gets the current value at a given path in the configuration
 */
export function getConfigValue(config: Record<string, unknown>, path: string): unknown {
  let current: unknown = config

  for (const segment of path.split('.').filter(segment => segment.length > 0)) {
    if (!isRecord(current)) {
      return undefined
    }
    current = current[segment]
  }

  return current
}
