/**
 * Case conversion for configuration files
 *
 * YAML configuration uses snake_case keys, TypeScript code uses camelCase.
 * Only keys are converted; values (including enum strings) are left alone.
 */

import type { CamelCasedPropertiesDeep } from 'type-fest'

/**
 * Convert a string from snake_case to camelCase
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase())
}

function convertKeys(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => convertKeys(item, convert))
  }
  if (value instanceof Date || value === null || typeof value !== 'object') {
    return value
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [convert(key), convertKeys(nested, convert)]),
  )
}

/**
 * Recursively convert object keys from snake_case to camelCase
 */
export function snakeToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  return convertKeys(obj, snakeToCamel) as CamelCasedPropertiesDeep<T>
}

export type { CamelCasedPropertiesDeep }
