import { inspect } from 'util'
import { Metadata } from './meta'

/**
 * Name of the msgpack type a decoded value came from.
 */
export function typeName(value: unknown): string {
  if (value === null || value === undefined) return 'nil'
  if (typeof value == 'boolean') return 'boolean'
  if (typeof value == 'number') return Number.isInteger(value) ? 'integer' : 'float'
  if (typeof value == 'string') return 'string'
  if (Buffer.isBuffer(value)) return 'binary'
  if (Array.isArray(value)) return 'array'
  for (let { constructor, name } of Metadata) {
    if (value instanceof constructor) return `ext(${name})`
  }
  if (typeof value == 'object') return 'map'
  return typeof value
}

/**
 * Single line rendering of a decoded value for log records.
 */
export function describe(value: unknown, maxLength = 1024): string {
  let str = inspect(value, { depth: 6, breakLength: Infinity, maxArrayLength: 64 })
  if (str.length > maxLength) {
    str = str.slice(0, maxLength) + '...'
  }
  return str
}
