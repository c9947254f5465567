import type { Envelope } from '../types'

function isUint(value: unknown): value is number {
  return typeof value == 'number' && Number.isInteger(value) && value >= 0
}

/**
 * Classify a decoded top-level value.
 *
 * - notification: `[2, name: string, args: array]`
 * - response: `[1, id: uint, error, result]`
 *
 * Anything else, requests from the peer included, is malformed and yields
 * `null`.
 */
export function classify(value: unknown): Envelope | null {
  if (!Array.isArray(value)) return null
  if (value.length == 3 && value[0] === 2) {
    let [, name, args] = value
    if (typeof name == 'string' && Array.isArray(args)) {
      return { kind: 'notification', name, args }
    }
    return null
  }
  if (value.length == 4 && value[0] === 1) {
    let [, id, error, result] = value
    if (isUint(id)) {
      return { kind: 'response', id, error, result }
    }
  }
  return null
}
