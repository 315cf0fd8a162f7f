import {Buffer} from 'node:buffer'
import {DecodingError, EncodingError} from '../errors.js'

export type JsonValue = null | boolean | number | string | JsonValue[] | {[key: string]: JsonValue}

/** Version of the envelope wrapping every encoded payload. */
export const ID_VERSION = 1

const base64UrlPattern = /^[\w-]+$/

/**
 * Converts a value into its canonical JSON form: object keys sorted,
 * `undefined` members dropped, array order kept.
 *
 * @throws {EncodingError} On values JSON cannot represent faithfully
 * (functions, symbols, bigints, non-finite numbers, class instances, cycles).
 */
export function canonicalize(value: unknown): JsonValue {
  return canonicalizeAt(value, '$', new Set())
}

/** Canonical JSON text of a value. Equal values always produce equal text. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value))
}

function canonicalizeAt(value: unknown, path: string, ancestors: Set<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new EncodingError(`Cannot encode non-finite number at ${path}`)
    }

    return value
  }

  if (typeof value !== 'object') {
    throw new EncodingError(`Cannot encode ${typeof value} at ${path}`)
  }

  if (ancestors.has(value)) {
    throw new EncodingError(`Cannot encode circular reference at ${path}`)
  }

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => {
        if (item === undefined) {
          throw new EncodingError(`Cannot encode undefined at ${path}[${index}]`)
        }

        return canonicalizeAt(item, `${path}[${index}]`, ancestors)
      })
    }

    const proto: unknown = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) {
      throw new EncodingError(`Cannot encode non-plain object at ${path}`)
    }

    const result: Record<string, JsonValue> = {}
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key)
      if (member !== undefined) {
        result[key] = canonicalizeAt(member, `${path}.${key}`, ancestors)
      }
    }

    return result
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Encodes a payload into an opaque identity string.
 * The identity is the base64url form of the canonical JSON envelope.
 */
export function encodeId(payload: unknown): string {
  const json = canonicalJson({v: ID_VERSION, p: payload})
  return Buffer.from(json, 'utf8').toString('base64url')
}

/**
 * Decodes an identity string back into the payload it carries.
 * Structural validation of the payload is left to the caller.
 */
export function decodeId(id: string): unknown {
  if (!base64UrlPattern.test(id)) {
    throw new DecodingError('Malformed identity: not base64url')
  }

  const bytes = Buffer.from(id, 'base64url')
  if (bytes.toString('base64url') !== id) {
    throw new DecodingError('Malformed identity: corrupt base64url')
  }

  let envelope: unknown
  try {
    envelope = JSON.parse(bytes.toString('utf8'))
  } catch (error) {
    throw new DecodingError('Malformed identity: invalid JSON', {cause: error})
  }

  if (typeof envelope !== 'object' || envelope === null || Array.isArray(envelope)) {
    throw new DecodingError('Malformed identity: envelope is not an object')
  }

  const version: unknown = Reflect.get(envelope, 'v')
  if (version !== ID_VERSION) {
    throw new DecodingError(`Unsupported identity version: ${String(version)}`)
  }

  if (!('p' in envelope)) {
    throw new DecodingError('Malformed identity: missing payload')
  }

  const payload: unknown = Reflect.get(envelope, 'p')
  return payload
}
