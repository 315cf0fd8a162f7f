import type {Buffer} from 'node:buffer'
import {ConfigParseError} from '../errors.js'
import {isRecord} from '../graph/types.js'
import type {RunEnv} from '../graph/state.js'
import {invalidImageConfigField, pickImageConfig, type ImageConfig} from './payload.js'

/**
 * Splits `NAME=value` entries on the first `=`.
 * An entry without `=` binds the whole entry to the empty string.
 */
export function parseEnv(entries: readonly string[]): RunEnv[] {
  return entries.map(entry => {
    const index = entry.indexOf('=')
    if (index === -1) {
      return {name: entry, value: ''}
    }

    return {name: entry.slice(0, index), value: entry.slice(index + 1)}
  })
}

/** Looks up a variable by name, or undefined when unset. */
export function lookupVariable(config: ImageConfig, name: string): string | undefined {
  const prefix = `${name}=`
  const entry = (config.Env ?? []).findLast(env => env.startsWith(prefix))
  return entry?.slice(prefix.length)
}

/**
 * Sets a variable: every existing entry with that name is removed and the
 * new `name=value` entry goes last, so no name ever appears twice.
 */
export function withVariable(config: ImageConfig, name: string, value: string): ImageConfig {
  const {Env: env = []} = withoutVariable(config, name)
  return {...config, Env: [...env, `${name}=${value}`]}
}

export function withoutVariable(config: ImageConfig, name: string): ImageConfig {
  if (!config.Env) {
    return {...config}
  }

  const prefix = `${name}=`
  const env = config.Env.filter(entry => !entry.startsWith(prefix) && entry !== name)
  return {...config, Env: env}
}

/**
 * Parses the raw configuration bytes of an image.
 * Accepts an OCI image JSON document (`{config: {...}}`); a missing `config`
 * yields the empty configuration.
 * @throws {ConfigParseError} On malformed JSON or badly typed fields
 */
export function parseImageConfig(ref: string, bytes: Buffer): ImageConfig {
  let document: unknown
  try {
    document = JSON.parse(bytes.toString('utf8'))
  } catch (error) {
    throw new ConfigParseError(ref, 'not valid JSON', {cause: error})
  }

  if (!isRecord(document)) {
    throw new ConfigParseError(ref, 'expected a JSON object')
  }

  const raw = document.config
  if (raw === undefined || raw === null) {
    return {}
  }

  if (!isRecord(raw)) {
    throw new ConfigParseError(ref, '"config" must be an object')
  }

  const config = pickImageConfig(raw)
  const invalid = invalidImageConfigField(config)
  if (invalid) {
    throw new ConfigParseError(ref, `"config.${invalid}" has an unexpected type`)
  }

  return config
}
