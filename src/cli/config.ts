import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord} from '../graph/types.js'
import type {KeelConfig} from '../types.js'

export const configFileName = '.keel.yml'

export const defaultConfig: KeelConfig = {
  workdir: './workdir',
  workspace: 'default'
}

/** Values given on the command line; they win over every other source. */
export type ConfigOverrides = Partial<KeelConfig>

/**
 * Parses the content of a `.keel.yml` file.
 * @throws {ValidationError} On unknown keys or badly typed values
 */
export function parseConfigFile(content: string): Partial<KeelConfig> {
  const input: unknown = parseYaml(content)
  if (input === null || input === undefined) {
    return {}
  }

  if (!isRecord(input)) {
    throw new ValidationError(`Invalid ${configFileName}: expected a mapping`)
  }

  const config: Partial<KeelConfig> = {}
  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case 'workdir':
      case 'workspace':
      case 'platform': {
        if (typeof value !== 'string' || value === '') {
          throw new ValidationError(`Invalid ${configFileName}: ${key} must be a non-empty string`)
        }

        config[key] = value
        break
      }

      case 'timeoutSec': {
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
          throw new ValidationError(`Invalid ${configFileName}: timeoutSec must be a positive integer`)
        }

        config.timeoutSec = value
        break
      }

      default: {
        throw new ValidationError(`Invalid ${configFileName}: unknown key "${key}"`)
      }
    }
  }

  return config
}

/**
 * Merges configuration sources.
 * Precedence: overrides (CLI flags) > environment > config file > defaults.
 */
export function resolveConfig(
  file: Partial<KeelConfig>,
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {}
): KeelConfig {
  const fromEnv: Partial<KeelConfig> = {}
  if (env.KEEL_WORKDIR) {
    fromEnv.workdir = env.KEEL_WORKDIR
  }

  if (env.KEEL_PLATFORM) {
    fromEnv.platform = env.KEEL_PLATFORM
  }

  return {...defaultConfig, ...withoutUndefined(file), ...fromEnv, ...withoutUndefined(overrides)}
}

/**
 * Loads the configuration of a project directory.
 * A missing `.keel.yml` is not an error.
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = process.env
): Promise<KeelConfig> {
  let file: Partial<KeelConfig> = {}
  try {
    file = parseConfigFile(await readFile(join(cwd, configFileName), 'utf8'))
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error
    }
  }

  return resolveConfig(file, env, overrides)
}

function withoutUndefined(config: Partial<KeelConfig>): Partial<KeelConfig> {
  const result: Partial<KeelConfig> = {}
  if (config.workdir !== undefined) {
    result.workdir = config.workdir
  }

  if (config.workspace !== undefined) {
    result.workspace = config.workspace
  }

  if (config.platform !== undefined) {
    result.platform = config.platform
  }

  if (config.timeoutSec !== undefined) {
    result.timeoutSec = config.timeoutSec
  }

  return result
}
