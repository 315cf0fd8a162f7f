import {readFile} from 'node:fs/promises'
import {dirname, extname, isAbsolute, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord, isStringArray} from '../graph/types.js'
import type {Plan, PlanOperation, PlanStep} from '../types.js'
import type {ExecOptions} from './container.js'
import {loadEnvFile} from './env-file.js'
import {assertOperation} from './resolver.js'

const planOperations: readonly PlanOperation[] = [
  'from',
  'withWorkdir',
  'withVariable',
  'withoutVariable',
  'withUser',
  'withEntrypoint',
  'withMountedDirectory',
  'withoutMount',
  'exec'
]

function isPlanOperation(key: string): key is PlanOperation {
  return planOperations.some(operation => operation === key)
}

const execOptionKeys = new Set<string>(['args', 'stdin', 'redirectStdout', 'redirectStderr'])

export class PlanLoader {
  async load(filePath: string): Promise<Plan> {
    const content = await readFile(filePath, 'utf8')
    const input = parsePlanFile(content, filePath)
    let fileEnv: Record<string, string> = {}
    if (isRecord(input) && input.envFile !== undefined) {
      if (typeof input.envFile !== 'string') {
        throw new ValidationError('Invalid plan: envFile must be a string')
      }

      fileEnv = await loadEnvFile(resolve(dirname(filePath), input.envFile))
    }

    return this.validate(input, filePath, fileEnv)
  }

  /**
   * Parses and validates a plan.
   * `filePath` selects the format (`.yml`/`.yaml` or JSON) and anchors relative host paths.
   * `envFile` is only read by `load`.
   */
  parse(content: string, filePath: string): Plan {
    return this.validate(parsePlanFile(content, filePath), filePath, {})
  }

  private validate(input: unknown, filePath: string, fileEnv: Record<string, string>): Plan {
    if (!isRecord(input)) {
      throw new ValidationError('Invalid plan: expected an object')
    }

    const {name, env = {}, steps} = input
    if (name !== undefined && typeof name !== 'string') {
      throw new ValidationError('Invalid plan: name must be a string')
    }

    if (!isStringRecord(env)) {
      throw new ValidationError('Invalid plan: env must map names to strings')
    }

    if (!Array.isArray(steps) || steps.length === 0) {
      throw new ValidationError('Invalid plan: steps must be a non-empty array')
    }

    const baseDir = dirname(resolve(filePath))
    const parsed = steps.map((step: unknown, index: number) => this.parseStep(step, index, baseDir))

    const plan: Plan = {steps: insertVariables(parsed, {...fileEnv, ...env})}
    if (name !== undefined) {
      plan.name = name
    }

    return plan
  }

  private parseStep(step: unknown, index: number, baseDir: string): PlanStep {
    const where = `step ${index}`
    if (!isRecord(step)) {
      throw new ValidationError(`Invalid ${where}: expected an object`)
    }

    const keys = Object.keys(step)
    if (keys.length !== 1) {
      throw new ValidationError(`Invalid ${where}: expected exactly one operation, got ${keys.length}`)
    }

    const [key] = keys
    if (!isPlanOperation(key)) {
      assertOperation(key)
      throw new ValidationError(`Invalid ${where}: "${key}" cannot be used as a plan step`)
    }

    const value = step[key]
    switch (key) {
      case 'from': {
        return {op: key, address: requireString(value, `${where}: from`)}
      }

      case 'withWorkdir': {
        return {op: key, path: requireString(value, `${where}: withWorkdir`)}
      }

      case 'withVariable': {
        if (!isRecord(value)) {
          throw new ValidationError(`Invalid ${where}: withVariable must be an object with name and value`)
        }

        return {
          op: key,
          name: requireString(value.name, `${where}: withVariable.name`),
          value: requireString(value.value, `${where}: withVariable.value`, true)
        }
      }

      case 'withoutVariable': {
        return {op: key, name: requireString(value, `${where}: withoutVariable`)}
      }

      case 'withUser': {
        return {op: key, name: requireString(value, `${where}: withUser`, true)}
      }

      case 'withEntrypoint': {
        if (!isStringArray(value)) {
          throw new ValidationError(`Invalid ${where}: withEntrypoint must be an array of strings`)
        }

        return {op: key, args: value}
      }

      case 'withMountedDirectory': {
        if (!isRecord(value)) {
          throw new ValidationError(`Invalid ${where}: withMountedDirectory must be an object with path and source`)
        }

        const path = requireString(value.path, `${where}: withMountedDirectory.path`)
        if (!path.startsWith('/')) {
          throw new ValidationError(`Invalid ${where}: withMountedDirectory.path '${path}' must be an absolute path`)
        }

        const source = requireString(value.source, `${where}: withMountedDirectory.source`)
        return {op: key, path, source: isAbsolute(source) ? source : resolve(baseDir, source)}
      }

      case 'withoutMount': {
        return {op: key, path: requireString(value, `${where}: withoutMount`)}
      }

      case 'exec': {
        return {op: key, ...parseExec(value, where)}
      }
    }
  }
}

function parseExec(value: unknown, where: string): {args: string[]; options: ExecOptions} {
  if (isStringArray(value)) {
    if (value.length === 0) {
      throw new ValidationError(`Invalid ${where}: exec must not be empty`)
    }

    return {args: value, options: {}}
  }

  if (!isRecord(value) || !isStringArray(value.args) || value.args.length === 0) {
    throw new ValidationError(`Invalid ${where}: exec must be a non-empty array of strings or an object with args`)
  }

  const unknown = Object.keys(value).find(key => !execOptionKeys.has(key))
  if (unknown) {
    throw new ValidationError(`Invalid ${where}: unknown exec option "${unknown}"`)
  }

  const options: ExecOptions = {}
  if (value.stdin !== undefined) {
    options.stdin = requireString(value.stdin, `${where}: exec.stdin`, true)
  }

  if (value.redirectStdout !== undefined) {
    options.redirectStdout = requireString(value.redirectStdout, `${where}: exec.redirectStdout`)
  }

  if (value.redirectStderr !== undefined) {
    options.redirectStderr = requireString(value.redirectStderr, `${where}: exec.redirectStderr`)
  }

  return {args: value.args, options}
}

function requireString(value: unknown, context: string, allowEmpty = false): string {
  if (typeof value !== 'string' || (!allowEmpty && value === '')) {
    throw new ValidationError(`Invalid ${context}: expected a${allowEmpty ? '' : ' non-empty'} string`)
  }

  return value
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string')
}

/**
 * Inserts `withVariable` steps right after the leading `from` step, or at the
 * start of the plan when it does not begin with `from`.
 */
function insertVariables(steps: PlanStep[], env: Record<string, string>): PlanStep[] {
  const variables: PlanStep[] = Object.entries(env).map(([name, value]) => ({op: 'withVariable', name, value}))
  if (variables.length === 0) {
    return steps
  }

  const at = steps[0]?.op === 'from' ? 1 : 0
  return [...steps.slice(0, at), ...variables, ...steps.slice(at)]
}

export function parsePlanFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  try {
    return JSON.parse(content)
  } catch (error) {
    throw new ValidationError(`Invalid plan: ${filePath} is not valid JSON`, {cause: error})
  }
}
