import {performance} from 'node:perf_hooks'
import {KeelError, NotImplementedError, OperationNotFoundError, ValidationError} from '../errors.js'
import {Container, type ExecOptions} from './container.js'
import type {OperationContext} from './context.js'
import type {Directory} from './directory.js'
import type {File} from './file.js'
import {lookupVariable, withoutVariable, withVariable} from './image-config.js'
import type {ContainerID} from './payload.js'
import {noopReporter, type OperationRef, type Reporter} from './reporter.js'

/** Arguments of every implemented operation, by name. */
export type OperationArgs = {
  container: {id?: ContainerID};
  from: {address: string};
  fromImage: {address: string};
  rootFilesystem: Record<string, never>;
  rootfs: Record<string, never>;
  workdir: Record<string, never>;
  withWorkdir: {path: string};
  variables: Record<string, never>;
  variable: {name: string};
  withVariable: {name: string; value: string};
  withoutVariable: {name: string};
  user: Record<string, never>;
  withUser: {name: string};
  entrypoint: Record<string, never>;
  withEntrypoint: {args: string[]};
  mounts: Record<string, never>;
  withMountedDirectory: {path: string; source: Directory};
  withoutMount: {path: string};
  exec: {args: string[]} & ExecOptions;
  exitCode: Record<string, never>;
  stdout: Record<string, never>;
  stderr: Record<string, never>;
}

/** Result of every implemented operation, by name. */
export type OperationResults = {
  container: Container;
  from: Container;
  fromImage: Container;
  rootFilesystem: Directory;
  rootfs: Directory;
  workdir: string;
  withWorkdir: Container;
  variables: string[];
  variable: string | null;
  withVariable: Container;
  withoutVariable: Container;
  user: string;
  withUser: Container;
  entrypoint: string[];
  withEntrypoint: Container;
  mounts: string[];
  withMountedDirectory: Container;
  withoutMount: Container;
  exec: Container;
  exitCode: number | null;
  stdout: File | null;
  stderr: File | null;
}

export type OperationName = keyof OperationArgs

type Handler<N extends OperationName> = (ctx: OperationContext, parent: Container, args: OperationArgs[N]) => Promise<OperationResults[N]>

/** Operations that are part of the surface but have no implementation yet. */
export const unimplementedOperations = [
  'directory',
  'withSecretVariable',
  'withMountedFile',
  'withMountedTemp',
  'withMountedCache',
  'withMountedSecret',
  'publish'
] as const

const handlers: {[N in OperationName]: Handler<N>} = {
  async container(_ctx, _parent, {id}) {
    const container = new Container(id ?? '')
    container.payload()
    return container
  },
  async from(ctx, parent, {address}) {
    return parent.from(ctx, address)
  },
  async fromImage(ctx, parent, {address}) {
    return parent.from(ctx, address)
  },
  async rootFilesystem(ctx, parent) {
    return parent.rootfs(ctx)
  },
  async rootfs(ctx, parent) {
    return parent.rootfs(ctx)
  },
  async workdir(_ctx, parent) {
    return parent.imageConfig().WorkingDir ?? ''
  },
  async withWorkdir(_ctx, parent, {path}) {
    return parent.updateImageConfig(config => ({...config, WorkingDir: path}))
  },
  async variables(_ctx, parent) {
    return [...(parent.imageConfig().Env ?? [])]
  },
  async variable(_ctx, parent, {name}) {
    return lookupVariable(parent.imageConfig(), name) ?? null
  },
  async withVariable(_ctx, parent, {name, value}) {
    if (name === '' || name.includes('=')) {
      throw new ValidationError(`Invalid variable name "${name}"`)
    }

    return parent.updateImageConfig(config => withVariable(config, name, value))
  },
  async withoutVariable(_ctx, parent, {name}) {
    return parent.updateImageConfig(config => withoutVariable(config, name))
  },
  async user(_ctx, parent) {
    return parent.imageConfig().User ?? ''
  },
  async withUser(_ctx, parent, {name}) {
    return parent.updateImageConfig(config => ({...config, User: name}))
  },
  async entrypoint(_ctx, parent) {
    return parent.imageConfig().Entrypoint ?? []
  },
  async withEntrypoint(_ctx, parent, {args}) {
    return parent.updateImageConfig(config => ({...config, Entrypoint: [...args]}))
  },
  async mounts(_ctx, parent) {
    return parent.mounts()
  },
  async withMountedDirectory(ctx, parent, {path, source}) {
    return parent.withMountedDirectory(ctx, path, source)
  },
  async withoutMount(_ctx, parent, {path}) {
    return parent.withoutMount(path)
  },
  async exec(ctx, parent, {args, ...options}) {
    return parent.exec(ctx, args, options)
  },
  async exitCode(ctx, parent) {
    return parent.exitCode(ctx)
  },
  async stdout(ctx, parent) {
    return parent.stdout(ctx)
  },
  async stderr(ctx, parent) {
    return parent.stderr(ctx)
  }
}

export function isOperationName(name: string): name is OperationName {
  return Object.hasOwn(handlers, name)
}

/**
 * Checks that `name` is an implemented operation.
 * @throws {NotImplementedError} For operations of the surface without an implementation
 * @throws {OperationNotFoundError} For unknown names
 */
export function assertOperation(name: string): OperationName {
  if (isOperationName(name)) {
    return name
  }

  if (unimplementedOperations.some(candidate => candidate === name)) {
    throw new NotImplementedError(`operation "${name}"`)
  }

  throw new OperationNotFoundError(name)
}

function describe(name: OperationName, args: Record<string, unknown>): string {
  const details = Object.entries(args)
    .filter(([, value]) => typeof value === 'string' || Array.isArray(value))
    .map(([, value]) => (Array.isArray(value) ? value.join(' ') : String(value)))
  return details.length > 0 ? `${name} ${details.join(' ')}` : name
}

/**
 * Dispatches named operations on containers and reports each call.
 *
 * @example
 * ```typescript
 * const resolver = new Resolver(ctx, new ConsoleReporter())
 * const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
 * const ran = await resolver.call('exec', base, {args: ['echo', 'hi']})
 * const stdout = await resolver.call('stdout', ran, {}) // File, or null before any exec
 * ```
 */
export class Resolver {
  private calls = 0

  constructor(
    private readonly ctx: OperationContext,
    private readonly reporter: Reporter = noopReporter
  ) {}

  /** Returns the container for an identity; the empty identity is scratch. */
  container(id: ContainerID = ''): Container {
    const container = new Container(id)
    container.payload()
    return container
  }

  async call<N extends OperationName>(name: N, parent: Container, args: OperationArgs[N]): Promise<OperationResults[N]> {
    this.calls++
    const operation: OperationRef = {id: `${this.calls}:${name}`, operation: name, displayName: describe(name, args)}
    const start = performance.now()
    this.reporter.emit({event: 'OPERATION_START', operation})
    try {
      const handler = handlers[name]
      const result = await handler(this.ctx, parent, args)
      this.reporter.emit({event: 'OPERATION_FINISHED', operation, durationMs: Math.round(performance.now() - start)})
      return result
    } catch (error) {
      this.reporter.emit({
        event: 'OPERATION_FAILED',
        operation,
        durationMs: Math.round(performance.now() - start),
        code: error instanceof KeelError ? error.code : 'UNKNOWN',
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }
}
