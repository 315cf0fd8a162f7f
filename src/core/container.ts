import type {Buffer} from 'node:buffer'
import {posix} from 'node:path'
import {KeelError, NotImplementedError, ParseError, RegistryError, ValidationError} from '../errors.js'
import {metaFiles, metaMount} from '../engine/shim.js'
import {State, normalizeTarget, type RunMount} from '../graph/state.js'
import {isAbortError, marshalStage, type OperationContext} from './context.js'
import {Directory} from './directory.js'
import {File} from './file.js'
import {parseEnv, parseImageConfig} from './image-config.js'
import {
  decodeContainerId,
  encodeContainerId,
  encodeFileId,
  type ContainerID,
  type ContainerMount,
  type ContainerPayload,
  type ImageConfig
} from './payload.js'
import {normalizeReference} from './reference.js'

/** Options accepted by `exec`. */
export type ExecOptions = {
  /** Content piped to the process */
  stdin?: string;
  /** In-container path receiving stdout instead of the metadata mount */
  redirectStdout?: string;
  /** In-container path receiving stderr instead of the metadata mount */
  redirectStderr?: string;
}

const execOptionNames = ['stdin', 'redirectStdout', 'redirectStderr'] as const

/** Paths reserved for the shim and its metadata; user mounts may not use them. */
const reservedRoot = posix.dirname(metaMount)

/**
 * A content-addressed container.
 *
 * A container is nothing but its identity: every operation decodes a private
 * copy of the payload, derives a new payload and returns a new container.
 * Identities are never invalidated, so any container can be reused after
 * being extended, or after an operation on it failed.
 *
 * @example
 * ```typescript
 * const base = await new Container().from(ctx, 'alpine:3.20')
 * const ran = await base.exec(ctx, ['sh', '-c', 'echo hello'])
 * const code = await ran.exitCode(ctx) // 0
 * ```
 */
export class Container {
  constructor(readonly id: ContainerID = '') {}

  /** Decodes a fresh copy of the payload. */
  payload(): ContainerPayload {
    return decodeContainerId(this.id)
  }

  /**
   * Returns the root filesystem state.
   * A container without a filesystem resolves to scratch.
   */
  filesystem(ctx: Pick<OperationContext, 'engine'>): State {
    const {fs} = this.payload()
    return fs ? ctx.engine.toState(fs) : State.scratch()
  }

  async rootfs(ctx: OperationContext): Promise<Directory> {
    return Directory.fromState(ctx, this.filesystem(ctx), '')
  }

  async withFilesystem(ctx: OperationContext, state: State): Promise<Container> {
    const payload = this.payload()
    payload.fs = await marshalStage(ctx, state, 'root')
    return new Container(encodeContainerId(payload))
  }

  /**
   * Mounts a directory at `target`. Mounts are appended, never replaced:
   * a later mount at the same target shadows earlier ones when running.
   */
  async withMountedDirectory(ctx: OperationContext, target: string, source: Directory): Promise<Container> {
    const payload = this.payload()
    const path = validateMountTarget(target)
    const {state, dir} = source.decode(ctx)
    const mount: ContainerMount = {
      source: await marshalStage(ctx, state, path),
      target: path
    }

    if (dir !== '' && dir !== '/') {
      mount.sourcePath = dir
    }

    payload.mounts.push(mount)
    return new Container(encodeContainerId(payload))
  }

  /** Removes every mount at `target`. */
  withoutMount(target: string): Container {
    const payload = this.payload()
    const path = normalizeTarget(target)
    payload.mounts = payload.mounts.filter(mount => mount.target !== path)
    return new Container(encodeContainerId(payload))
  }

  /** Mount targets, in the order they were added. */
  mounts(): string[] {
    return this.payload().mounts.map(mount => mount.target)
  }

  imageConfig(): ImageConfig {
    return this.payload().config
  }

  /**
   * Applies `transform` to a private copy of the configuration and returns
   * a container carrying the result.
   */
  updateImageConfig(transform: (config: ImageConfig) => ImageConfig): Container {
    const payload = this.payload()
    payload.config = transform(payload.config)
    return new Container(encodeContainerId(payload))
  }

  /**
   * Replaces the filesystem and configuration with those of an image.
   * Mounts and execution metadata are kept.
   */
  async from(ctx: OperationContext, address: string): Promise<Container> {
    const ref = normalizeReference(address)
    ctx.signal?.throwIfAborted()

    let bytes: Buffer
    try {
      bytes = await ctx.engine.resolveImageConfig(ref, {platform: ctx.platform, signal: ctx.signal})
    } catch (error) {
      if (isAbortError(error) || error instanceof KeelError) {
        throw error
      }

      throw new RegistryError(ref, {cause: error})
    }

    const config = parseImageConfig(ref, bytes)
    const withImage = await this.withFilesystem(ctx, State.image(ref))
    return withImage.updateImageConfig(() => config)
  }

  /**
   * Extends the container with the effect of running `args` under the shim.
   *
   * Nothing runs here: the run is attached to the lazy filesystem and only
   * evaluated when something reads the result. Writable mounts carry their
   * post-run content into the new container, and the metadata mount of this
   * run replaces any previous one.
   */
  async exec(ctx: OperationContext, args: string[], options: ExecOptions = {}): Promise<Container> {
    for (const name of execOptionNames) {
      if (options[name] !== undefined) {
        throw new NotImplementedError(`exec option "${name}"`)
      }
    }

    if (args.length === 0) {
      throw new ValidationError('exec requires at least one argument')
    }

    const payload = this.payload()
    const {config, mounts} = payload

    const shimState = await ctx.shim.state(ctx.platform, ctx.signal)
    const runMounts: RunMount[] = [
      {target: ctx.shim.path, source: shimState, selector: ctx.shim.sourcePath, readonly: true},
      {target: metaMount, source: State.scratch()}
    ]

    for (const mount of mounts) {
      runMounts.push({
        target: mount.target,
        source: ctx.engine.toState(mount.source),
        selector: mount.sourcePath
      })
    }

    const execState = this.filesystem(ctx).run({
      args: [ctx.shim.path, ...args],
      label: args.join(' '),
      cwd: config.WorkingDir || undefined,
      env: parseEnv(config.Env ?? []),
      mounts: runMounts
    })

    const fs = await marshalStage(ctx, execState.root(), 'root')

    // Mounts are stateful: what the run wrote to them is seen by the next container.
    const propagated: ContainerMount[] = []
    for (const mount of mounts) {
      const source = await marshalStage(ctx, execState.getMount(mount.target), mount.target)
      propagated.push({...mount, source})
    }

    const meta = await marshalStage(ctx, execState.getMount(metaMount), 'meta')

    return new Container(encodeContainerId({...payload, fs, mounts: propagated, meta}))
  }

  /**
   * Returns a file of the metadata mount, or null if nothing has run yet.
   */
  async metaFile(ctx: OperationContext, path: string): Promise<File | null> {
    const {meta} = this.payload()
    if (!meta) {
      return null
    }

    ctx.signal?.throwIfAborted()
    return new File(encodeFileId({state: meta, file: path}))
  }

  /**
   * Exit code of the last run, or null if nothing has run yet or the shim
   * recorded no exit code.
   * @throws {ParseError} If the recorded exit code is not an integer
   */
  async exitCode(ctx: OperationContext): Promise<number | null> {
    const file = await this.metaFile(ctx, metaFiles.exitCode)
    if (!file) {
      return null
    }

    const content = await file.contentsOrNull(ctx)
    if (content === null) {
      return null
    }

    return parseExitCode(content.toString('utf8'))
  }

  async stdout(ctx: OperationContext): Promise<File | null> {
    return this.metaFile(ctx, metaFiles.stdout)
  }

  async stderr(ctx: OperationContext): Promise<File | null> {
    return this.metaFile(ctx, metaFiles.stderr)
  }
}

/**
 * Parses the textual exit code written by the shim.
 * Surrounding whitespace is ignored.
 */
export function parseExitCode(text: string): number {
  const trimmed = text.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ParseError(`Invalid exit code: ${JSON.stringify(trimmed)}`)
  }

  const code = Number.parseInt(trimmed, 10)
  if (!Number.isSafeInteger(code)) {
    throw new ParseError(`Exit code out of range: ${JSON.stringify(trimmed)}`)
  }

  return code
}

function validateMountTarget(target: string): string {
  if (!posix.isAbsolute(target)) {
    throw new ValidationError(`Mount target must be an absolute path: ${target}`)
  }

  const path = normalizeTarget(target)
  if (path === '/') {
    throw new ValidationError('Cannot mount over the root filesystem')
  }

  if (path === reservedRoot || path.startsWith(`${reservedRoot}/`)) {
    throw new ValidationError(`Mount target ${path} is reserved`)
  }

  return path
}
