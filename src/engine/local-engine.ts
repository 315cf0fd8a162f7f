import {Buffer} from 'node:buffer'
import {createHash, randomUUID} from 'node:crypto'
import {cp, mkdir, readFile, rm, stat, writeFile} from 'node:fs/promises'
import {join, posix} from 'node:path'
import {performance} from 'node:perf_hooks'
import * as tar from 'tar'
import {
  ContainerRunError,
  ContainerTimeoutError,
  FileNotFoundError,
  KeelError,
  RegistryError,
  WorkspaceError
} from '../errors.js'
import {isAbortError} from '../core/context.js'
import {noopReporter, type Reporter} from '../core/reporter.js'
import {marshal, outputCount} from '../graph/marshal.js'
import {formatPlatform, hostPlatform} from '../graph/platform.js'
import type {State} from '../graph/state.js'
import {isRecord, type DefinitionOp, type ExecOp, type OutputRef, type Platform} from '../graph/types.js'
import {BuildEngine, type EngineCallOptions, type ShimProvider} from './engine.js'
import type {ContainerExecutor} from './executor.js'
import {ShellShimProvider} from './shim.js'
import type {BindMount} from './types.js'
import type {Workspace} from './workspace.js'

export type LocalEngineOptions = {
  workspace: Workspace;
  executor: ContainerExecutor;
  reporter?: Reporter;
  shim?: ShimProvider;
  /** Maximum duration of a single exec */
  timeoutSec?: number;
  /** Network mode of exec containers (default: bridge) */
  network?: 'none' | 'bridge';
}

/** Snapshot id of a definition output: `{digestHex}-{index}`. */
export function snapshotId(ref: OutputRef): string {
  return `${ref.digest.replace(/^sha256:/, '')}-${ref.index}`
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex')
}

/**
 * Build engine evaluating definitions into workspace snapshots.
 *
 * Every definition output evaluates to a committed snapshot directory.
 * Sources are materialized directly (`local` copies a host directory,
 * `image` exports the image root filesystem); exec ops import their root
 * snapshot as a throwaway image, run it through the executor with every
 * mount bind-mounted from a private copy, then snapshot the exported root
 * and the post-run mount copies. Snapshots already committed are reused,
 * and concurrent evaluations of the same op share one in-flight promise,
 * held only until it settles.
 */
export class LocalEngine extends BuildEngine {
  readonly shim: ShimProvider
  private readonly workspace: Workspace
  private readonly executor: ContainerExecutor
  private readonly reporter: Reporter
  private readonly timeoutSec?: number
  private readonly network: 'none' | 'bridge'
  private readonly inflight = new Map<string, Promise<void>>()

  constructor(options: LocalEngineOptions) {
    super()
    this.workspace = options.workspace
    this.executor = options.executor
    this.reporter = options.reporter ?? noopReporter
    this.shim = options.shim ?? new ShellShimProvider()
    this.timeoutSec = options.timeoutSec
    this.network = options.network ?? 'bridge'
  }

  async resolveImageConfig(ref: string, options: EngineCallOptions & {platform: Platform}): Promise<Buffer> {
    const platform = formatPlatform(options.platform)
    const cachePath = this.workspace.imageConfigPath(sha256(`${ref} ${platform}`))
    try {
      return await readFile(cachePath)
    } catch (error) {
      if (!isMissing(error)) {
        throw error
      }
    }

    try {
      await this.executor.pullImage(ref, platform, options)
      const inspected: unknown = JSON.parse((await this.executor.inspectImage(ref, options)).toString('utf8'))
      if (!isRecord(inspected)) {
        throw new TypeError('unexpected inspect output')
      }

      const document = {
        architecture: inspected.Architecture,
        os: inspected.Os,
        variant: inspected.Variant,
        config: inspected.Config ?? null
      }
      const bytes = Buffer.from(JSON.stringify(document), 'utf8')
      await writeFile(cachePath, bytes)
      return bytes
    } catch (error) {
      if (isAbortError(error)) {
        throw error
      }

      throw new RegistryError(ref, {cause: error})
    }
  }

  async readFile(state: State, path: string, options: EngineCallOptions = {}): Promise<Buffer> {
    const definition = marshal(state)
    if (!definition.output) {
      throw new FileNotFoundError(path)
    }

    const ops = new Map(definition.ops.map(entry => [entry.digest, entry]))
    const dir = await this.evaluate(ops, definition.output, options)
    try {
      return await readFile(join(dir, posix.resolve('/', path)))
    } catch (error) {
      throw new FileNotFoundError(path, {cause: error})
    }
  }

  /**
   * Evaluates a state to the path of its committed snapshot.
   * Scratch evaluates to null.
   */
  async snapshot(state: State, options: EngineCallOptions = {}): Promise<string | null> {
    const definition = marshal(state)
    if (!definition.output) {
      return null
    }

    const ops = new Map(definition.ops.map(entry => [entry.digest, entry]))
    return this.evaluate(ops, definition.output, options)
  }

  private async evaluate(ops: ReadonlyMap<string, DefinitionOp>, ref: OutputRef, options: EngineCallOptions): Promise<string> {
    const entry = ops.get(ref.digest)
    if (!entry) {
      throw new WorkspaceError('OP_NOT_FOUND', `Unknown op ${ref.digest}`)
    }

    let pending = this.inflight.get(entry.digest)
    if (!pending) {
      pending = this.build(ops, entry, options)
      this.inflight.set(entry.digest, pending)
      const settle = () => this.inflight.delete(entry.digest)
      void pending.then(settle, settle)
    }

    await pending
    return this.workspace.snapshotPath(snapshotId(ref))
  }

  private async build(ops: ReadonlyMap<string, DefinitionOp>, entry: DefinitionOp, options: EngineCallOptions): Promise<void> {
    const ids = Array.from({length: outputCount(entry.op)}, (_, index) => snapshotId({digest: entry.digest, index}))
    const cached = await Promise.all(ids.map(async id => this.workspace.hasSnapshot(id)))
    if (cached.every(Boolean)) {
      this.reporter.emit({event: 'SNAPSHOT_CACHED', snapshotId: ids[0]})
      return
    }

    const inputs = await Promise.all(entry.inputs.map(async input => this.evaluate(ops, input, options)))
    options.signal?.throwIfAborted()

    const start = performance.now()
    const {op} = entry
    switch (op.type) {
      case 'image': {
        const platform = formatPlatform(op.platform ?? hostPlatform())
        await this.stage(ids[0], async staging => {
          await this.executor.pullImage(op.ref, platform, options)
          await this.executor.exportImage(op.ref, platform, staging, options)
        })
        break
      }

      case 'local': {
        await this.stage(ids[0], async staging => {
          try {
            await cp(op.path, staging, {recursive: true})
          } catch (error) {
            throw new WorkspaceError('LOCAL_NOT_FOUND', `Cannot copy local source ${op.path}`, {cause: error})
          }
        })
        break
      }

      case 'exec': {
        await this.runExec(entry.digest, op, inputs, ids, options)
        break
      }
    }

    this.reporter.emit({
      event: 'SNAPSHOT_BUILT',
      snapshotId: ids[0],
      kind: op.type,
      label: op.type === 'exec' ? op.label : undefined,
      durationMs: Math.round(performance.now() - start)
    })
  }

  /** Fills a staging directory and commits it, discarding it on failure. */
  private async stage(id: string, fill: (staging: string) => Promise<void>): Promise<void> {
    const staging = await this.workspace.prepareSnapshot(id)
    try {
      await fill(staging)
    } catch (error) {
      await this.workspace.discardSnapshot(id)
      throw error
    }

    await this.workspace.commitSnapshot(id)
  }

  private async runExec(digest: string, op: ExecOp, inputs: string[], ids: string[], options: EngineCallOptions): Promise<void> {
    const platform = formatPlatform(op.platform ?? hostPlatform())
    const scratch = await this.workspace.prepareScratch('exec')
    const hex = digest.replace(/^sha256:/, '')
    const tag = `keel-snapshot/${hex.slice(0, 32)}:latest`
    const name = `keel-${hex.slice(0, 12)}-${randomUUID().slice(0, 8)}`
    const input = async (index: number): Promise<string> => {
      if (index >= 0) {
        return inputs[index]
      }

      const empty = join(scratch.path, `empty-${randomUUID().slice(0, 8)}`)
      await mkdir(empty)
      return empty
    }

    try {
      const archive = join(scratch.path, 'rootfs.tar')
      await tar.create({file: archive, cwd: await input(op.root), portable: true}, ['.'])
      await this.executor.importImage(archive, tag, platform, options)

      // Every mount gets a copy, but only the last one at a target is bound: the shadowed
      // copies stay as they were and still become their outputs.
      const mounts: Array<BindMount & {source: string; selector: string; output: number}> = []
      for (const [index, mount] of op.mounts.entries()) {
        const source = await input(mount.input)
        const selector = mount.selector ?? '/'
        const hostPath = join(scratch.path, `mount-${index}`)
        await copySelected(source, selector, hostPath)
        mounts.push({hostPath, containerPath: mount.target, readonly: mount.readonly, source, selector, output: mount.output})
      }

      const result = await this.executor.run({
        name,
        image: tag,
        cmd: op.args,
        env: op.env,
        cwd: op.cwd,
        platform,
        mounts: mounts.filter((mount, index) => mounts.findLastIndex(other => other.containerPath === mount.containerPath) === index),
        network: this.network,
        timeoutSec: this.timeoutSec
      }, ({stream, line}) => this.reporter.log(stream, line), options)

      if (result.timedOut && this.timeoutSec) {
        throw new ContainerTimeoutError(this.timeoutSec)
      }

      if (result.exitCode !== 0) {
        throw new ContainerRunError(op.label ?? op.args.join(' '), result.exitCode, result.error ? {cause: new Error(result.error)} : undefined)
      }

      await this.stage(ids[0], async staging => this.executor.exportContainer(name, staging, options))
      for (const mount of mounts) {
        if (mount.output >= 0) {
          await this.stage(ids[mount.output], async staging => replaceSelected(mount.source, mount.selector, mount.hostPath, staging))
        }
      }
    } catch (error) {
      if (error instanceof KeelError || isAbortError(error)) {
        throw error
      }

      throw new WorkspaceError('EXEC_FAILED', `Failed to evaluate exec ${op.label ?? op.args.join(' ')}`, {cause: error})
    } finally {
      await this.executor.removeContainer(name)
      await this.executor.removeImage(tag)
      await this.workspace.discardSnapshot(scratch.id)
    }
  }
}

/** Copies `selector` of `source` (a directory or a single file) to `dest`. */
async function copySelected(source: string, selector: string, dest: string): Promise<void> {
  const selected = join(source, selector)
  try {
    await stat(selected)
  } catch {
    await mkdir(dest, {recursive: true})
    return
  }

  await cp(selected, dest, {recursive: true})
}

/** Writes into `dest` a copy of `source` whose `selector` is replaced by `replacement`. */
async function replaceSelected(source: string, selector: string, replacement: string, dest: string): Promise<void> {
  if (selector === '/') {
    await cp(replacement, dest, {recursive: true})
    return
  }

  await cp(source, dest, {recursive: true})
  const target = join(dest, selector)
  await rm(target, {recursive: true, force: true})
  await cp(replacement, target, {recursive: true})
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
