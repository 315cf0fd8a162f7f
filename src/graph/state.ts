import {posix} from 'node:path'
import {GraphError} from '../errors.js'
import type {ExecMount, ExecOp, ImageOp, LocalOp, Op} from './types.js'

/**
 * Node of the lazy graph. Nodes never change once built; states share them freely.
 * @internal
 */
export class GraphNode {
  constructor(
    readonly op: Op,
    readonly inputs: readonly NodeOutput[]
  ) {}
}

/** @internal */
export type NodeOutput = {
  node: GraphNode;
  index: number;
}

/** Normalizes an absolute mount target, without a trailing slash. */
export function normalizeTarget(target: string): string {
  const path = posix.normalize(target)
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path
}

/** Environment variable set on a run. */
export type RunEnv = {
  name: string;
  value: string;
}

export type RunMount = {
  /** Absolute path inside the container */
  target: string;
  source: State;
  /** Path beneath the source to scope the mount to */
  selector?: string;
  readonly?: boolean;
}

/** Description of a process to run over a state. */
export type RunSpec = {
  args: string[];
  env?: RunEnv[];
  cwd?: string;
  label?: string;
  mounts?: RunMount[];
}

/**
 * Lazy description of filesystem content.
 *
 * A state is a pointer to one output of a graph of deferred operations.
 * Building a state performs no work; the graph is only evaluated once an
 * engine marshals and solves it. The empty state (no output) is scratch.
 *
 * @example
 * ```typescript
 * const exec = State.image('docker.io/library/alpine:3.20').run({
 *   args: ['sh', '-c', 'echo hi > /out/greeting'],
 *   mounts: [{target: '/out', source: State.scratch()}]
 * })
 * const out = exec.getMount('/out')
 * ```
 */
export class State {
  static scratch(): State {
    return new State(undefined)
  }

  static image(ref: string): State {
    const op: ImageOp = {type: 'image', ref}
    return new State({node: new GraphNode(op, []), index: 0})
  }

  static local(path: string): State {
    const op: LocalOp = {type: 'local', path}
    return new State({node: new GraphNode(op, []), index: 0})
  }

  /** @internal */
  static fromOutput(output: NodeOutput | undefined): State {
    return new State(output)
  }

  private constructor(
    /** @internal */
    readonly output: NodeOutput | undefined
  ) {}

  get isScratch(): boolean {
    return this.output === undefined
  }

  /**
   * Attaches a process run to this state. The returned exec state exposes the
   * post-run root filesystem and the post-run content of every writable mount.
   */
  run(spec: RunSpec): ExecState {
    if (spec.args.length === 0) {
      throw new GraphError('INVALID_RUN', 'Run requires at least one argument')
    }

    const inputs: NodeOutput[] = []
    const inputIndex = (state: State): number => {
      if (!state.output) {
        return -1
      }

      inputs.push(state.output)
      return inputs.length - 1
    }

    const root = inputIndex(this)
    const mounts: ExecMount[] = []
    const outputs = new Map<string, number>()
    let nextOutput = 1
    for (const mount of spec.mounts ?? []) {
      if (!posix.isAbsolute(mount.target)) {
        throw new GraphError('INVALID_RUN', `Mount target must be absolute: ${mount.target}`)
      }

      const target = normalizeTarget(mount.target)
      const entry: ExecMount = {
        target,
        input: inputIndex(mount.source),
        output: mount.readonly ? -1 : nextOutput++
      }

      if (mount.selector !== undefined && mount.selector !== '') {
        entry.selector = posix.normalize(posix.join('/', mount.selector))
      }

      if (mount.readonly) {
        entry.readonly = true
        outputs.delete(target)
      } else {
        outputs.set(target, entry.output)
      }

      mounts.push(entry)
    }

    const op: ExecOp = {
      type: 'exec',
      root,
      args: [...spec.args],
      env: (spec.env ?? []).map(({name, value}) => `${name}=${value}`),
      mounts
    }

    if (spec.cwd) {
      op.cwd = spec.cwd
    }

    if (spec.label) {
      op.label = spec.label
    }

    return new ExecState(new GraphNode(op, inputs), outputs)
  }
}

/**
 * Result of attaching a run to a state.
 * The last writable mount at a given target shadows earlier ones.
 */
export class ExecState {
  /** @internal */
  constructor(
    private readonly node: GraphNode,
    private readonly mountOutputs: ReadonlyMap<string, number>
  ) {}

  root(): State {
    return State.fromOutput({node: this.node, index: 0})
  }

  getMount(target: string): State {
    const index = this.mountOutputs.get(normalizeTarget(target))
    if (index === undefined) {
      throw new GraphError('MOUNT_NOT_FOUND', `No writable mount at ${target}`)
    }

    return State.fromOutput({node: this.node, index})
  }
}
