import {createHash} from 'node:crypto'
import {canonicalJson} from '../core/codec.js'
import {InvalidDefinitionError} from '../errors.js'
import {GraphNode, State, type NodeOutput} from './state.js'
import type {Definition, DefinitionOp, Op, OutputRef, Platform} from './types.js'

export type MarshalOptions = {
  /** Platform stamped on image and exec ops that do not carry one yet */
  platform?: Platform;
}

/**
 * Computes the content digest of an op and its inputs.
 * @returns Digest in format `sha256:{hex}`
 */
export function digestOf(op: Op, inputs: readonly OutputRef[]): string {
  const hash = createHash('sha256')
  hash.update(canonicalJson({op, inputs}))
  return `sha256:${hash.digest('hex')}`
}

/** Number of outputs an op produces. */
export function outputCount(op: Op): number {
  if (op.type === 'exec') {
    return 1 + op.mounts.filter(m => m.output >= 0).length
  }

  return 1
}

/**
 * Serializes a lazy state into a content-addressed definition.
 *
 * The walk is deterministic: ops are emitted in depth-first post-order and
 * shared nodes are emitted once, so the same graph always marshals to the
 * same definition.
 */
export function marshal(state: State, options: MarshalOptions = {}): Definition {
  const ops: DefinitionOp[] = []
  const digests = new Map<GraphNode, string>()
  const seen = new Set<string>()

  const visit = (node: GraphNode): string => {
    const known = digests.get(node)
    if (known) {
      return known
    }

    const inputs = node.inputs.map(input => ({digest: visit(input.node), index: input.index}))
    const op = stampPlatform(node.op, options.platform)
    const digest = digestOf(op, inputs)
    digests.set(node, digest)
    if (!seen.has(digest)) {
      seen.add(digest)
      ops.push({digest, op, inputs})
    }

    return digest
  }

  const output = state.output
    ? {digest: visit(state.output.node), index: state.output.index}
    : null

  return {ops, output}
}

/**
 * Rebuilds the lazy state a definition was marshaled from.
 * Digests and links are verified; any mismatch means the definition was corrupted.
 */
export function stateFromDefinition(definition: Definition): State {
  const nodes = new Map<string, GraphNode>()

  for (const entry of definition.ops) {
    const inputs: NodeOutput[] = entry.inputs.map(input => resolveOutput(nodes, input))
    validateOpInputs(entry, inputs.length)

    if (digestOf(entry.op, entry.inputs) !== entry.digest) {
      throw new InvalidDefinitionError(`Digest mismatch for op ${entry.digest}`)
    }

    if (!nodes.has(entry.digest)) {
      nodes.set(entry.digest, new GraphNode(entry.op, inputs))
    }
  }

  if (!definition.output) {
    return State.scratch()
  }

  return State.fromOutput(resolveOutput(nodes, definition.output))
}

function resolveOutput(nodes: ReadonlyMap<string, GraphNode>, ref: OutputRef): NodeOutput {
  const node = nodes.get(ref.digest)
  if (!node) {
    throw new InvalidDefinitionError(`Unknown op ${ref.digest}`)
  }

  if (ref.index >= outputCount(node.op)) {
    throw new InvalidDefinitionError(`Op ${ref.digest} has no output ${ref.index}`)
  }

  return {node, index: ref.index}
}

function validateOpInputs(entry: DefinitionOp, inputCount: number): void {
  const {op} = entry
  if (op.type !== 'exec') {
    if (inputCount > 0) {
      throw new InvalidDefinitionError(`Source op ${entry.digest} cannot have inputs`)
    }

    return
  }

  const indexes = [op.root, ...op.mounts.map(m => m.input)]
  if (indexes.some(index => index >= inputCount)) {
    throw new InvalidDefinitionError(`Exec op ${entry.digest} references a missing input`)
  }
}

function stampPlatform(op: Op, platform: Platform | undefined): Op {
  if (!platform || op.type === 'local' || op.platform) {
    return op
  }

  return {...op, platform}
}
