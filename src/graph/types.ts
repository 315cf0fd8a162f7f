/** Target platform of an image or exec node (OCI naming). */
export type Platform = {
  os: string;
  architecture: string;
  variant?: string;
}

/** Pulls an image's root filesystem. */
export type ImageOp = {
  type: 'image';
  /** Canonical image reference */
  ref: string;
  platform?: Platform;
}

/** Copies a directory from the host running the engine. */
export type LocalOp = {
  type: 'local';
  /** Absolute host path */
  path: string;
}

/**
 * Mount attached to an exec node.
 * `input` indexes the node inputs (`-1` mounts an empty scratch directory);
 * `output` is the output index produced for the mount (`-1` when read-only).
 */
export type ExecMount = {
  target: string;
  input: number;
  output: number;
  selector?: string;
  readonly?: boolean;
}

/** Runs a process over a root filesystem and its mounts. */
export type ExecOp = {
  type: 'exec';
  /** Input index of the root filesystem (`-1` for scratch) */
  root: number;
  args: string[];
  /** `NAME=value` entries, applied in order */
  env: string[];
  cwd?: string;
  /** Human-readable name for diagnostics */
  label?: string;
  mounts: ExecMount[];
  platform?: Platform;
}

export type Op = ImageOp | LocalOp | ExecOp

/** Reference to one output of a marshaled op. */
export type OutputRef = {
  digest: string;
  index: number;
}

export type DefinitionOp = {
  /** `sha256:` digest of the canonical JSON of `{op, inputs}` */
  digest: string;
  op: Op;
  inputs: OutputRef[];
}

/**
 * Marshaled, content-addressed form of a lazy state.
 * Ops are listed in dependency order; `output` is null for scratch.
 */
export type Definition = {
  ops: DefinitionOp[];
  output: OutputRef | null;
}

// -- Type guards --------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function isOptional(value: unknown, check: (value: unknown) => boolean): boolean {
  return value === undefined || check(value)
}

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

function isIndex(value: unknown, min: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min
}

export function isPlatform(value: unknown): value is Platform {
  return isRecord(value)
    && isString(value.os)
    && isString(value.architecture)
    && isOptional(value.variant, isString)
}

function isExecMount(value: unknown): value is ExecMount {
  return isRecord(value)
    && isString(value.target)
    && isIndex(value.input, -1)
    && isIndex(value.output, -1)
    && isOptional(value.selector, isString)
    && isOptional(value.readonly, v => typeof v === 'boolean')
}

export function isOp(value: unknown): value is Op {
  if (!isRecord(value)) {
    return false
  }

  switch (value.type) {
    case 'image': {
      return isString(value.ref) && isOptional(value.platform, isPlatform)
    }

    case 'local': {
      return isString(value.path)
    }

    case 'exec': {
      return isIndex(value.root, -1)
        && isStringArray(value.args)
        && isStringArray(value.env)
        && isOptional(value.cwd, isString)
        && isOptional(value.label, isString)
        && Array.isArray(value.mounts) && value.mounts.every(m => isExecMount(m))
        && isOptional(value.platform, isPlatform)
    }

    default: {
      return false
    }
  }
}

export function isOutputRef(value: unknown): value is OutputRef {
  return isRecord(value) && isString(value.digest) && isIndex(value.index, 0)
}

function isDefinitionOp(value: unknown): value is DefinitionOp {
  return isRecord(value)
    && isString(value.digest)
    && isOp(value.op)
    && Array.isArray(value.inputs) && value.inputs.every(i => isOutputRef(i))
}

/** Shallow structural check; digests and links are verified by `stateFromDefinition`. */
export function isDefinition(value: unknown): value is Definition {
  return isRecord(value)
    && Array.isArray(value.ops) && value.ops.every(op => isDefinitionOp(op))
    && (value.output === null || isOutputRef(value.output))
}
