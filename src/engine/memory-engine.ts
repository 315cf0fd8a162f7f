import {Buffer} from 'node:buffer'
import {posix} from 'node:path'
import {ContainerRunError, FileNotFoundError, ImagePullError, RegistryError, WorkspaceError} from '../errors.js'
import {marshal} from '../graph/marshal.js'
import {State} from '../graph/state.js'
import type {Definition, DefinitionOp, ExecOp, OutputRef, Platform} from '../graph/types.js'
import {BuildEngine, type EngineCallOptions, type ShimProvider} from './engine.js'
import {metaFiles, metaMount, shimPath} from './shim.js'

/** Files of an evaluated state, keyed by normalized absolute path. */
export type MemoryTree = ReadonlyMap<string, Buffer>

export type MemoryImage = {
  /** OCI `config` object returned by `resolveImageConfig` */
  config?: Record<string, unknown>;
  /** Raw bytes returned by `resolveImageConfig` instead of `config` */
  rawConfig?: string;
  files?: Record<string, string>;
}

/** Filesystem seen by a simulated command: the root overlaid with its mounts. */
export type VirtualFs = {
  read(path: string): Buffer | undefined;
  write(path: string, content: string | Buffer): void;
  remove(path: string): void;
  exists(path: string): boolean;
}

export type CommandContext = {
  /** Arguments, the command name included */
  args: string[];
  env: Record<string, string>;
  cwd: string;
  fs: VirtualFs;
  stdout(text: string): void;
  stderr(text: string): void;
}

type CommandIo = Omit<CommandContext, 'args'>

/** Simulated command; returns the exit code. */
export type CommandHandler = (ctx: CommandContext) => number

export type MemoryEngineOptions = {
  /** Images by canonical reference */
  images?: Record<string, MemoryImage>;
  /** Host directories by path, as `{relative file path: content}` */
  locals?: Record<string, Record<string, string>>;
  /** Extra commands, by command name */
  commands?: Record<string, CommandHandler>;
}

const memoryShimSource = 'memory:keel-shim'

/** Shim provider paired with `MemoryEngine`. */
export class MemoryShimProvider implements ShimProvider {
  readonly path = shimPath
  readonly sourcePath = '/shim'

  async state(): Promise<State> {
    return State.local(memoryShimSource)
  }
}

const builtinCommands: Record<string, CommandHandler> = {
  true: () => 0,
  false: () => 1,
  echo({args, stdout}) {
    stdout(`${args.slice(1).join(' ')}\n`)
    return 0
  },
  pwd({cwd, stdout}) {
    stdout(`${cwd}\n`)
    return 0
  },
  env({env, stdout}) {
    for (const [name, value] of Object.entries(env)) {
      stdout(`${name}=${value}\n`)
    }

    return 0
  },
  touch({args, fs}) {
    for (const path of args.slice(1)) {
      if (!fs.exists(path)) {
        fs.write(path, '')
      }
    }

    return 0
  },
  cat({args, fs, stdout, stderr}) {
    let code = 0
    for (const path of args.slice(1)) {
      const content = fs.read(path)
      if (content === undefined) {
        stderr(`cat: ${path}: No such file or directory\n`)
        code = 1
      } else {
        stdout(content.toString('utf8'))
      }
    }

    return code
  },
  rm({args, fs}) {
    for (const path of args.slice(1)) {
      fs.remove(path)
    }

    return 0
  },
  exit({args}) {
    return Number.parseInt(args[1] ?? '0', 10)
  }
}

/**
 * In-process build engine over in-memory file trees.
 *
 * Exec nodes are simulated: the command named by the first argument is
 * looked up in a table of small built-ins (`true`, `false`, `echo`, `touch`,
 * `cat`, `rm`, `pwd`, `env`, `exit`) and user-supplied handlers. Runs under
 * the shim record `exitCode`, `stdout` and `stderr` into the metadata mount
 * like the real shim does. Evaluation is memoized by digest.
 */
export class MemoryEngine extends BuildEngine {
  readonly shim: ShimProvider = new MemoryShimProvider()
  /** Labels of the exec nodes evaluated so far, in evaluation order. */
  readonly executed: string[] = []

  private readonly images: Record<string, MemoryImage>
  private readonly locals: Record<string, Record<string, string>>
  private readonly commands: Record<string, CommandHandler>
  private readonly evaluated = new Map<string, MemoryTree[]>()

  constructor(options: MemoryEngineOptions = {}) {
    super()
    this.images = options.images ?? {}
    this.locals = {[memoryShimSource]: {shim: ''}, ...options.locals}
    this.commands = {...builtinCommands, ...options.commands}
  }

  async resolveImageConfig(ref: string, options: EngineCallOptions & {platform: Platform}): Promise<Buffer> {
    options.signal?.throwIfAborted()
    const image = this.images[ref]
    if (!image) {
      throw new RegistryError(ref)
    }

    if (image.rawConfig !== undefined) {
      return Buffer.from(image.rawConfig, 'utf8')
    }

    const document = {
      architecture: options.platform.architecture,
      os: options.platform.os,
      config: image.config ?? {}
    }
    return Buffer.from(JSON.stringify(document), 'utf8')
  }

  async readFile(state: State, path: string, options: EngineCallOptions = {}): Promise<Buffer> {
    options.signal?.throwIfAborted()
    const tree = this.evaluate(marshal(state))
    const content = tree.get(posix.resolve('/', path))
    if (content === undefined) {
      throw new FileNotFoundError(path)
    }

    return content
  }

  /** Evaluates a state and lists its files. */
  async listFiles(state: State): Promise<string[]> {
    return [...this.evaluate(marshal(state)).keys()].sort()
  }

  /** Evaluates the output of a definition. */
  evaluate(definition: Definition): MemoryTree {
    if (!definition.output) {
      return new Map()
    }

    const ops = new Map(definition.ops.map(entry => [entry.digest, entry]))
    return this.evaluateOutput(ops, definition.output)
  }

  private evaluateOutput(ops: ReadonlyMap<string, DefinitionOp>, ref: OutputRef): MemoryTree {
    let outputs = this.evaluated.get(ref.digest)
    if (!outputs) {
      const entry = ops.get(ref.digest)
      if (!entry) {
        throw new WorkspaceError('OP_NOT_FOUND', `Unknown op ${ref.digest}`)
      }

      const inputs = entry.inputs.map(input => this.evaluateOutput(ops, input))
      outputs = this.evaluateOp(entry, inputs)
      this.evaluated.set(ref.digest, outputs)
    }

    const output = outputs[ref.index]
    if (!output) {
      throw new WorkspaceError('OUTPUT_NOT_FOUND', `Op ${ref.digest} has no output ${ref.index}`)
    }

    return output
  }

  private evaluateOp(entry: DefinitionOp, inputs: MemoryTree[]): MemoryTree[] {
    const {op} = entry
    switch (op.type) {
      case 'image': {
        const image = this.images[op.ref]
        if (!image) {
          throw new ImagePullError(op.ref)
        }

        return [treeFromRecord(image.files ?? {})]
      }

      case 'local': {
        const files = this.locals[op.path]
        if (!files) {
          throw new WorkspaceError('LOCAL_NOT_FOUND', `Unknown local source ${op.path}`)
        }

        return [treeFromRecord(files)]
      }

      case 'exec': {
        return this.runExec(op, inputs)
      }
    }
  }

  private runExec(op: ExecOp, inputs: MemoryTree[]): MemoryTree[] {
    const input = (index: number): MemoryTree => (index === -1 ? new Map() : inputs[index] ?? new Map())
    const root = new Map(input(op.root))
    const mounts = op.mounts.map(mount => ({
      ...mount,
      source: input(mount.input),
      files: new Map(subtree(input(mount.input), mount.selector))
    }))

    const fs = overlay(root, mounts, op.cwd ?? '/')
    const env: Record<string, string> = {}
    for (const entry of op.env) {
      const index = entry.indexOf('=')
      env[entry.slice(0, index)] = entry.slice(index + 1)
    }

    const supervised = op.args[0] === shimPath
    const args = supervised ? op.args.slice(1) : op.args
    let stdout = ''
    let stderr = ''
    const code = this.runCommand(args, {
      env,
      cwd: op.cwd ?? '/',
      fs,
      stdout(text) {
        stdout += text
      },
      stderr(text) {
        stderr += text
      }
    })

    this.executed.push(op.label ?? args.join(' '))

    if (supervised) {
      const meta = mounts.findLast(mount => mount.target === metaMount)
      if (meta) {
        meta.files.set(`/${metaFiles.exitCode}`, Buffer.from(`${code}\n`))
        meta.files.set(`/${metaFiles.stdout}`, Buffer.from(stdout))
        meta.files.set(`/${metaFiles.stderr}`, Buffer.from(stderr))
      }
    } else if (code !== 0) {
      throw new ContainerRunError(op.label ?? args.join(' '), code)
    }

    const outputs: MemoryTree[] = [root]
    for (const mount of mounts) {
      if (mount.output >= 0) {
        outputs[mount.output] = replaceSubtree(mount.source, mount.selector, mount.files)
      }
    }

    return outputs
  }

  private runCommand(args: string[], io: CommandIo): number {
    const name = posix.basename(args[0] ?? '')
    if (name === 'sh' && args[1] === '-c') {
      return runScript(args[2] ?? '', io, (commandArgs, commandIo) => this.runCommand(commandArgs, commandIo))
    }

    const handler = this.commands[name]
    if (!handler) {
      io.stderr(`${args[0] ?? ''}: command not found\n`)
      return 127
    }

    try {
      return handler({...io, args})
    } catch (error) {
      io.stderr(`${error instanceof Error ? error.message : String(error)}\n`)
      return 1
    }
  }
}

type ScriptToken = {word: string} | {operator: ';' | '&&' | '||' | '>' | '>>'}

/** Splits a shell script into words and operators; quotes group, no expansion. */
function tokenize(script: string): ScriptToken[] {
  const tokens: ScriptToken[] = []
  let word: string | undefined
  let quote: string | undefined
  const flush = () => {
    if (word !== undefined) {
      tokens.push({word})
      word = undefined
    }
  }

  for (let i = 0; i < script.length; i++) {
    const char = script[i]
    if (quote) {
      if (char === quote) {
        quote = undefined
      } else {
        word = (word ?? '') + char
      }
    } else if (char === '"' || char === "'") {
      quote = char
      word ??= ''
    } else if (/\s/.test(char)) {
      flush()
    } else if (char === ';') {
      flush()
      tokens.push({operator: ';'})
    } else if ((char === '&' || char === '|') && script[i + 1] === char) {
      flush()
      tokens.push({operator: char === '&' ? '&&' : '||'})
      i++
    } else if (char === '>') {
      flush()
      if (script[i + 1] === '>') {
        tokens.push({operator: '>>'})
        i++
      } else {
        tokens.push({operator: '>'})
      }
    } else {
      word = (word ?? '') + char
    }
  }

  flush()
  return tokens
}

/**
 * Runs the `sh -c` subset understood by the memory engine: commands joined
 * by `;`, `&&` and `||`, each with an optional `>` or `>>` stdout redirect.
 */
function runScript(script: string, io: CommandIo, run: (args: string[], io: CommandIo) => number): number {
  const tokens = tokenize(script)
  let code = 0
  let connector: ';' | '&&' | '||' = ';'
  let index = 0
  while (index < tokens.length) {
    const args: string[] = []
    let redirect: {path: string; append: boolean} | undefined
    let next: ';' | '&&' | '||' | undefined
    for (; index < tokens.length; index++) {
      const token = tokens[index]
      if ('word' in token) {
        args.push(token.word)
        continue
      }

      if (token.operator === '>' || token.operator === '>>') {
        const target = tokens[index + 1]
        if (!target || !('word' in target)) {
          io.stderr('sh: syntax error: missing redirection target\n')
          return 2
        }

        redirect = {path: target.word, append: token.operator === '>>'}
        index++
        continue
      }

      next = token.operator
      index++
      break
    }

    const runs = connector === ';' || (connector === '&&' ? code === 0 : code !== 0)
    if (runs && args.length > 0) {
      code = redirect ? runRedirected(args, io, redirect, run) : run(args, io)
    }

    connector = next ?? ';'
  }

  return code
}

function runRedirected(
  args: string[],
  io: CommandIo,
  redirect: {path: string; append: boolean},
  run: (args: string[], io: CommandIo) => number
): number {
  let captured = ''
  const code = run(args, {
    ...io,
    stdout(text) {
      captured += text
    }
  })
  const previous = redirect.append ? io.fs.read(redirect.path)?.toString('utf8') ?? '' : ''
  try {
    io.fs.write(redirect.path, previous + captured)
  } catch (error) {
    io.stderr(`sh: ${error instanceof Error ? error.message : String(error)}\n`)
    return 1
  }

  return code
}

function treeFromRecord(files: Record<string, string>): MemoryTree {
  return new Map(Object.entries(files).map(([path, content]) => [posix.resolve('/', path), Buffer.from(content, 'utf8')]))
}

function isWithin(path: string, dir: string): boolean {
  return dir === '/' || path === dir || path.startsWith(`${dir}/`)
}

function relativeTo(path: string, dir: string): string {
  return dir === '/' ? path : posix.join('/', path.slice(dir.length))
}

/** Files under `selector`, re-rooted at `/`. */
function subtree(tree: MemoryTree, selector: string | undefined): MemoryTree {
  if (!selector || selector === '/') {
    return tree
  }

  const result = new Map<string, Buffer>()
  for (const [path, content] of tree) {
    if (path !== selector && isWithin(path, selector)) {
      result.set(relativeTo(path, selector), content)
    }
  }

  return result
}

/** `tree` with everything under `selector` replaced by `files`. */
function replaceSubtree(tree: MemoryTree, selector: string | undefined, files: MemoryTree): MemoryTree {
  const base = selector && selector !== '/' ? selector : '/'
  const result = new Map<string, Buffer>()
  for (const [path, content] of tree) {
    if (!isWithin(path, base)) {
      result.set(path, content)
    }
  }

  for (const [path, content] of files) {
    result.set(base === '/' ? path : posix.join(base, path), content)
  }

  return result
}

type OverlayMount = {
  target: string;
  readonly?: boolean;
  files: Map<string, Buffer>;
}

function overlay(root: Map<string, Buffer>, mounts: OverlayMount[], cwd: string): VirtualFs {
  const locate = (path: string): {files: Map<string, Buffer>; key: string; readonly: boolean} => {
    const absolute = posix.resolve(cwd, path)
    let match: OverlayMount | undefined
    for (const mount of mounts) {
      if (isWithin(absolute, mount.target) && (!match || mount.target.length >= match.target.length)) {
        match = mount
      }
    }

    if (!match) {
      return {files: root, key: absolute, readonly: false}
    }

    return {files: match.files, key: relativeTo(absolute, match.target), readonly: match.readonly ?? false}
  }

  return {
    read(path) {
      const {files, key} = locate(path)
      return files.get(key)
    },
    write(path, content) {
      const {files, key, readonly} = locate(path)
      if (readonly) {
        throw new Error(`${path}: Read-only file system`)
      }

      files.set(key, Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf8'))
    },
    remove(path) {
      const {files, key, readonly} = locate(path)
      if (readonly) {
        throw new Error(`${path}: Read-only file system`)
      }

      for (const existing of [...files.keys()]) {
        if (isWithin(existing, key)) {
          files.delete(existing)
        }
      }
    },
    exists(path) {
      const {files, key} = locate(path)
      return [...files.keys()].some(existing => isWithin(existing, key))
    }
  }
}
