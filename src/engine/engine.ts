import type {Buffer} from 'node:buffer'
import {marshal, stateFromDefinition} from '../graph/marshal.js'
import type {State} from '../graph/state.js'
import type {Definition, Platform} from '../graph/types.js'

export type EngineCallOptions = {
  signal?: AbortSignal;
}

/**
 * Build-graph engine consumed by the container core.
 *
 * The core never evaluates anything itself: it hands lazy states to the
 * engine to marshal them into definitions, to resolve image configurations,
 * and to read files out of evaluated states.
 *
 * Implementations:
 * - `LocalEngine`: evaluates definitions into workspace snapshots through the Docker CLI
 * - `MemoryEngine`: in-process engine over in-memory file trees (tests, dry runs)
 *
 * Implementations must be safe for concurrent use: every container
 * operation may call into the same engine at once.
 */
export abstract class BuildEngine {
  /**
   * Marshals a lazy state into a content-addressed definition.
   * @throws If the state cannot be marshaled, or the signal is aborted
   */
  async marshal(state: State, options: EngineCallOptions & {platform?: Platform} = {}): Promise<Definition> {
    options.signal?.throwIfAborted()
    return marshal(state, {platform: options.platform})
  }

  /**
   * Turns a definition back into a lazy state for further composition.
   */
  toState(definition: Definition): State {
    return stateFromDefinition(definition)
  }

  /**
   * Resolves the configuration of an image for a platform.
   * @param ref - Canonical image reference
   * @returns Raw OCI image configuration JSON
   * @throws {RegistryError} If the image cannot be reached
   */
  abstract resolveImageConfig(ref: string, options: EngineCallOptions & {platform: Platform}): Promise<Buffer>

  /**
   * Evaluates a state and reads one file from it.
   * @param path - Absolute or relative path within the state
   * @throws {FileNotFoundError} If the evaluated state has no such file
   */
  abstract readFile(state: State, path: string, options?: EngineCallOptions): Promise<Buffer>
}

/**
 * Provides the supervising shim injected into every exec.
 *
 * The shim is run as `[path, ...args]`, supervises the real process and
 * writes `exitCode`, `stdout` and `stderr` into the metadata mount.
 */
export type ShimProvider = {
  /** Fixed path the shim is mounted at inside the container */
  readonly path: string;
  /** Path of the shim executable inside its own state */
  readonly sourcePath: string;
  /** Lazy state holding the shim executable for a platform */
  state(platform: Platform, signal?: AbortSignal): Promise<State>;
}
