import {MarshalError} from '../errors.js'
import type {BuildEngine, ShimProvider} from '../engine/engine.js'
import type {State} from '../graph/state.js'
import type {Definition, Platform} from '../graph/types.js'

/**
 * Shared collaborators handed to every container operation.
 * Nothing here is mutated by the core; the engine must tolerate concurrent calls.
 */
export type OperationContext = {
  engine: BuildEngine;
  shim: ShimProvider;
  platform: Platform;
  /** Aborts in-flight engine calls */
  signal?: AbortSignal;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

/**
 * Marshals a state under the context platform.
 * Engine failures become a `MarshalError` tagged with `stage`; cancellation propagates as is.
 */
export async function marshalStage(ctx: OperationContext, state: State, stage: string): Promise<Definition> {
  ctx.signal?.throwIfAborted()
  try {
    return await ctx.engine.marshal(state, {platform: ctx.platform, signal: ctx.signal})
  } catch (error) {
    if (isAbortError(error)) {
      throw error
    }

    throw new MarshalError(stage, {cause: error})
  }
}
