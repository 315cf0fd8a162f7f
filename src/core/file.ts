import type {Buffer} from 'node:buffer'
import {FileNotFoundError} from '../errors.js'
import {State} from '../graph/state.js'
import {marshalStage, type OperationContext} from './context.js'
import {decodeFileId, encodeFileId, type FileID} from './payload.js'

/** A content-addressed file: a lazy state and a path within it. */
export class File {
  static async fromState(ctx: OperationContext, state: State, file: string): Promise<File> {
    const definition = state.isScratch ? null : await marshalStage(ctx, state, 'file')
    return new File(encodeFileId({state: definition, file}))
  }

  constructor(readonly id: FileID) {}

  decode(ctx: Pick<OperationContext, 'engine'>): {state: State; file: string} {
    const payload = decodeFileId(this.id)
    const state = payload.state ? ctx.engine.toState(payload.state) : State.scratch()
    return {state, file: payload.file}
  }

  /**
   * Evaluates the file's state and reads its content.
   * @throws {FileNotFoundError} If the evaluated state has no such file
   */
  async contents(ctx: OperationContext): Promise<Buffer> {
    const {state, file} = this.decode(ctx)
    ctx.signal?.throwIfAborted()
    return ctx.engine.readFile(state, file, {signal: ctx.signal})
  }

  /** Like `contents`, but resolves to null when the file does not exist. */
  async contentsOrNull(ctx: OperationContext): Promise<Buffer | null> {
    try {
      return await this.contents(ctx)
    } catch (error) {
      if (error instanceof FileNotFoundError) {
        return null
      }

      throw error
    }
  }
}
