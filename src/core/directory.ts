import {posix} from 'node:path'
import {State} from '../graph/state.js'
import {marshalStage, type OperationContext} from './context.js'
import {File} from './file.js'
import {decodeDirectoryId, encodeDirectoryId, type DirectoryID} from './payload.js'

/** A content-addressed directory: a lazy state and a path within it. */
export class Directory {
  /**
   * Creates a directory from a lazy state.
   * @param dir - Path of the directory within the state (`''` for its root)
   */
  static async fromState(ctx: OperationContext, state: State, dir = ''): Promise<Directory> {
    const definition = state.isScratch ? null : await marshalStage(ctx, state, 'directory')
    return new Directory(encodeDirectoryId({state: definition, dir}))
  }

  constructor(readonly id: DirectoryID = '') {}

  /** Decodes the directory into its lazy state and relative path. */
  decode(ctx: Pick<OperationContext, 'engine'>): {state: State; dir: string} {
    const payload = decodeDirectoryId(this.id)
    const state = payload.state ? ctx.engine.toState(payload.state) : State.scratch()
    return {state, dir: payload.dir}
  }

  /** Returns a file beneath this directory. */
  async file(ctx: OperationContext, path: string): Promise<File> {
    const {state, dir} = this.decode(ctx)
    return File.fromState(ctx, state, posix.join(dir || '/', path))
  }
}
