import {fileURLToPath} from 'node:url'
import {State} from '../graph/state.js'
import type {ShimProvider} from './engine.js'

/** Path the shim executable is mounted at inside every exec. */
export const shimPath = '/.keel/shim'

/** Reserved mount receiving `exitCode`, `stdout` and `stderr` from the shim. */
export const metaMount = '/.keel/meta'

/** Names of the files the shim writes into the metadata mount. */
export const metaFiles = {
  exitCode: 'exitCode',
  stdout: 'stdout',
  stderr: 'stderr'
} as const

/**
 * Shim shipped as a POSIX shell script (`shim/keel-shim.sh`).
 * Works on any image providing `/bin/sh`; the script is platform independent.
 */
export class ShellShimProvider implements ShimProvider {
  readonly path = shimPath
  readonly sourcePath = '/keel-shim.sh'
  private readonly directory: string

  constructor(directory?: string) {
    this.directory = directory ?? fileURLToPath(new URL('../../shim', import.meta.url))
  }

  async state(): Promise<State> {
    return State.local(this.directory)
  }
}
