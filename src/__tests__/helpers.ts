import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {OperationContext} from '../core/context.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import {MemoryEngine, type MemoryEngineOptions} from '../engine/memory-engine.js'
import type {Platform} from '../graph/types.js'

export {noopReporter} from '../core/reporter.js'

export const testPlatform: Platform = {os: 'linux', architecture: 'amd64'}

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'keel-test-'))
}

export type RecordedLog = {
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records emitted events and log lines for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]; logs: RecordedLog[]} {
  const events: BuildEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(stream, line) {
      logs.push({stream, line})
    }
  }

  return {reporter, events, logs}
}

/**
 * Builds an operation context over a fresh in-memory engine.
 */
export function memoryContext(options: MemoryEngineOptions = {}): {engine: MemoryEngine; ctx: OperationContext} {
  const engine = new MemoryEngine(options)
  return {engine, ctx: {engine, shim: engine.shim, platform: testPlatform}}
}

