import test from 'ava'
import {ConsoleReporter} from '../reporter.js'

const operation = {id: '1:exec', operation: 'exec', displayName: 'exec make'}

function capture(level?: string): {reporter: ConsoleReporter; lines: Array<Record<string, unknown>>} {
  const lines: Array<Record<string, unknown>> = []
  const destination = {
    write(message: string) {
      const parsed: unknown = JSON.parse(message)
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        lines.push(Object.fromEntries(Object.entries(parsed)))
      }
    }
  }

  return {reporter: new ConsoleReporter({level, destination}), lines}
}

test('ConsoleReporter: logs operation events as info', t => {
  const {reporter, lines} = capture()
  reporter.emit({event: 'OPERATION_FINISHED', operation, durationMs: 12})
  t.is(lines.length, 1)
  t.is(lines[0].level, 30)
  t.is(lines[0].event, 'OPERATION_FINISHED')
  t.deepEqual(lines[0].operation, operation)
  t.is(lines[0].durationMs, 12)
})

test('ConsoleReporter: logs failures as errors', t => {
  const {reporter, lines} = capture()
  reporter.emit({event: 'OPERATION_FAILED', operation, durationMs: 3, code: 'MARSHAL_FAILED', message: 'Failed to marshal root'})
  t.is(lines[0].level, 50)
  t.is(lines[0].code, 'MARSHAL_FAILED')
})

test('ConsoleReporter: cache hits only show at debug level', t => {
  const quiet = capture()
  quiet.reporter.emit({event: 'SNAPSHOT_CACHED', snapshotId: 'abc-0'})
  t.is(quiet.lines.length, 0)

  const verbose = capture('debug')
  verbose.reporter.emit({event: 'SNAPSHOT_CACHED', snapshotId: 'abc-0'})
  t.is(verbose.lines[0].level, 20)
  t.is(verbose.lines[0].snapshotId, 'abc-0')
})

test('ConsoleReporter: logs container output with its stream', t => {
  const {reporter, lines} = capture()
  reporter.log('stderr', 'warning: deprecated')
  t.is(lines[0].stream, 'stderr')
  t.is(lines[0].line, 'warning: deprecated')
})
