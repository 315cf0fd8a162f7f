import pino from 'pino'
import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import {formatDuration} from './utils.js'

/** Reference to an operation call for display and keying purposes. */
export type OperationRef = {
  /** Unique per call, e.g. `3:exec` */
  id: string;
  /** Operation name from the resolver table */
  operation: string;
  displayName: string;
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle of a resolver call:
 * 1. OPERATION_START
 * 2. OPERATION_FINISHED, or OPERATION_FAILED with the error code
 *
 * The local engine interleaves SNAPSHOT_CACHED / SNAPSHOT_BUILT while it
 * evaluates definition outputs.
 */
export type OperationStartEvent = {
  event: 'OPERATION_START';
  operation: OperationRef;
}

export type OperationFinishedEvent = {
  event: 'OPERATION_FINISHED';
  operation: OperationRef;
  durationMs: number;
}

export type OperationFailedEvent = {
  event: 'OPERATION_FAILED';
  operation: OperationRef;
  durationMs: number;
  code: string;
  message: string;
}

export type SnapshotCachedEvent = {
  event: 'SNAPSHOT_CACHED';
  snapshotId: string;
}

export type SnapshotBuiltEvent = {
  event: 'SNAPSHOT_BUILT';
  snapshotId: string;
  /** Op kind that produced the snapshot */
  kind: 'image' | 'local' | 'exec';
  label?: string;
  durationMs: number;
}

export type BuildEvent =
  | OperationStartEvent
  | OperationFinishedEvent
  | OperationFailedEvent
  | SnapshotCachedEvent
  | SnapshotBuiltEvent

/**
 * Interface for reporting build events.
 */
export type Reporter = {
  /** Reports operation and snapshot transitions */
  emit(event: BuildEvent): void;
  /** Reports container logs (stdout/stderr) */
  log(stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Silent reporter, the default for library use.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: string; destination?: pino.DestinationStream}) {
    const level = options?.level ?? 'info'
    this.logger = options?.destination ? pino({level}, options.destination) : pino({level})
  }

  emit(event: BuildEvent): void {
    if (event.event === 'OPERATION_FAILED') {
      this.logger.error(event)
    } else if (event.event === 'SNAPSHOT_CACHED') {
      this.logger.debug(event)
    } else {
      this.logger.info(event)
    }
  }

  log(stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({stream, line})
  }
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private readonly verbose: boolean
  private readonly spinners = new Map<string, Ora>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'OPERATION_START': {
        const spinner = ora({text: event.operation.displayName, prefixText: ' '}).start()
        this.spinners.set(event.operation.id, spinner)
        break
      }

      case 'OPERATION_FINISHED': {
        const text = `${event.operation.displayName} (${formatDuration(event.durationMs)})`
        this.persist(event.operation, chalk.green('✓'), chalk.green(text))
        break
      }

      case 'OPERATION_FAILED': {
        this.persist(event.operation, chalk.red('✗'), chalk.red(`${event.operation.displayName}: ${event.message}`))
        break
      }

      case 'SNAPSHOT_CACHED': {
        if (this.verbose) {
          this.print(chalk.gray(`    ⊙ ${event.snapshotId} (cached)`))
        }

        break
      }

      case 'SNAPSHOT_BUILT': {
        if (this.verbose) {
          const label = event.label ? ` ${event.label}` : ''
          this.print(chalk.gray(`    ▸ ${event.kind}${label} (${formatDuration(event.durationMs)})`))
        }

        break
      }
    }
  }

  log(stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.print(stream === 'stderr' ? chalk.red(`    ${line}`) : chalk.gray(`    ${line}`))
    }
  }

  private persist(operation: OperationRef, symbol: string, text: string): void {
    const spinner = this.spinners.get(operation.id)
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.spinners.delete(operation.id)
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private print(line: string): void {
    const active = [...this.spinners.values()]
    for (const spinner of active) {
      spinner.clear()
    }

    console.log(line)
    for (const spinner of active) {
      spinner.render()
    }
  }
}
