// ---------------------------------------------------------------------------
// Shared plan and configuration types.
//
// Used by the plan loader, the plan runner and the CLI.
// ---------------------------------------------------------------------------

import type {ExecOptions} from './core/container.js'

// -- Plans ------------------------------------------------------------------

/**
 * A validated plan step: one container operation and its arguments.
 * Host paths are already resolved against the plan file directory.
 */
export type PlanStep =
  | {op: 'from'; address: string}
  | {op: 'withWorkdir'; path: string}
  | {op: 'withVariable'; name: string; value: string}
  | {op: 'withoutVariable'; name: string}
  | {op: 'withUser'; name: string}
  | {op: 'withEntrypoint'; args: string[]}
  | {op: 'withMountedDirectory'; path: string; source: string}
  | {op: 'withoutMount'; path: string}
  | {op: 'exec'; args: string[]; options: ExecOptions}

export type PlanOperation = PlanStep['op']

/**
 * A validated plan, ready for execution.
 *
 * Plan files list steps as objects with exactly one operation key:
 *
 * ```yaml
 * name: greet
 * env: {GREETING: hello}
 * steps:
 *   - from: alpine:3.20
 *   - withMountedDirectory: {path: /src, source: ./src}
 *   - exec: [sh, -c, 'echo $GREETING > /src/out']
 * ```
 */
export type Plan = {
  name?: string;
  steps: PlanStep[];
}

// -- Configuration ----------------------------------------------------------

/** Project configuration, read from `.keel.yml`. */
export type KeelConfig = {
  /** Root directory holding the workspaces */
  workdir: string;
  /** Workspace name within the workdir */
  workspace: string;
  /** Target platform, `os/arch[/variant]` */
  platform?: string;
  /** Maximum duration of a single exec in the local engine */
  timeoutSec?: number;
}
