#!/usr/bin/env node
import 'dotenv/config'
import {Command} from 'commander'
import {registerCleanCommand} from './commands/clean.js'
import {registerInspectCommand} from './commands/inspect.js'
import {registerRunCommand} from './commands/run.js'
import {registerSnapshotsCommand} from './commands/snapshots.js'

async function main() {
  const program = new Command()

  program
    .name('keel')
    .description('Content-addressed container builds')
    .version('0.1.0')
    .option('--workdir <path>', 'Workspaces root directory (default: $KEEL_WORKDIR or ./workdir)')
    .option('-w, --workspace <name>', 'Workspace name (default: default)')
    .option('--platform <platform>', 'Target platform, os/arch[/variant] (default: $KEEL_PLATFORM or host)')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerInspectCommand(program)
  registerSnapshotsCommand(program)
  registerCleanCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  throw error
}
