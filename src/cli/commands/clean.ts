import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Workspace} from '../../engine/workspace.js'
import {getConfig} from '../utils.js'

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove the workspace and its snapshots')
    .option('--all', 'Remove every workspace under the workdir')
    .action(async (options: {all?: boolean}, cmd: Command) => {
      const config = await getConfig(cmd)
      const workdirRoot = resolve(config.workdir)
      const existing = await Workspace.list(workdirRoot)
      const names = options.all ? existing : existing.filter(name => name === config.workspace)

      if (names.length === 0) {
        console.log(chalk.gray('No workspaces to clean.'))
        return
      }

      for (const name of names) {
        await Workspace.remove(workdirRoot, name)
      }

      console.log(chalk.green(`Removed ${names.length} workspace${names.length > 1 ? 's' : ''}.`))
    })
}
