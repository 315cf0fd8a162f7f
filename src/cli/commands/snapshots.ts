import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {dirSize, formatSize} from '../../core/utils.js'
import {Workspace} from '../../engine/workspace.js'
import {getConfig, getGlobalOptions} from '../utils.js'

export function registerSnapshotsCommand(program: Command): void {
  program
    .command('snapshots')
    .alias('ls')
    .description('List committed snapshots of the workspace')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const config = await getConfig(cmd)
      const workspace = await Workspace.create(resolve(config.workdir), config.workspace)
      const ids = await workspace.listSnapshots()

      if (json) {
        console.log(JSON.stringify(ids))
        return
      }

      if (ids.length === 0) {
        console.log(chalk.gray(`No snapshots in workspace ${config.workspace}.`))
        return
      }

      const rows: Array<{id: string; size: string}> = []
      for (const id of ids) {
        rows.push({id, size: formatSize(await dirSize(workspace.snapshotPath(id)))})
      }

      const idWidth = Math.max('SNAPSHOT'.length, ...rows.map(r => r.id.length))
      const sizeWidth = Math.max('SIZE'.length, ...rows.map(r => r.size.length))
      console.log(chalk.bold(`${'SNAPSHOT'.padEnd(idWidth)}  ${'SIZE'.padStart(sizeWidth)}`))
      for (const row of rows) {
        console.log(`${row.id.padEnd(idWidth)}  ${row.size.padStart(sizeWidth)}`)
      }
    })
}
