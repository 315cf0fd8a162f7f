import chalk from 'chalk'
import type {Command} from 'commander'
import {decodeContainerId, type ContainerMount} from '../../core/payload.js'
import {abbreviate} from '../../core/utils.js'
import type {Definition} from '../../graph/types.js'
import {getGlobalOptions} from '../utils.js'

function describeDefinition(definition: Definition | null): string {
  if (!definition?.output) {
    return chalk.gray('scratch')
  }

  const {digest, index} = definition.output
  const head = definition.ops.find(entry => entry.digest === digest)
  const kind = head ? head.op.type : 'unknown'
  const detail = head?.op.type === 'image'
    ? ` ${head.op.ref}`
    : (head?.op.type === 'exec' && head.op.label ? ` ${head.op.label}` : '')
  return `${kind}${detail} ${chalk.gray(`(${abbreviate(digest)}#${index}, ${definition.ops.length} ops)`)}`
}

function describeMount(mount: ContainerMount): string {
  const sourcePath = mount.sourcePath ? chalk.gray(` [${mount.sourcePath}]`) : ''
  return `${mount.target}${sourcePath} ← ${describeDefinition(mount.source)}`
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Decode a container identity')
    .argument('<id>', 'Container identity (empty string for scratch)')
    .action(async (id: string, _options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const payload = decodeContainerId(id)

      if (json) {
        console.log(JSON.stringify(payload, null, 2))
        return
      }

      const {config} = payload
      console.log(chalk.bold(`\nContainer: ${chalk.cyan(abbreviate(id))}`))
      console.log(`  Filesystem:  ${describeDefinition(payload.fs)}`)
      console.log(`  Workdir:     ${config.WorkingDir ?? chalk.gray('-')}`)
      console.log(`  User:        ${config.User ?? chalk.gray('-')}`)
      if (config.Entrypoint) {
        console.log(`  Entrypoint:  ${config.Entrypoint.join(' ')}`)
      }

      if (config.Cmd) {
        console.log(`  Cmd:         ${config.Cmd.join(' ')}`)
      }

      for (const entry of config.Env ?? []) {
        console.log(`  Env:         ${entry}`)
      }

      for (const mount of payload.mounts) {
        console.log(`  Mount:       ${describeMount(mount)}`)
      }

      console.log(`  Last exec:   ${payload.meta ? describeDefinition(payload.meta) : chalk.gray('none')}`)
      console.log()
    })
}
