import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {PlanLoader} from '../../core/plan-loader.js'
import {PlanRunner} from '../../core/plan-runner.js'
import {abbreviate} from '../../core/utils.js'
import {createReporter, getGlobalOptions, openSession} from '../utils.js'

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Apply the steps of a plan to a container and run its execs')
    .argument('<plan>', 'Plan file (JSON or YAML)')
    .option('--from <id>', 'Start from an existing container identity instead of scratch')
    .option('--verbose', 'Stream container logs and snapshot events in real-time')
    .action(async (planFile: string, options: {from?: string; verbose?: boolean}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const reporter = createReporter(cmd, {verbose: options.verbose})
      const plan = await new PlanLoader().load(planFile)
      const {executor, ctx} = await openSession(cmd, reporter)
      await executor.check()

      const controller = new AbortController()
      const onSignal = (signal: NodeJS.Signals) => {
        controller.abort()
        void (async () => {
          await executor.killRunningContainers()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      const runner = new PlanRunner({...ctx, signal: controller.signal}, reporter)
      const base = options.from === undefined ? undefined : runner.container(options.from)
      const result = await runner.run(plan, base)

      if (json) {
        console.log(JSON.stringify({
          id: result.container.id,
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr
        }))
      } else {
        console.log(chalk.bold(`\n${plan.name ?? planFile}`))
        console.log(`  Container:  ${chalk.cyan(abbreviate(result.container.id))}`)
        if (result.exitCode === null) {
          console.log(chalk.gray('  Nothing was executed.'))
        } else {
          const code = result.exitCode === 0 ? chalk.green(String(result.exitCode)) : chalk.red(String(result.exitCode))
          console.log(`  Exit code:  ${code}`)
          if (result.stdout) {
            console.log(chalk.gray('  ── stdout ──'))
            process.stdout.write(result.stdout)
          }

          if (result.stderr) {
            console.log(chalk.red('  ── stderr ──'))
            process.stderr.write(result.stderr)
          }
        }

        console.log(chalk.gray(`\n${result.container.id}`))
      }

      if (result.exitCode !== null && result.exitCode !== 0) {
        process.exitCode = result.exitCode
      }
    })
}
