import type {Plan, PlanStep} from '../types.js'
import {State} from '../graph/state.js'
import type {Container} from './container.js'
import type {OperationContext} from './context.js'
import {Directory} from './directory.js'
import type {File} from './file.js'
import type {ContainerID} from './payload.js'
import {noopReporter, type Reporter} from './reporter.js'
import {Resolver} from './resolver.js'

export type PlanResult = {
  container: Container;
  /** Exit code of the last exec, null when the plan ran nothing */
  exitCode: number | null;
  stdout: string | null;
  stderr: string | null;
}

/**
 * Applies the steps of a plan to a container through the resolver.
 *
 * Execution is lazy: exec steps only extend the graph, and the result of
 * the last one is evaluated when the exit code and output are read at the
 * end of the run.
 */
export class PlanRunner {
  private readonly resolver: Resolver

  constructor(
    private readonly ctx: OperationContext,
    private readonly reporter: Reporter = noopReporter
  ) {
    this.resolver = new Resolver(ctx, reporter)
  }

  /** Returns the container for an identity, validating it. */
  container(id: ContainerID): Container {
    return this.resolver.container(id)
  }

  async run(plan: Plan, base?: Container): Promise<PlanResult> {
    let container = base ?? this.resolver.container()
    for (const step of plan.steps) {
      container = await this.apply(container, step)
    }

    const exitCode = await this.resolver.call('exitCode', container, {})
    if (exitCode === null) {
      return {container, exitCode, stdout: null, stderr: null}
    }

    const stdout = await this.text(await this.resolver.call('stdout', container, {}))
    const stderr = await this.text(await this.resolver.call('stderr', container, {}))
    this.forward('stdout', stdout)
    this.forward('stderr', stderr)

    return {container, exitCode, stdout, stderr}
  }

  private async apply(container: Container, step: PlanStep): Promise<Container> {
    switch (step.op) {
      case 'from': {
        return this.resolver.call('from', container, {address: step.address})
      }

      case 'withWorkdir': {
        return this.resolver.call('withWorkdir', container, {path: step.path})
      }

      case 'withVariable': {
        return this.resolver.call('withVariable', container, {name: step.name, value: step.value})
      }

      case 'withoutVariable': {
        return this.resolver.call('withoutVariable', container, {name: step.name})
      }

      case 'withUser': {
        return this.resolver.call('withUser', container, {name: step.name})
      }

      case 'withEntrypoint': {
        return this.resolver.call('withEntrypoint', container, {args: step.args})
      }

      case 'withMountedDirectory': {
        const source = await Directory.fromState(this.ctx, State.local(step.source))
        return this.resolver.call('withMountedDirectory', container, {path: step.path, source})
      }

      case 'withoutMount': {
        return this.resolver.call('withoutMount', container, {path: step.path})
      }

      case 'exec': {
        return this.resolver.call('exec', container, {args: step.args, ...step.options})
      }
    }
  }

  private async text(file: File | null): Promise<string | null> {
    const content = file ? await file.contentsOrNull(this.ctx) : null
    return content === null ? null : content.toString('utf8')
  }

  private forward(stream: 'stdout' | 'stderr', text: string | null): void {
    if (!text) {
      return
    }

    for (const line of text.replace(/\n$/, '').split('\n')) {
      this.reporter.log(stream, line)
    }
  }
}
