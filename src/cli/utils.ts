import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import type {OperationContext} from '../core/context.js'
import {ConsoleReporter, InteractiveReporter, type Reporter} from '../core/reporter.js'
import {DockerCliExecutor} from '../engine/docker-executor.js'
import {LocalEngine} from '../engine/local-engine.js'
import {Workspace} from '../engine/workspace.js'
import {hostPlatform, parsePlatform} from '../graph/platform.js'
import type {KeelConfig} from '../types.js'
import {loadConfig} from './config.js'

export type GlobalOptions = {
  workdir?: string;
  workspace?: string;
  platform?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Loads the project configuration with the global flags applied on top. */
export async function getConfig(cmd: Command): Promise<KeelConfig> {
  const {workdir, workspace, platform} = getGlobalOptions(cmd)
  return loadConfig(process.cwd(), {workdir, workspace, platform})
}

export function createReporter(cmd: Command, options?: {verbose?: boolean}): Reporter {
  const {json} = getGlobalOptions(cmd)
  return json ? new ConsoleReporter() : new InteractiveReporter(options)
}

/** Everything a command needs to evaluate containers locally. */
export type Session = {
  config: KeelConfig;
  workspace: Workspace;
  executor: DockerCliExecutor;
  engine: LocalEngine;
  ctx: OperationContext;
}

export async function openSession(cmd: Command, reporter: Reporter): Promise<Session> {
  const config = await getConfig(cmd)
  const workspace = await Workspace.create(resolve(config.workdir), config.workspace)
  await workspace.cleanupStaging()

  const executor = new DockerCliExecutor()
  const engine = new LocalEngine({workspace, executor, reporter, timeoutSec: config.timeoutSec})
  const platform = config.platform ? parsePlatform(config.platform) : hostPlatform()
  return {config, workspace, executor, engine, ctx: {engine, shim: engine.shim, platform}}
}
