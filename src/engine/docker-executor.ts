import {Buffer} from 'node:buffer'
import process from 'node:process'
import {randomUUID} from 'node:crypto'
import {rm} from 'node:fs/promises'
import {join} from 'node:path'
import {execa} from 'execa'
import * as tar from 'tar'
import {DockerNotAvailableError, ImagePullError} from '../errors.js'
import type {RunContainerRequest, RunContainerResult} from './types.js'
import {ContainerExecutor, type ExecutorCallOptions, type OnLogLine} from './executor.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept; everything else is stripped
 * so that host secrets (API keys, tokens, credentials) never leak,
 * even if a `-e KEY` (without value) were accidentally added.
 */
export function dockerCliEnv(): Partial<Record<string, string>> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/**
 * Builds the `docker run` arguments for a request.
 * The container is kept after exit (no `--rm`) so its filesystem can be exported.
 */
export function dockerRunArgs(request: RunContainerRequest): string[] {
  const args = ['run', '--name', request.name, '--network', request.network, '--entrypoint', '']
  if (request.platform) {
    args.push('--platform', request.platform)
  }

  if (request.cwd) {
    args.push('-w', request.cwd)
  }

  for (const entry of request.env ?? []) {
    args.push('-e', entry)
  }

  for (const mount of request.mounts) {
    args.push('-v', `${mount.hostPath}:${mount.containerPath}:${mount.readonly ? 'ro' : 'rw'}`)
  }

  args.push(request.image, ...request.cmd)
  return args
}

export class DockerCliExecutor extends ContainerExecutor {
  private readonly env = dockerCliEnv()
  private readonly running = new Set<string>()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async pullImage(ref: string, platform: string, options: ExecutorCallOptions = {}): Promise<void> {
    try {
      await this.docker(['pull', '--quiet', '--platform', platform, ref], options)
    } catch (error) {
      throw new ImagePullError(ref, {cause: error})
    }
  }

  async inspectImage(ref: string, options: ExecutorCallOptions = {}): Promise<Buffer> {
    const {stdout} = await this.docker(['image', 'inspect', '--format', '{{json .}}', ref], options)
    return Buffer.from(stdout, 'utf8')
  }

  async exportImage(ref: string, platform: string, dest: string, options: ExecutorCallOptions = {}): Promise<void> {
    const name = `keel-export-${randomUUID().slice(0, 12)}`
    await this.docker(['create', '--name', name, '--platform', platform, '--entrypoint', '', ref, '/'], options)
    try {
      await this.exportContainer(name, dest, options)
    } finally {
      await this.removeContainer(name)
    }
  }

  async importImage(archive: string, tag: string, platform: string, options: ExecutorCallOptions = {}): Promise<void> {
    await this.docker(['import', '--platform', platform, archive, tag], options)
  }

  async run(request: RunContainerRequest, onLogLine: OnLogLine, options: ExecutorCallOptions = {}): Promise<RunContainerResult> {
    const startedAt = new Date()
    let exitCode = 0
    let error: string | undefined
    let timedOut = false

    this.running.add(request.name)
    try {
      const proc = execa('docker', dockerRunArgs(request), {
        env: this.env,
        reject: false,
        cancelSignal: options.signal,
        timeout: request.timeoutSec ? request.timeoutSec * 1000 : undefined
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          onLogLine({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          onLogLine({stream: 'stderr', line})
        }
      })()

      const result = await proc
      await Promise.all([stdoutDone, stderrDone])
      options.signal?.throwIfAborted()
      timedOut = result.timedOut
      exitCode = result.exitCode ?? 1
      if (result.failed && result.exitCode === undefined) {
        error = result.message
      }
    } finally {
      this.running.delete(request.name)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error, timedOut}
  }

  async exportContainer(name: string, dest: string, options: ExecutorCallOptions = {}): Promise<void> {
    const archive = join(dest, `.${name}.tar`)
    try {
      await this.docker(['export', '--output', archive, name], options)
      await tar.extract({file: archive, cwd: dest, preserveOwner: false})
    } finally {
      await rm(archive, {force: true})
    }
  }

  async removeContainer(name: string): Promise<void> {
    await execa('docker', ['rm', '-f', '-v', name], {env: this.env, reject: false})
  }

  async removeImage(tag: string): Promise<void> {
    await execa('docker', ['image', 'rm', '-f', tag], {env: this.env, reject: false})
  }

  async killRunningContainers(): Promise<void> {
    await Promise.all([...this.running].map(async name => this.removeContainer(name)))
    this.running.clear()
  }

  private async docker(args: string[], options: ExecutorCallOptions) {
    return execa('docker', args, {env: this.env, cancelSignal: options.signal})
  }
}
