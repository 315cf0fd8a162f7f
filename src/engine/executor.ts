import type {Buffer} from 'node:buffer'
import type {RunContainerRequest, RunContainerResult} from './types.js'

/**
 * Log line from container execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during container execution.
 */
export type OnLogLine = (log: LogLine) => void

export type ExecutorCallOptions = {
  signal?: AbortSignal;
}

/**
 * Abstract interface for the container runtime behind the local engine.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 *
 * The executor is responsible for:
 * - Pulling images and reading their configuration
 * - Moving root filesystems in and out of the runtime (import/export)
 * - Running containers with bind mounts, streaming logs in real-time
 * - Cleaning up containers and throwaway images
 */
export abstract class ContainerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws {DockerNotAvailableError} If the runtime is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Pulls an image for a platform.
   * @throws {ImagePullError} If the image cannot be pulled
   */
  abstract pullImage(ref: string, platform: string, options?: ExecutorCallOptions): Promise<void>

  /**
   * Returns the runtime's inspection document of a pulled image (JSON).
   */
  abstract inspectImage(ref: string, options?: ExecutorCallOptions): Promise<Buffer>

  /**
   * Extracts the root filesystem of a pulled image into `dest`.
   */
  abstract exportImage(ref: string, platform: string, dest: string, options?: ExecutorCallOptions): Promise<void>

  /**
   * Imports a root filesystem archive as an image.
   * @param archive - Path of an uncompressed tar archive of the root filesystem
   * @param tag - Tag given to the imported image
   */
  abstract importImage(archive: string, tag: string, platform: string, options?: ExecutorCallOptions): Promise<void>

  /**
   * Executes a container with the specified configuration.
   * @param onLogLine - Callback for real-time stdout/stderr logs
   * @returns Execution result with exitCode, timestamps, and optional error
   */
  abstract run(request: RunContainerRequest, onLogLine: OnLogLine, options?: ExecutorCallOptions): Promise<RunContainerResult>

  /**
   * Extracts the root filesystem of a (stopped) container into `dest`.
   */
  abstract exportContainer(name: string, dest: string, options?: ExecutorCallOptions): Promise<void>

  abstract removeContainer(name: string): Promise<void>

  abstract removeImage(tag: string): Promise<void>

  /**
   * Force-remove all containers currently being executed by this process.
   * Called from signal handlers (SIGINT/SIGTERM) to prevent orphaned containers.
   */
  abstract killRunningContainers(): Promise<void>
}
