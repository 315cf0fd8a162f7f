/**
 * Bind mount of a host path into the container.
 */
export type BindMount = {
  /** Absolute path on the host */
  hostPath: string;
  /** Absolute path in the container */
  containerPath: string;
  readonly?: boolean;
}

/**
 * Request to execute a container with specified configuration.
 */
export type RunContainerRequest = {
  /** Container name (used for Docker container identification) */
  name: string;
  /** Docker image to run, usually a snapshot imported with `importImage` */
  image: string;
  /** Command and arguments to execute (the image entrypoint is cleared) */
  cmd: string[];
  /** `NAME=value` entries passed to the container */
  env?: string[];
  /** Working directory inside the container */
  cwd?: string;
  /** Target platform, `os/arch[/variant]` */
  platform?: string;
  mounts: BindMount[];
  /** Network isolation mode */
  network: 'none' | 'bridge';
  /** Execution timeout in seconds (undefined = no timeout) */
  timeoutSec?: number;
}

/**
 * Result of a container execution.
 * The container is kept so its filesystem can be exported; callers remove it.
 */
export type RunContainerResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Error message if execution failed */
  error?: string;
  timedOut?: boolean;
}
