export {BuildEngine, type EngineCallOptions, type ShimProvider} from './engine.js'
export {LocalEngine, snapshotId, type LocalEngineOptions} from './local-engine.js'
export {
  MemoryEngine,
  MemoryShimProvider,
  type MemoryEngineOptions,
  type MemoryImage,
  type MemoryTree,
  type CommandHandler,
  type CommandContext,
  type VirtualFs
} from './memory-engine.js'
export {ShellShimProvider, shimPath, metaMount, metaFiles} from './shim.js'
export {Workspace} from './workspace.js'
export {ContainerExecutor, type LogLine, type OnLogLine, type ExecutorCallOptions} from './executor.js'
export {DockerCliExecutor, dockerCliEnv, dockerRunArgs} from './docker-executor.js'
export type {BindMount, RunContainerRequest, RunContainerResult} from './types.js'
