export {canonicalJson, canonicalize, encodeId, decodeId, ID_VERSION, type JsonValue} from './codec.js'
export {
  decodeContainerId,
  encodeContainerId,
  decodeDirectoryId,
  encodeDirectoryId,
  decodeFileId,
  encodeFileId,
  scratchPayload,
  isContainerPayload
} from './payload.js'
export type {
  ContainerID,
  DirectoryID,
  FileID,
  ImageConfig,
  ContainerMount,
  ContainerPayload,
  DirectoryPayload,
  FilePayload
} from './payload.js'
export {parseEnv, lookupVariable, withVariable, withoutVariable, parseImageConfig} from './image-config.js'
export {parseReference, normalizeReference, formatReference, withDefaultTag, type ImageReference} from './reference.js'
export {marshalStage, isAbortError, type OperationContext} from './context.js'
export {Container, parseExitCode, type ExecOptions} from './container.js'
export {Directory} from './directory.js'
export {File} from './file.js'
export {
  Resolver,
  assertOperation,
  isOperationName,
  unimplementedOperations,
  type OperationName,
  type OperationArgs,
  type OperationResults
} from './resolver.js'
export {PlanLoader, parsePlanFile} from './plan-loader.js'
export {PlanRunner, type PlanResult} from './plan-runner.js'
export {loadEnvFile} from './env-file.js'
export {ConsoleReporter, InteractiveReporter, noopReporter} from './reporter.js'
export type {
  Reporter,
  OperationRef,
  BuildEvent,
  OperationStartEvent,
  OperationFinishedEvent,
  OperationFailedEvent,
  SnapshotCachedEvent,
  SnapshotBuiltEvent
} from './reporter.js'
export {dirSize, formatSize, formatDuration, abbreviate} from './utils.js'
