/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {Container, DockerCliExecutor, LocalEngine, Workspace, hostPlatform} from 'keel'
 *
 * const workspace = await Workspace.create('/tmp/workdir', 'default')
 * const engine = new LocalEngine({workspace, executor: new DockerCliExecutor()})
 * const ctx = {engine, shim: engine.shim, platform: hostPlatform()}
 *
 * const base = await new Container().from(ctx, 'alpine:3.20')
 * const ran = await base.exec(ctx, ['sh', '-c', 'echo hello'])
 * await ran.exitCode(ctx) // 0
 * ```
 */

export * from './core/index.js'
export * from './graph/index.js'
export * from './engine/index.js'
export type {Plan, PlanStep, PlanOperation, KeelConfig} from './types.js'

export {
  KeelError,
  CodecError,
  EncodingError,
  DecodingError,
  ImageError,
  InvalidReferenceError,
  RegistryError,
  ConfigParseError,
  GraphError,
  MarshalError,
  InvalidDefinitionError,
  ParseError,
  NotImplementedError,
  OperationNotFoundError,
  ValidationError,
  DockerError,
  DockerNotAvailableError,
  ImagePullError,
  ContainerTimeoutError,
  ContainerRunError,
  WorkspaceError,
  SnapshotNotFoundError,
  StagingError,
  FileNotFoundError
} from './errors.js'
