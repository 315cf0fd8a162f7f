export class KeelError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'KeelError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Codec errors ------------------------------------------------------------

export class CodecError extends KeelError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CodecError'
  }
}

export class EncodingError extends CodecError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ENCODING_FAILED', message, options)
    this.name = 'EncodingError'
  }
}

export class DecodingError extends CodecError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('DECODING_FAILED', message, options)
    this.name = 'DecodingError'
  }
}

// -- Image errors ------------------------------------------------------------

export class ImageError extends KeelError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ImageError'
  }
}

export class InvalidReferenceError extends ImageError {
  constructor(
    readonly address: string,
    reason: string,
    options?: {cause?: unknown}
  ) {
    super('INVALID_REFERENCE', `Invalid image reference "${address}": ${reason}`, options)
    this.name = 'InvalidReferenceError'
  }
}

export class RegistryError extends ImageError {
  constructor(
    readonly ref: string,
    options?: {cause?: unknown}
  ) {
    super('REGISTRY_UNREACHABLE', `Failed to resolve image config for "${ref}"`, options)
    this.name = 'RegistryError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ConfigParseError extends ImageError {
  constructor(
    readonly ref: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('CONFIG_PARSE_FAILED', `Invalid image config for "${ref}": ${message}`, options)
    this.name = 'ConfigParseError'
  }
}

// -- Graph errors ------------------------------------------------------------

export class GraphError extends KeelError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'GraphError'
  }
}

/**
 * Raised when a lazy state cannot be turned into a definition.
 * `stage` is `root`, `meta`, or the target path of the mount being propagated.
 */
export class MarshalError extends GraphError {
  constructor(
    readonly stage: string,
    options?: {cause?: unknown}
  ) {
    super('MARSHAL_FAILED', `Failed to marshal ${stage}`, options)
    this.name = 'MarshalError'
  }
}

export class InvalidDefinitionError extends GraphError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_DEFINITION', message, options)
    this.name = 'InvalidDefinitionError'
  }
}

// -- Operation errors --------------------------------------------------------

export class ParseError extends KeelError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PARSE_FAILED', message, options)
    this.name = 'ParseError'
  }
}

export class NotImplementedError extends KeelError {
  constructor(
    readonly feature: string,
    options?: {cause?: unknown}
  ) {
    super('NOT_IMPLEMENTED', `${feature} is not implemented yet`, options)
    this.name = 'NotImplementedError'
  }
}

export class OperationNotFoundError extends KeelError {
  constructor(
    readonly operation: string,
    options?: {cause?: unknown}
  ) {
    super('OPERATION_NOT_FOUND', `Unknown operation "${operation}"`, options)
    this.name = 'OperationNotFoundError'
  }
}

export class ValidationError extends KeelError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends KeelError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ImagePullError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('IMAGE_PULL_FAILED', `Failed to pull image "${image}"`, options)
    this.name = 'ImagePullError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ContainerTimeoutError extends DockerError {
  constructor(timeoutSec: number, options?: {cause?: unknown}) {
    super('CONTAINER_TIMEOUT', `Container exceeded timeout of ${timeoutSec}s`, options)
    this.name = 'ContainerTimeoutError'
  }
}

export class ContainerRunError extends DockerError {
  constructor(
    readonly label: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('CONTAINER_RUN_FAILED', `Exec "${label}" exited with code ${exitCode}`, options)
    this.name = 'ContainerRunError'
  }
}

// -- Workspace errors --------------------------------------------------------

export class WorkspaceError extends KeelError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkspaceError'
  }
}

export class SnapshotNotFoundError extends WorkspaceError {
  constructor(snapshotId: string, options?: {cause?: unknown}) {
    super('SNAPSHOT_NOT_FOUND', `Snapshot ${snapshotId} not found`, options)
    this.name = 'SnapshotNotFoundError'
  }
}

export class StagingError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

export class FileNotFoundError extends WorkspaceError {
  constructor(
    readonly path: string,
    options?: {cause?: unknown}
  ) {
    super('FILE_NOT_FOUND', `File not found: ${path}`, options)
    this.name = 'FileNotFoundError'
  }
}
