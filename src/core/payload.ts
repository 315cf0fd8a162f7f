import {DecodingError} from '../errors.js'
import {isDefinition, isRecord, isStringArray} from '../graph/types.js'
import type {Definition} from '../graph/types.js'
import {decodeId, encodeId} from './codec.js'

/** Opaque, content-addressed identity of a container. Empty string is scratch. */
export type ContainerID = string

/** Opaque, content-addressed identity of a directory. */
export type DirectoryID = string

/** Opaque, content-addressed identity of a file. */
export type FileID = string

/**
 * OCI image configuration (the `config` object of an image).
 * Every field is optional; a scratch container has an empty configuration.
 */
export type ImageConfig = {
  User?: string;
  ExposedPorts?: Record<string, Record<string, unknown>>;
  Env?: string[];
  Entrypoint?: string[];
  Cmd?: string[];
  Volumes?: Record<string, Record<string, unknown>>;
  WorkingDir?: string;
  Labels?: Record<string, string>;
  StopSignal?: string;
}

/** A mount point configured in a container. */
export type ContainerMount = {
  /** Definition of the mounted content */
  source: Definition;
  /** Path beneath the source to scope the mount to */
  sourcePath?: string;
  /** Absolute path of the mount inside the container */
  target: string;
}

/** Inner content of a ContainerID. */
export type ContainerPayload = {
  /** Root filesystem; null is the canonical empty filesystem */
  fs: Definition | null;
  /** Image configuration (env, workdir, entrypoint...) */
  config: ImageConfig;
  /** Mounts in the order they were added */
  mounts: ContainerMount[];
  /** Metadata mount written by the shim; null until something has run */
  meta: Definition | null;
}

/** Inner content of a DirectoryID. */
export type DirectoryPayload = {
  state: Definition | null;
  /** Path of the directory within the state */
  dir: string;
}

/** Inner content of a FileID. */
export type FilePayload = {
  state: Definition | null;
  /** Path of the file within the state */
  file: string;
}

export function scratchPayload(): ContainerPayload {
  return {fs: null, config: {}, mounts: [], meta: null}
}

// -- Container IDs ------------------------------------------------------------

export function encodeContainerId(payload: ContainerPayload): ContainerID {
  return encodeId(payload)
}

/**
 * Decodes a container identity into a fresh payload.
 * The empty identity decodes to the scratch payload.
 */
export function decodeContainerId(id: ContainerID): ContainerPayload {
  if (id === '') {
    return scratchPayload()
  }

  const payload = decodeId(id)
  if (!isContainerPayload(payload)) {
    throw new DecodingError('Malformed container identity')
  }

  return payload
}

// -- Directory & file IDs -----------------------------------------------------

export function encodeDirectoryId(payload: DirectoryPayload): DirectoryID {
  return encodeId(payload)
}

export function decodeDirectoryId(id: DirectoryID): DirectoryPayload {
  if (id === '') {
    return {state: null, dir: ''}
  }

  const payload = decodeId(id)
  if (!isRecord(payload) || !isNullableDefinition(payload.state) || typeof payload.dir !== 'string') {
    throw new DecodingError('Malformed directory identity')
  }

  return {state: payload.state, dir: payload.dir}
}

export function encodeFileId(payload: FilePayload): FileID {
  return encodeId(payload)
}

export function decodeFileId(id: FileID): FilePayload {
  const payload = decodeId(id)
  if (!isRecord(payload) || !isNullableDefinition(payload.state) || typeof payload.file !== 'string') {
    throw new DecodingError('Malformed file identity')
  }

  return {state: payload.state, file: payload.file}
}

// -- Validation ---------------------------------------------------------------

function isNullableDefinition(value: unknown): value is Definition | null {
  return value === null || isDefinition(value)
}

function isObjectMap(value: unknown): value is Record<string, Record<string, unknown>> {
  return isRecord(value) && Object.values(value).every(item => isRecord(item))
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string')
}

const imageConfigChecks: Record<keyof ImageConfig, (value: unknown) => boolean> = {
  User: value => typeof value === 'string',
  ExposedPorts: isObjectMap,
  Env: isStringArray,
  Entrypoint: isStringArray,
  Cmd: isStringArray,
  Volumes: isObjectMap,
  WorkingDir: value => typeof value === 'string',
  Labels: isStringMap,
  StopSignal: value => typeof value === 'string'
}

function isImageConfigKey(key: string): key is keyof ImageConfig {
  return Object.hasOwn(imageConfigChecks, key)
}

/**
 * Returns the first image configuration field with an unexpected type, if any.
 * Unknown fields are ignored.
 */
export function invalidImageConfigField(value: Record<string, unknown>): string | undefined {
  return Object.keys(value).find(key => isImageConfigKey(key) && value[key] !== undefined && !imageConfigChecks[key](value[key]))
}

/** Keeps the known image configuration fields of a raw config object. */
export function pickImageConfig(value: Record<string, unknown>): ImageConfig {
  const config: ImageConfig = {}
  for (const key of Object.keys(value)) {
    if (isImageConfigKey(key) && value[key] !== undefined && value[key] !== null) {
      Object.assign(config, {[key]: value[key]})
    }
  }

  return config
}

export function isImageConfig(value: unknown): value is ImageConfig {
  return isRecord(value) && invalidImageConfigField(value) === undefined
}

function isContainerMount(value: unknown): value is ContainerMount {
  return isRecord(value)
    && isDefinition(value.source)
    && (value.sourcePath === undefined || typeof value.sourcePath === 'string')
    && typeof value.target === 'string'
}

export function isContainerPayload(value: unknown): value is ContainerPayload {
  return isRecord(value)
    && isNullableDefinition(value.fs)
    && isImageConfig(value.config)
    && Array.isArray(value.mounts) && value.mounts.every(m => isContainerMount(m))
    && isNullableDefinition(value.meta)
}
