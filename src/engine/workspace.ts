import {access, mkdir, readdir, rename, rm} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {SnapshotNotFoundError, StagingError, WorkspaceError} from '../errors.js'

/**
 * On-disk store of evaluated graph outputs.
 *
 * A workspace provides:
 * - **staging/**: Temporary write location while a snapshot is being built
 * - **snapshots/**: Committed snapshots (immutable, read-only)
 * - **images/**: Image configurations resolved so far, one JSON file per reference and platform
 *
 * ## Snapshot Lifecycle
 *
 * Each definition output evaluates to a **snapshot**: a directory holding
 * the complete filesystem of that output, keyed by `{digestHex}-{index}`.
 *
 * 1. `prepareSnapshot()` creates `staging/{snapshotId}/`
 * 2. The engine fills it (image export, copy of a host path, container run)
 * 3. Success: `commitSnapshot()` atomically moves it to `snapshots/{snapshotId}/`
 *    OR Failure: `discardSnapshot()` deletes `staging/{snapshotId}/`
 *
 * Snapshots are immutable once committed. The same id always denotes the
 * same content, so a snapshot committed twice keeps the first copy.
 *
 * @example
 * ```typescript
 * const ws = await Workspace.create('/tmp/workdir', 'default')
 * const staging = await ws.prepareSnapshot(id)
 * // ... fill staging ...
 * await ws.commitSnapshot(id) // On success
 * // OR await ws.discardSnapshot(id) // On failure
 * ```
 */
export class Workspace {
  /**
   * Creates a workspace (or reuses an existing one) with its directories.
   * @param workdirRoot - Root directory for all workspaces
   * @param id - Workspace name
   */
  static async create(workdirRoot: string, id: string): Promise<Workspace> {
    Workspace.validateId(id, 'workspace name')
    const root = join(workdirRoot, id)
    await mkdir(join(root, 'staging'), {recursive: true})
    await mkdir(join(root, 'snapshots'), {recursive: true})
    await mkdir(join(root, 'images'), {recursive: true})
    return new Workspace(id, root)
  }

  /**
   * Opens an existing workspace.
   * @throws If workspace does not exist
   */
  static async open(workdirRoot: string, id: string): Promise<Workspace> {
    Workspace.validateId(id, 'workspace name')
    const root = join(workdirRoot, id)
    await access(root)
    return new Workspace(id, root)
  }

  /**
   * Lists all workspace names under the given root directory.
   * @returns Sorted array of workspace names (directories)
   */
  static async list(workdirRoot: string): Promise<string[]> {
    return listDirectories(workdirRoot)
  }

  /**
   * Removes a workspace directory.
   * @throws If the workspace name is invalid
   */
  static async remove(workdirRoot: string, id: string): Promise<void> {
    Workspace.validateId(id, 'workspace name')
    await rm(join(workdirRoot, id), {recursive: true, force: true})
  }

  /**
   * Validates an identifier used as a directory name, to prevent path traversal.
   * @internal
   */
  private static validateId(id: string, kind: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new WorkspaceError('INVALID_ID', `Invalid ${kind}: ${id}. Must contain only alphanumeric characters, dashes, and underscores.`)
    }
  }

  private constructor(
    readonly id: string,
    readonly root: string
  ) {}

  stagingPath(snapshotId: string): string {
    Workspace.validateId(snapshotId, 'snapshot ID')
    return join(this.root, 'staging', snapshotId)
  }

  snapshotPath(snapshotId: string): string {
    Workspace.validateId(snapshotId, 'snapshot ID')
    return join(this.root, 'snapshots', snapshotId)
  }

  /** Path of the cached configuration of an image, `key` being a hex digest. */
  imageConfigPath(key: string): string {
    Workspace.validateId(key, 'image key')
    return join(this.root, 'images', `${key}.json`)
  }

  async hasSnapshot(snapshotId: string): Promise<boolean> {
    try {
      await access(this.snapshotPath(snapshotId))
      return true
    } catch {
      return false
    }
  }

  /**
   * Returns the path of a committed snapshot.
   * @throws {SnapshotNotFoundError} If the snapshot was never committed
   */
  async requireSnapshot(snapshotId: string): Promise<string> {
    if (!(await this.hasSnapshot(snapshotId))) {
      throw new SnapshotNotFoundError(snapshotId)
    }

    return this.snapshotPath(snapshotId)
  }

  /**
   * Prepares an empty staging directory for a snapshot.
   * @returns Absolute path to the created staging directory
   */
  async prepareSnapshot(snapshotId: string): Promise<string> {
    try {
      const path = this.stagingPath(snapshotId)
      await rm(path, {recursive: true, force: true})
      await mkdir(path, {recursive: true})
      return path
    } catch (error) {
      throw new StagingError(`Failed to prepare snapshot ${snapshotId}`, {cause: error})
    }
  }

  /**
   * Commits a staged snapshot using an atomic rename.
   * A snapshot that is already committed is kept and the staged copy dropped.
   */
  async commitSnapshot(snapshotId: string): Promise<string> {
    const target = this.snapshotPath(snapshotId)
    if (await this.hasSnapshot(snapshotId)) {
      await this.discardSnapshot(snapshotId)
      return target
    }

    try {
      await rename(this.stagingPath(snapshotId), target)
      return target
    } catch (error) {
      throw new StagingError(`Failed to commit snapshot ${snapshotId}`, {cause: error})
    }
  }

  /** Discards a staged snapshot (on evaluation failure). */
  async discardSnapshot(snapshotId: string): Promise<void> {
    try {
      await rm(this.stagingPath(snapshotId), {recursive: true, force: true})
    } catch (error) {
      throw new StagingError(`Failed to discard snapshot ${snapshotId}`, {cause: error})
    }
  }

  /**
   * Creates a uniquely named scratch directory under staging/, for
   * intermediate files such as image archives and mount copies.
   * The caller removes it with `discardSnapshot`.
   */
  async prepareScratch(prefix: string): Promise<{id: string; path: string}> {
    const id = `${prefix}-${Date.now()}-${randomUUID().slice(0, 8)}`
    return {id, path: await this.prepareSnapshot(id)}
  }

  /**
   * Removes all staging directories.
   * Called when the engine starts, to clean up interrupted evaluations.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    for (const name of await listDirectories(stagingDir)) {
      await rm(join(stagingDir, name), {recursive: true, force: true})
    }
  }

  /** Lists all committed snapshot IDs, sorted. */
  async listSnapshots(): Promise<string[]> {
    return listDirectories(join(this.root, 'snapshots'))
  }
}

async function listDirectories(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, {withFileTypes: true})
    return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return []
    }

    throw error
  }
}
