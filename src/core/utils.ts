import {readdir, stat} from 'node:fs/promises'
import {join} from 'node:path'

/** Total size of the regular files under a directory; 0 when it does not exist. */
export async function dirSize(dirPath: string): Promise<number> {
  let entries
  try {
    entries = await readdir(dirPath, {withFileTypes: true})
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0
    }

    throw error
  }

  let total = 0
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      total += await dirSize(fullPath)
    } else if (entry.isFile()) {
      total += (await stat(fullPath)).size
    }
  }

  return total
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/** Shortens an identity or digest for display: `abcdef…uvwxyz`. */
export function abbreviate(value: string, size = 12): string {
  if (value.length <= size * 2 + 1) {
    return value
  }

  return `${value.slice(0, size)}…${value.slice(-size)}`
}
