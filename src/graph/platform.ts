import process from 'node:process'
import {ValidationError} from '../errors.js'
import type {Platform} from './types.js'

const architectures: Record<string, string> = {
  x64: 'amd64',
  ia32: '386',
  arm64: 'arm64',
  arm: 'arm',
  ppc64: 'ppc64le',
  s390x: 's390x',
  riscv64: 'riscv64'
}

/**
 * Platform of the machine running keel, always on Linux since that is
 * what container images target.
 */
export function hostPlatform(): Platform {
  const architecture = architectures[process.arch] ?? process.arch
  if (architecture === 'arm') {
    return {os: 'linux', architecture, variant: 'v7'}
  }

  return {os: 'linux', architecture}
}

/**
 * Parses a platform written as `os/arch[/variant]` (e.g. `linux/arm64/v8`).
 */
export function parsePlatform(value: string): Platform {
  const parts = value.split('/')
  if (parts.length < 2 || parts.length > 3 || parts.some(part => !/^[\w.-]+$/.test(part))) {
    throw new ValidationError(`Invalid platform "${value}": expected os/arch[/variant]`)
  }

  const [os, architecture, variant] = parts
  return variant ? {os, architecture, variant} : {os, architecture}
}

export function formatPlatform(platform: Platform): string {
  const base = `${platform.os}/${platform.architecture}`
  return platform.variant ? `${base}/${platform.variant}` : base
}
