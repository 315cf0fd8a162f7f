import {InvalidReferenceError} from '../errors.js'

export const defaultDomain = 'docker.io'
export const defaultTag = 'latest'
const legacyDomain = 'index.docker.io'
const officialRepoPrefix = 'library/'

const componentPattern = /^[a-z\d]+(?:(?:[._]|__|-+)[a-z\d]+)*$/
const domainPattern = /^(?:[a-zA-Z\d](?:[a-zA-Z\d-]*[a-zA-Z\d])?)(?:\.[a-zA-Z\d](?:[a-zA-Z\d-]*[a-zA-Z\d])?)*(?::\d+)?$/
const tagPattern = /^\w[\w.-]{0,127}$/
const digestPattern = /^[a-z\d]+(?:[.+_-][a-z\d]+)*:[a-zA-Z\d=_-]{32,}$/
const maxNameLength = 255

/** A parsed, normalized image reference. */
export type ImageReference = {
  /** Registry host, e.g. `docker.io` or `localhost:5000` */
  domain: string;
  /** Repository path, e.g. `library/alpine` */
  path: string;
  tag?: string;
  digest?: string;
}

/**
 * Parses an image address into a normalized reference.
 *
 * Short names are expanded the way the Docker CLI does it:
 * `alpine` becomes `docker.io/library/alpine`.
 *
 * @throws {InvalidReferenceError} If the address is malformed
 */
export function parseReference(address: string): ImageReference {
  if (address === '') {
    throw new InvalidReferenceError(address, 'empty reference')
  }

  let remainder = address
  let digest: string | undefined
  const at = remainder.indexOf('@')
  if (at !== -1) {
    digest = remainder.slice(at + 1)
    remainder = remainder.slice(0, at)
    if (!digestPattern.test(digest)) {
      throw new InvalidReferenceError(address, `invalid digest "${digest}"`)
    }
  }

  let tag: string | undefined
  const colon = remainder.lastIndexOf(':')
  if (colon > remainder.lastIndexOf('/')) {
    tag = remainder.slice(colon + 1)
    remainder = remainder.slice(0, colon)
    if (!tagPattern.test(tag)) {
      throw new InvalidReferenceError(address, `invalid tag "${tag}"`)
    }
  }

  const {domain, path} = splitDomain(remainder)
  if (!domainPattern.test(domain)) {
    throw new InvalidReferenceError(address, `invalid registry "${domain}"`)
  }

  if (path !== path.toLowerCase()) {
    throw new InvalidReferenceError(address, 'repository name must be lowercase')
  }

  if (path.split('/').some(component => !componentPattern.test(component))) {
    throw new InvalidReferenceError(address, `invalid repository name "${path}"`)
  }

  if (domain.length + 1 + path.length > maxNameLength) {
    throw new InvalidReferenceError(address, `repository name must not be longer than ${maxNameLength} characters`)
  }

  const ref: ImageReference = {domain, path}
  if (tag) {
    ref.tag = tag
  }

  if (digest) {
    ref.digest = digest
  }

  return ref
}

function splitDomain(name: string): {domain: string; path: string} {
  const slash = name.indexOf('/')
  const first = slash === -1 ? '' : name.slice(0, slash)
  let domain: string
  let path: string
  if (slash === -1 || (!first.includes('.') && !first.includes(':') && first !== 'localhost' && first.toLowerCase() === first)) {
    domain = defaultDomain
    path = name
  } else {
    domain = first
    path = name.slice(slash + 1)
  }

  if (domain === legacyDomain) {
    domain = defaultDomain
  }

  if (domain === defaultDomain && !path.includes('/')) {
    path = officialRepoPrefix + path
  }

  return {domain, path}
}

/** Adds the default tag to references that carry neither a tag nor a digest. */
export function withDefaultTag(ref: ImageReference): ImageReference {
  if (ref.tag || ref.digest) {
    return ref
  }

  return {...ref, tag: defaultTag}
}

export function formatReference(ref: ImageReference): string {
  let result = `${ref.domain}/${ref.path}`
  if (ref.tag) {
    result += `:${ref.tag}`
  }

  if (ref.digest) {
    result += `@${ref.digest}`
  }

  return result
}

/**
 * Canonical, tag-defaulted form of an image address.
 * @example normalizeReference('alpine') // 'docker.io/library/alpine:latest'
 */
export function normalizeReference(address: string): string {
  return formatReference(withDefaultTag(parseReference(address)))
}
