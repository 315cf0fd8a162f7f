import test from 'ava'
import {InvalidReferenceError} from '../../errors.js'
import {formatReference, normalizeReference, parseReference} from '../reference.js'

const digest = `sha256:${'a'.repeat(64)}`

test('normalizeReference: expands official images', t => {
  t.is(normalizeReference('alpine'), 'docker.io/library/alpine:latest')
  t.is(normalizeReference('alpine:3.20'), 'docker.io/library/alpine:3.20')
})

test('normalizeReference: expands user repositories on Docker Hub', t => {
  t.is(normalizeReference('someone/tool'), 'docker.io/someone/tool:latest')
})

test('normalizeReference: keeps other registries', t => {
  t.is(normalizeReference('ghcr.io/org/app:v1'), 'ghcr.io/org/app:v1')
})

test('normalizeReference: registry with a port is not a tag', t => {
  t.is(normalizeReference('localhost:5000/app'), 'localhost:5000/app:latest')
})

test('normalizeReference: rewrites the legacy Docker Hub domain', t => {
  t.is(normalizeReference('index.docker.io/nginx'), 'docker.io/library/nginx:latest')
})

test('normalizeReference: a digest suppresses the default tag', t => {
  t.is(normalizeReference(`alpine@${digest}`), `docker.io/library/alpine@${digest}`)
})

test('normalizeReference: is idempotent', t => {
  const once = normalizeReference('alpine:3.20')
  t.is(normalizeReference(once), once)
})

test('parseReference: splits domain, path and tag', t => {
  t.deepEqual(parseReference('registry.example.com:443/team/app:1.0'), {
    domain: 'registry.example.com:443',
    path: 'team/app',
    tag: '1.0'
  })
})

test('parseReference: leaves the tag out when absent', t => {
  t.deepEqual(parseReference('alpine'), {domain: 'docker.io', path: 'library/alpine'})
})

test('formatReference: joins tag and digest', t => {
  t.is(formatReference({domain: 'docker.io', path: 'library/alpine', tag: '3', digest}), `docker.io/library/alpine:3@${digest}`)
})

test('parseReference: rejects an empty address', t => {
  const error = t.throws(() => parseReference(''), {instanceOf: InvalidReferenceError})
  t.is(error?.message, 'Invalid image reference "": empty reference')
})

test('parseReference: rejects uppercase repositories', t => {
  const error = t.throws(() => parseReference('Alpine'), {instanceOf: InvalidReferenceError})
  t.is(error?.message, 'Invalid image reference "Alpine": repository name must be lowercase')
})

test('parseReference: rejects malformed tags', t => {
  const error = t.throws(() => parseReference('alpine:bad tag'), {instanceOf: InvalidReferenceError})
  t.is(error?.message, 'Invalid image reference "alpine:bad tag": invalid tag "bad tag"')
})

test('parseReference: rejects malformed digests', t => {
  const error = t.throws(() => parseReference('alpine@sha256:short'), {instanceOf: InvalidReferenceError})
  t.is(error?.message, 'Invalid image reference "alpine@sha256:short": invalid digest "sha256:short"')
})

test('parseReference: rejects malformed repository components', t => {
  t.throws(() => parseReference('library/-alpine'), {instanceOf: InvalidReferenceError})
  t.throws(() => parseReference('alpine//edge'), {instanceOf: InvalidReferenceError})
})
