import test from 'ava'
import {ValidationError} from '../../errors.js'
import {formatPlatform, hostPlatform, parsePlatform} from '../platform.js'

test('parsePlatform: os and architecture', t => {
  t.deepEqual(parsePlatform('linux/amd64'), {os: 'linux', architecture: 'amd64'})
})

test('parsePlatform: with a variant', t => {
  t.deepEqual(parsePlatform('linux/arm64/v8'), {os: 'linux', architecture: 'arm64', variant: 'v8'})
})

test('parsePlatform: rejects malformed values', t => {
  const error = t.throws(() => parsePlatform('linux'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid platform "linux": expected os/arch[/variant]')
  t.throws(() => parsePlatform('linux/arm/v7/extra'), {instanceOf: ValidationError})
  t.throws(() => parsePlatform('linux//v7'), {instanceOf: ValidationError})
})

test('formatPlatform: is the inverse of parsePlatform', t => {
  t.is(formatPlatform(parsePlatform('linux/arm/v7')), 'linux/arm/v7')
  t.is(formatPlatform({os: 'linux', architecture: 'amd64'}), 'linux/amd64')
})

test('hostPlatform: targets linux', t => {
  t.is(hostPlatform().os, 'linux')
  t.truthy(hostPlatform().architecture)
})
