import test from 'ava'
import {DecodingError, NotImplementedError, OperationNotFoundError, RegistryError, ValidationError} from '../../errors.js'
import {State} from '../../graph/state.js'
import {memoryContext, recordingReporter} from '../../__tests__/helpers.js'
import {Directory} from '../directory.js'
import {Resolver, assertOperation, isOperationName} from '../resolver.js'

const images = {
  'docker.io/library/alpine:latest': {
    config: {Env: ['PATH=/bin'], WorkingDir: '/', Entrypoint: ['/bin/sh']}
  }
}

function setup() {
  const {engine, ctx} = memoryContext({images, locals: {'/host/src': {'a.txt': 'A\n'}}})
  const {reporter, events} = recordingReporter()
  return {engine, ctx, events, resolver: new Resolver(ctx, reporter)}
}

// -- names -------------------------------------------------------------------

test('isOperationName: knows implemented operations only', t => {
  t.true(isOperationName('exec'))
  t.true(isOperationName('withMountedDirectory'))
  t.true(isOperationName('rootFilesystem'))
  t.is(assertOperation('rootFilesystem'), 'rootFilesystem')
  t.is(assertOperation('fromImage'), 'fromImage')
  t.false(isOperationName('publish'))
  t.false(isOperationName('toString'))
})

test('assertOperation: unimplemented operations', t => {
  const error = t.throws(() => assertOperation('withMountedCache'), {instanceOf: NotImplementedError})
  t.is(error?.message, 'operation "withMountedCache" is not implemented yet')
})

test('assertOperation: unknown operations', t => {
  const error = t.throws(() => assertOperation('frobnicate'), {instanceOf: OperationNotFoundError})
  t.is(error?.message, 'Unknown operation "frobnicate"')
})

// -- container ---------------------------------------------------------------

test('container: empty identity is scratch', async t => {
  const {resolver} = setup()
  const scratch = await resolver.call('container', resolver.container(), {})
  t.is(scratch.id, '')
})

test('container: validates the identity', t => {
  const {resolver} = setup()
  t.throws(() => resolver.container('garbage!'), {instanceOf: DecodingError})
})

test('container: returns the container for an identity', async t => {
  const {resolver} = setup()
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  const same = await resolver.call('container', resolver.container(), {id: base.id})
  t.is(same.id, base.id)
})

// -- configuration -----------------------------------------------------------

test('workdir: read and replace', async t => {
  const {resolver} = setup()
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  t.is(await resolver.call('workdir', base, {}), '/')
  const moved = await resolver.call('withWorkdir', base, {path: '/src'})
  t.is(await resolver.call('workdir', moved, {}), '/src')
  t.is(await resolver.call('workdir', resolver.container(), {}), '')
})

test('variables: list, read, set and unset', async t => {
  const {resolver} = setup()
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  const set = await resolver.call('withVariable', base, {name: 'MODE', value: 'a=b'})
  t.deepEqual(await resolver.call('variables', set, {}), ['PATH=/bin', 'MODE=a=b'])
  t.is(await resolver.call('variable', set, {name: 'MODE'}), 'a=b')

  const unset = await resolver.call('withoutVariable', set, {name: 'MODE'})
  t.is(await resolver.call('variable', unset, {name: 'MODE'}), null)
})

test('variables: entries are returned as stored', async t => {
  const {resolver} = setup()
  const container = resolver.container().updateImageConfig(config => ({...config, Env: ['A=1', 'BARE']}))
  const variables = await resolver.call('variables', container, {})
  t.deepEqual(variables, ['A=1', 'BARE'])
  variables.push('B=2')
  t.deepEqual(container.imageConfig().Env, ['A=1', 'BARE'])
})

test('withVariable: rejects invalid names', async t => {
  const {resolver} = setup()
  await t.throwsAsync(resolver.call('withVariable', resolver.container(), {name: '', value: 'x'}), {instanceOf: ValidationError})
  await t.throwsAsync(resolver.call('withVariable', resolver.container(), {name: 'A=B', value: 'x'}), {instanceOf: ValidationError})
})

test('user: read and replace', async t => {
  const {resolver} = setup()
  t.is(await resolver.call('user', resolver.container(), {}), '')
  const withUser = await resolver.call('withUser', resolver.container(), {name: 'app'})
  t.is(await resolver.call('user', withUser, {}), 'app')
})

test('entrypoint: read and replace', async t => {
  const {resolver} = setup()
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  t.deepEqual(await resolver.call('entrypoint', base, {}), ['/bin/sh'])
  const replaced = await resolver.call('withEntrypoint', base, {args: ['/usr/bin/env', 'node']})
  t.deepEqual(await resolver.call('entrypoint', replaced, {}), ['/usr/bin/env', 'node'])
  t.deepEqual(await resolver.call('entrypoint', resolver.container(), {}), [])
})

// -- mounts & exec -----------------------------------------------------------

test('mounts: add, list and remove', async t => {
  const {ctx, resolver} = setup()
  const source = await Directory.fromState(ctx, State.local('/host/src'))
  const mounted = await resolver.call('withMountedDirectory', resolver.container(), {path: '/src', source})
  t.deepEqual(await resolver.call('mounts', mounted, {}), ['/src'])
  const unmounted = await resolver.call('withoutMount', mounted, {path: '/src'})
  t.deepEqual(await resolver.call('mounts', unmounted, {}), [])
})

test('exec: exit code and output files', async t => {
  const {ctx, resolver} = setup()
  const source = await Directory.fromState(ctx, State.local('/host/src'))
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  const mounted = await resolver.call('withMountedDirectory', base, {path: '/src', source})
  const ran = await resolver.call('exec', mounted, {args: ['cat', '/src/a.txt', '/src/missing']})
  t.is(await resolver.call('exitCode', ran, {}), 1)
  const stdout = await resolver.call('stdout', ran, {})
  const stderr = await resolver.call('stderr', ran, {})
  t.is((await stdout?.contents(ctx))?.toString('utf8'), 'A\n')
  t.is((await stderr?.contents(ctx))?.toString('utf8'), 'cat: /src/missing: No such file or directory\n')
})

test('exec: output is null before anything ran', async t => {
  const {resolver} = setup()
  t.is(await resolver.call('exitCode', resolver.container(), {}), null)
  t.is(await resolver.call('stdout', resolver.container(), {}), null)
  t.is(await resolver.call('stderr', resolver.container(), {}), null)
})

test('rootFilesystem: directory over the container filesystem', async t => {
  const {ctx, engine, resolver} = setup()
  const base = await resolver.call('from', resolver.container(), {address: 'alpine'})
  const ran = await resolver.call('exec', base, {args: ['touch', '/marker']})
  const root = await resolver.call('rootFilesystem', ran, {})
  t.deepEqual(await engine.listFiles(root.decode(ctx).state), ['/marker'])
  const alias = await resolver.call('rootfs', ran, {})
  t.is(alias.id, root.id)
})

// -- reporting ---------------------------------------------------------------

test('call: emits start and finish events', async t => {
  const {resolver, events} = setup()
  await resolver.call('withWorkdir', resolver.container(), {path: '/src'})
  t.deepEqual(events.map(event => event.event), ['OPERATION_START', 'OPERATION_FINISHED'])
  const [start] = events
  t.deepEqual(start, {
    event: 'OPERATION_START',
    operation: {id: '1:withWorkdir', operation: 'withWorkdir', displayName: 'withWorkdir /src'}
  })
})

test('call: describes array arguments', async t => {
  const {resolver, events} = setup()
  await resolver.call('exec', resolver.container(), {args: ['echo', 'hi']})
  const [start] = events
  t.is(start.event === 'OPERATION_START' ? start.operation.displayName : undefined, 'exec echo hi')
})

test('call: numbers calls in order', async t => {
  const {resolver, events} = setup()
  await resolver.call('user', resolver.container(), {})
  await resolver.call('mounts', resolver.container(), {})
  const ids = events.flatMap(event => (event.event === 'OPERATION_START' ? [event.operation.id] : []))
  t.deepEqual(ids, ['1:user', '2:mounts'])
})

test('call: emits a failure with the error code and rethrows', async t => {
  const {resolver, events} = setup()
  await t.throwsAsync(resolver.call('from', resolver.container(), {address: 'busybox'}), {instanceOf: RegistryError})
  const failed = events.find(event => event.event === 'OPERATION_FAILED')
  t.is(failed?.event === 'OPERATION_FAILED' ? failed.code : undefined, 'REGISTRY_UNREACHABLE')
  t.is(failed?.event === 'OPERATION_FAILED' ? failed.message : undefined, 'Failed to resolve image config for "docker.io/library/busybox:latest"')
})
