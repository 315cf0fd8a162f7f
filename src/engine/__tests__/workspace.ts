import {access, readFile, readdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {Workspace} from '../workspace.js'
import {SnapshotNotFoundError, WorkspaceError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// -- create & open -----------------------------------------------------------

test('create makes staging/, snapshots/, images/ directories', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'ws-1')
  const entries = await readdir(ws.root)
  t.deepEqual(entries.sort(), ['images', 'snapshots', 'staging'])
})

test('create reuses an existing workspace', async t => {
  const root = await createTmpDir()
  const first = await Workspace.create(root, 'shared')
  await first.prepareSnapshot('abc-0')
  await first.commitSnapshot('abc-0')
  const second = await Workspace.create(root, 'shared')
  t.deepEqual(await second.listSnapshots(), ['abc-0'])
})

test('open returns workspace with correct id and root', async t => {
  const root = await createTmpDir()
  await Workspace.create(root, 'existing')
  const ws = await Workspace.open(root, 'existing')
  t.is(ws.id, 'existing')
  t.is(ws.root, join(root, 'existing'))
})

test('open throws if workspace missing', async t => {
  const root = await createTmpDir()
  await t.throwsAsync(async () => Workspace.open(root, 'nonexistent'))
})

// -- list & remove -----------------------------------------------------------

test('list returns sorted workspace IDs', async t => {
  const root = await createTmpDir()
  await Workspace.create(root, 'beta')
  await Workspace.create(root, 'alpha')
  await Workspace.create(root, 'gamma')
  t.deepEqual(await Workspace.list(root), ['alpha', 'beta', 'gamma'])
})

test('list returns empty array if root does not exist', async t => {
  const root = await createTmpDir()
  t.deepEqual(await Workspace.list(join(root, 'missing')), [])
})

test('remove deletes workspace', async t => {
  const root = await createTmpDir()
  await Workspace.create(root, 'to-delete')
  await Workspace.remove(root, 'to-delete')
  t.deepEqual(await Workspace.list(root), [])
})

test('remove throws WorkspaceError on path traversal', async t => {
  const root = await createTmpDir()
  const error = await t.throwsAsync(async () => Workspace.remove(root, '../etc'), {instanceOf: WorkspaceError})
  t.is(error?.code, 'INVALID_ID')
  await t.throwsAsync(async () => Workspace.remove(root, 'a/b'), {instanceOf: WorkspaceError})
})

// -- snapshot lifecycle ------------------------------------------------------

test('prepareSnapshot creates an empty staging directory', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'prepare')
  const staging = await ws.prepareSnapshot('abc-0')
  t.is(staging, ws.stagingPath('abc-0'))
  t.deepEqual(await readdir(staging), [])
})

test('prepareSnapshot clears leftovers of an interrupted build', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'leftovers')
  await writeFile(join(await ws.prepareSnapshot('abc-0'), 'partial'), 'x')
  t.deepEqual(await readdir(await ws.prepareSnapshot('abc-0')), [])
})

test('commitSnapshot moves staging to snapshots', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'commit')
  await writeFile(join(await ws.prepareSnapshot('abc-0'), 'file.txt'), 'hello')
  const path = await ws.commitSnapshot('abc-0')
  t.is(path, ws.snapshotPath('abc-0'))
  t.is(await readFile(join(path, 'file.txt'), 'utf8'), 'hello')
  t.deepEqual(await readdir(join(ws.root, 'staging')), [])
})

test('commitSnapshot keeps the first committed copy', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'commit-twice')
  await writeFile(join(await ws.prepareSnapshot('abc-0'), 'file.txt'), 'first')
  await ws.commitSnapshot('abc-0')
  await writeFile(join(await ws.prepareSnapshot('abc-0'), 'file.txt'), 'second')
  await ws.commitSnapshot('abc-0')
  t.is(await readFile(join(ws.snapshotPath('abc-0'), 'file.txt'), 'utf8'), 'first')
  t.deepEqual(await readdir(join(ws.root, 'staging')), [])
})

test('discardSnapshot removes the staging directory', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'discard')
  await ws.prepareSnapshot('abc-0')
  await ws.discardSnapshot('abc-0')
  t.deepEqual(await readdir(join(ws.root, 'staging')), [])
  t.deepEqual(await ws.listSnapshots(), [])
})

test('hasSnapshot and requireSnapshot', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'require')
  t.false(await ws.hasSnapshot('abc-1'))
  await t.throwsAsync(ws.requireSnapshot('abc-1'), {instanceOf: SnapshotNotFoundError})
  await ws.prepareSnapshot('abc-1')
  await ws.commitSnapshot('abc-1')
  t.true(await ws.hasSnapshot('abc-1'))
  t.is(await ws.requireSnapshot('abc-1'), ws.snapshotPath('abc-1'))
})

test('listSnapshots is sorted', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'list-snapshots')
  for (const id of ['ccc-0', 'aaa-1', 'bbb-0']) {
    await ws.prepareSnapshot(id)
    await ws.commitSnapshot(id)
  }

  t.deepEqual(await ws.listSnapshots(), ['aaa-1', 'bbb-0', 'ccc-0'])
})

// -- scratch & cleanup -------------------------------------------------------

test('prepareScratch creates a unique staging directory', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'scratch')
  const first = await ws.prepareScratch('exec')
  const second = await ws.prepareScratch('exec')
  t.not(first.id, second.id)
  t.regex(first.id, /^exec-/)
  await t.notThrowsAsync(async () => access(first.path))
})

test('cleanupStaging removes all staging dirs', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'cleanup')
  await ws.prepareSnapshot('abc-0')
  await ws.prepareScratch('exec')
  await ws.cleanupStaging()
  t.deepEqual(await readdir(join(ws.root, 'staging')), [])
})

test('cleanupStaging is no-op when empty', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'cleanup-noop')
  await t.notThrowsAsync(async () => ws.cleanupStaging())
})

// -- validation --------------------------------------------------------------

test('invalid snapshot IDs throw WorkspaceError', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'validate')
  t.throws(() => ws.stagingPath('bad/id'), {instanceOf: WorkspaceError})
  t.throws(() => ws.snapshotPath('bad id'), {instanceOf: WorkspaceError})
  const error = t.throws(() => ws.imageConfigPath('../x'), {instanceOf: WorkspaceError})
  t.true(error?.message.includes('../x'))
})

test('imageConfigPath lives under images/', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root, 'images')
  t.is(ws.imageConfigPath('abc'), join(ws.root, 'images', 'abc.json'))
})
