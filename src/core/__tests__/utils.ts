import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {abbreviate, dirSize, formatDuration, formatSize} from '../utils.js'

test('dirSize: sums regular files recursively', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'nested'))
  await writeFile(join(dir, 'a'), 'hello')
  await writeFile(join(dir, 'nested', 'b'), 'abc')
  t.is(await dirSize(dir), 8)
})

test('dirSize: missing directory is empty', async t => {
  const dir = await createTmpDir()
  t.is(await dirSize(join(dir, 'missing')), 0)
})

test('formatSize: picks the unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(2 * 1024 * 1024 * 1024), '2.0 GB')
})

test('formatDuration: milliseconds, seconds and minutes', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('abbreviate: keeps short values', t => {
  t.is(abbreviate('sha256:abc'), 'sha256:abc')
})

test('abbreviate: shortens long values from both ends', t => {
  const value = 'a'.repeat(12) + 'x'.repeat(10) + 'b'.repeat(12)
  t.is(abbreviate(value), `${'a'.repeat(12)}…${'b'.repeat(12)}`)
  t.is(abbreviate('abcdefgh', 3), 'abc…fgh')
})
