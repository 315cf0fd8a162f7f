import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'
import {defaultConfig, loadConfig, parseConfigFile, resolveConfig} from '../config.js'

// -- parseConfigFile ---------------------------------------------------------

test('parseConfigFile: empty file', t => {
  t.deepEqual(parseConfigFile(''), {})
})

test('parseConfigFile: known keys', t => {
  t.deepEqual(parseConfigFile('workdir: /var/keel\nworkspace: ci\nplatform: linux/arm64\ntimeoutSec: 600\n'), {
    workdir: '/var/keel',
    workspace: 'ci',
    platform: 'linux/arm64',
    timeoutSec: 600
  })
})

test('parseConfigFile: rejects non-mappings', t => {
  const error = t.throws(() => parseConfigFile('- a\n- b\n'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid .keel.yml: expected a mapping')
})

test('parseConfigFile: rejects unknown keys', t => {
  const error = t.throws(() => parseConfigFile('kits: {}\n'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid .keel.yml: unknown key "kits"')
})

test('parseConfigFile: rejects badly typed values', t => {
  const empty = t.throws(() => parseConfigFile('workspace: ""\n'), {instanceOf: ValidationError})
  t.is(empty?.message, 'Invalid .keel.yml: workspace must be a non-empty string')
  const timeout = t.throws(() => parseConfigFile('timeoutSec: 1.5\n'), {instanceOf: ValidationError})
  t.is(timeout?.message, 'Invalid .keel.yml: timeoutSec must be a positive integer')
  t.throws(() => parseConfigFile('timeoutSec: 0\n'), {instanceOf: ValidationError})
})

// -- resolveConfig -----------------------------------------------------------

test('resolveConfig: defaults', t => {
  t.deepEqual(resolveConfig({}, {}), defaultConfig)
})

test('resolveConfig: flags > environment > file > defaults', t => {
  const file = {workdir: '/from-file', workspace: 'file', platform: 'linux/arm64'}
  const env = {KEEL_WORKDIR: '/from-env', KEEL_PLATFORM: 'linux/amd64'}
  t.deepEqual(resolveConfig(file, env), {workdir: '/from-env', workspace: 'file', platform: 'linux/amd64'})
  t.deepEqual(resolveConfig(file, env, {workdir: '/from-flag', workspace: undefined}), {
    workdir: '/from-flag',
    workspace: 'file',
    platform: 'linux/amd64'
  })
})

test('resolveConfig: empty environment values are ignored', t => {
  t.is(resolveConfig({workdir: '/from-file'}, {KEEL_WORKDIR: ''}).workdir, '/from-file')
})

// -- loadConfig --------------------------------------------------------------

test('loadConfig: defaults when no .keel.yml', async t => {
  const dir = await createTmpDir()
  t.deepEqual(await loadConfig(dir, {}, {}), defaultConfig)
})

test('loadConfig: reads .keel.yml', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.keel.yml'), 'workspace: nightly\n', 'utf8')
  t.deepEqual(await loadConfig(dir, {}, {}), {workdir: './workdir', workspace: 'nightly'})
})

test('loadConfig: throws on invalid YAML', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.keel.yml'), ':\n  - :\n    bad: [', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir, {}, {}))
})
