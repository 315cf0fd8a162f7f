import test from 'ava'
import {GraphError} from '../../errors.js'
import {marshal} from '../marshal.js'
import {State} from '../state.js'

test('State.scratch: is scratch', t => {
  t.true(State.scratch().isScratch)
  t.false(State.local('/a').isScratch)
})

test('run: builds an exec op with indexed inputs', t => {
  const exec = State.image('docker.io/library/alpine:latest').run({
    args: ['sh', '-c', 'true'],
    env: [{name: 'A', value: '1'}, {name: 'B', value: 'x=y'}],
    cwd: '/work',
    label: 'check',
    mounts: [
      {target: '/tools', source: State.local('/opt/tools'), readonly: true},
      {target: '/out', source: State.scratch()},
      {target: '/cache/', source: State.local('/var/cache'), selector: 'sub/dir'}
    ]
  })

  const [, , , entry] = marshal(exec.root()).ops
  t.deepEqual(entry.op, {
    type: 'exec',
    root: 0,
    args: ['sh', '-c', 'true'],
    env: ['A=1', 'B=x=y'],
    cwd: '/work',
    label: 'check',
    mounts: [
      {target: '/tools', input: 1, output: -1, readonly: true},
      {target: '/out', input: -1, output: 1},
      {target: '/cache', input: 2, output: 2, selector: '/sub/dir'}
    ]
  })
})

test('run: scratch root has no input', t => {
  const definition = marshal(State.scratch().run({args: ['true']}).root())
  const [entry] = definition.ops
  t.true(entry.op.type === 'exec' && entry.op.root === -1)
  t.deepEqual(entry.inputs, [])
})

test('run: rejects empty arguments', t => {
  const error = t.throws(() => State.scratch().run({args: []}), {instanceOf: GraphError})
  t.is(error?.code, 'INVALID_RUN')
})

test('run: rejects relative mount targets', t => {
  t.throws(() => State.scratch().run({args: ['true'], mounts: [{target: 'out', source: State.scratch()}]}), {instanceOf: GraphError})
})

test('getMount: returns the output of a writable mount', t => {
  const exec = State.scratch().run({args: ['true'], mounts: [{target: '/out', source: State.scratch()}]})
  t.deepEqual(marshal(exec.getMount('/out')).output?.index, 1)
  t.deepEqual(marshal(exec.getMount('/out/')).output?.index, 1)
})

test('getMount: the last mount at a target shadows earlier ones', t => {
  const exec = State.scratch().run({
    args: ['true'],
    mounts: [
      {target: '/data', source: State.local('/a')},
      {target: '/data', source: State.local('/b')}
    ]
  })
  t.is(marshal(exec.getMount('/data')).output?.index, 2)
})

test('getMount: read-only mounts have no output', t => {
  const exec = State.scratch().run({args: ['true'], mounts: [{target: '/ro', source: State.local('/a'), readonly: true}]})
  const error = t.throws(() => exec.getMount('/ro'), {instanceOf: GraphError})
  t.is(error?.code, 'MOUNT_NOT_FOUND')
})

test('root: output zero of the exec', t => {
  const exec = State.scratch().run({args: ['true']})
  t.is(marshal(exec.root()).output?.index, 0)
})
