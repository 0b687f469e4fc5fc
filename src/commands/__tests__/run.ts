import {join} from 'node:path'
import test from 'ava'
import {CommandFailedError, UnresolvedVariableError, ValidationError} from '../../errors.js'
import {createBuildConfig} from '../../core/build-config.js'
import {createCommandContext, createTmpDir, FakeProcessExecutor} from '../../__tests__/helpers.js'
import {RunCommand} from '../builtin/run.js'

test('apply substitutes argv and runs in the recipe cwd', async t => {
  const cwd = await createTmpDir()
  const executor = new FakeProcessExecutor()
  const context = createCommandContext(cwd, {executor})

  await new RunCommand(['make', '-j%(cores)s', 'PREFIX=%(abs_output)s']).apply(context)

  t.is(executor.invocations.length, 1)
  t.deepEqual(executor.invocations[0].argv, ['make', '-j4', `PREFIX=${join(cwd, 'out')}`])
  t.is(executor.invocations[0].cwd, cwd)
})

test('apply merges config env with templated command env', async t => {
  const cwd = await createTmpDir()
  const executor = new FakeProcessExecutor()
  const config = createBuildConfig({host: 'x86_64-linux-gnu', cores: 2, env: {CC: 'gcc', LANG: 'C'}})
  const context = createCommandContext(cwd, {executor, config})

  await new RunCommand(['make'], {env: {CC: 'clang', TARGET: '%(host)s'}}).apply(context)

  t.deepEqual(executor.invocations[0].env, {CC: 'clang', LANG: 'C', TARGET: 'x86_64-linux-gnu'})
})

test('cwd, stdout and stderr resolve against the working directory', async t => {
  const cwd = await createTmpDir()
  const executor = new FakeProcessExecutor()
  const context = createCommandContext(cwd, {executor})

  await new RunCommand(['configure'], {cwd: 'build', stdout: 'logs/out.txt', stderr: 'logs/err.txt', timeoutSec: 30}).apply(context)

  const [request] = executor.invocations
  t.is(request.cwd, join(cwd, 'build'))
  t.is(request.stdoutPath, join(cwd, 'build', 'logs', 'out.txt'))
  t.is(request.stderrPath, join(cwd, 'build', 'logs', 'err.txt'))
  t.is(request.timeoutSec, 30)
})

test('a non-zero exit raises CommandFailedError with the command line', async t => {
  const cwd = await createTmpDir()
  const context = createCommandContext(cwd)

  const error = await t.throwsAsync(async () => new RunCommand(['fail', '2']).apply(context), {instanceOf: CommandFailedError})
  t.is(error?.command, 'fail 2')
  t.is(error?.exitCode, 2)
})

test('an unknown variable raises UnresolvedVariableError before running', async t => {
  const cwd = await createTmpDir()
  const executor = new FakeProcessExecutor()
  const context = createCommandContext(cwd, {executor})

  await t.throwsAsync(async () => new RunCommand(['cc', '%(nope)s']).apply(context), {instanceOf: UnresolvedVariableError})
  t.is(executor.invocations.length, 0)
})

test('validate rejects an empty argv and a bad timeout', t => {
  t.throws(() => {
    new RunCommand([]).validate()
  }, {instanceOf: ValidationError})
  t.throws(() => {
    new RunCommand(['make'], {timeoutSec: 0}).validate()
  }, {instanceOf: ValidationError})
  t.notThrows(() => {
    new RunCommand(['make'], {timeoutSec: 60}).validate()
  })
})

test('describe holds unresolved templates and sorted env', t => {
  const command = new RunCommand(['make', '%(output)s'], {env: {Z: '1', A: '2'}})
  const description = command.describe()
  t.deepEqual(description, {kind: 'run', argv: ['make', '%(output)s'], env: {A: '2', Z: '1'}})
  t.deepEqual(Object.keys(description.env ?? {}), ['A', 'Z'])
  t.is(command.toString(), 'make %(output)s')
})
