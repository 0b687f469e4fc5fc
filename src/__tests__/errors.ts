import test from 'ava'
import {
  KilnError,
  ConfigurationError,
  ValidationError,
  MissingDependencyError,
  CyclicDependencyError,
  UnresolvedVariableError,
  CommandError,
  CommandFailedError,
  IOFailureError,
  SyncError,
  CacheStoreError,
  DigestMismatchError,
  WorkspaceError,
  StagingError,
  WorkspaceLockedError,
  PackageError,
  IncompletePackageError,
  BuildFailedError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('configuration errors are instanceof ConfigurationError and KilnError', t => {
  for (const error of [
    new ValidationError('bad'),
    new MissingDependencyError('b', 'a'),
    new CyclicDependencyError(['a', 'b', 'a']),
    new UnresolvedVariableError('x', '%(x)s')
  ]) {
    t.true(error instanceof ConfigurationError)
    t.true(error instanceof KilnError)
    t.true(error instanceof Error)
  }
})

test('command errors are instanceof CommandError and KilnError', t => {
  for (const error of [
    new CommandFailedError('make install', 2),
    new IOFailureError('disk full'),
    new SyncError('https://example.com/repo.git', 'no such revision')
  ]) {
    t.true(error instanceof CommandError)
    t.true(error instanceof KilnError)
  }
})

test('DigestMismatchError is instanceof CacheStoreError', t => {
  const error = new DigestMismatchError('f'.repeat(64), 'aaa', 'bbb')
  t.true(error instanceof CacheStoreError)
  t.true(error instanceof KilnError)
})

test('StagingError and WorkspaceLockedError are instanceof WorkspaceError', t => {
  t.true(new StagingError('failed') instanceof WorkspaceError)
  t.true(new WorkspaceLockedError('/ws', {pid: 42, startedAt: '2024-01-01T00:00:00.000Z', version: 1}) instanceof WorkspaceError)
})

test('IncompletePackageError is instanceof PackageError', t => {
  const error = new IncompletePackageError('toolchain', 'clang')
  t.true(error instanceof PackageError)
  t.true(error instanceof KilnError)
})

// -- codes and messages ------------------------------------------------------

test('error codes', t => {
  t.is(new ValidationError('x').code, 'VALIDATION_ERROR')
  t.is(new MissingDependencyError('b', 'a').code, 'MISSING_DEPENDENCY')
  t.is(new CyclicDependencyError(['a', 'b', 'a']).code, 'CYCLIC_DEPENDENCY')
  t.is(new UnresolvedVariableError('x', '%(x)s').code, 'UNRESOLVED_VARIABLE')
  t.is(new CommandFailedError('false', 1).code, 'COMMAND_FAILED')
  t.is(new IOFailureError('x').code, 'IO_FAILURE')
  t.is(new SyncError('u', 'x').code, 'SYNC_FAILED')
  t.is(new DigestMismatchError('f', 'a', 'b').code, 'DIGEST_MISMATCH')
  t.is(new StagingError('x').code, 'STAGING_FAILED')
  t.is(new IncompletePackageError('p', 'r').code, 'INCOMPLETE_PACKAGE')
  t.is(new BuildFailedError([], []).code, 'BUILD_FAILED')
})

test('CyclicDependencyError message shows the cycle path', t => {
  const error = new CyclicDependencyError(['a', 'b', 'a'])
  t.is(error.message, 'Dependency cycle: a -> b -> a')
  t.deepEqual(error.cycle, ['a', 'b', 'a'])
})

test('CommandFailedError carries the command and exit code', t => {
  const error = new CommandFailedError('make install', 2)
  t.is(error.command, 'make install')
  t.is(error.exitCode, 2)
  t.is(error.message, 'Command \'make install\' failed with exit code 2')
})

test('IncompletePackageError names the package and the recipe', t => {
  const error = new IncompletePackageError('toolchain', 'clang')
  t.is(error.packageName, 'toolchain')
  t.is(error.recipeName, 'clang')
  t.is(error.message, 'Package \'toolchain\' is incomplete: recipe \'clang\' did not complete')
})

test('BuildFailedError lists failures and incomplete packages', t => {
  const error = new BuildFailedError(
    [{recipe: 'b', command: 'make', error: new Error('boom')}, {recipe: 'd', error: new Error('no input')}],
    [new IncompletePackageError('toolchain', 'c')]
  )
  t.is(error.message, [
    'Build failed',
    '  recipe b in \'make\': boom',
    '  recipe d: no input',
    '  Package \'toolchain\' is incomplete: recipe \'c\' did not complete'
  ].join('\n'))
})

// -- cause chaining ----------------------------------------------------------

test('errors keep their cause', t => {
  const cause = new Error('EACCES')
  const error = new IOFailureError('Cannot copy', {cause})
  t.is(error.cause, cause)
})

test('error names follow their class', t => {
  t.is(new KilnError('X', 'x').name, 'KilnError')
  t.is(new ConfigurationError('X', 'x').name, 'ConfigurationError')
  t.is(new CommandError('X', 'x').name, 'CommandError')
  t.is(new CacheStoreError('X', 'x').name, 'CacheStoreError')
  t.is(new WorkspaceError('X', 'x').name, 'WorkspaceError')
  t.is(new PackageError('X', 'x').name, 'PackageError')
})
