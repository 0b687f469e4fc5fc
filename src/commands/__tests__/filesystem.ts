import {access, mkdir, readdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {IOFailureError, ValidationError} from '../../errors.js'
import {createCommandContext, createTmpDir} from '../../__tests__/helpers.js'
import {
  CopyCommand,
  CopyRecursiveCommand,
  CopyTreeCommand,
  MkdirCommand,
  MoveCommand,
  RemoveCommand,
  RemoveDirectoryCommand,
  WriteDataCommand
} from '../builtin/filesystem.js'

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

// -- copy --------------------------------------------------------------------

test('copy copies a file, creating the destination directory', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'a.txt'), 'alpha')

  await new CopyCommand('a.txt', '%(output)s/docs/a.txt').apply(createCommandContext(cwd))
  t.is(await readFile(join(cwd, 'out', 'docs', 'a.txt'), 'utf8'), 'alpha')
})

test('copy into an existing directory keeps the file name', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'a.txt'), 'alpha')
  await mkdir(join(cwd, 'dest'))

  await new CopyCommand('a.txt', 'dest').apply(createCommandContext(cwd))
  t.is(await readFile(join(cwd, 'dest', 'a.txt'), 'utf8'), 'alpha')
})

test('copy of a missing source raises IOFailureError', async t => {
  const cwd = await createTmpDir()
  await t.throwsAsync(async () => new CopyCommand('missing', 'dest').apply(createCommandContext(cwd)), {instanceOf: IOFailureError})
})

// -- copyTree / copyRecursive ------------------------------------------------

test('copyTree replaces the destination tree', async t => {
  const cwd = await createTmpDir()
  await mkdir(join(cwd, 'src', 'include'), {recursive: true})
  await writeFile(join(cwd, 'src', 'include', 'z.h'), 'header')
  await mkdir(join(cwd, 'dst'))
  await writeFile(join(cwd, 'dst', 'stale.h'), 'stale')

  await new CopyTreeCommand('src', 'dst').apply(createCommandContext(cwd))
  t.deepEqual(await readdir(join(cwd, 'dst')), ['include'])
  t.is(await readFile(join(cwd, 'dst', 'include', 'z.h'), 'utf8'), 'header')
})

test('copyTree of a file raises IOFailureError', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'file'), 'x')
  await t.throwsAsync(async () => new CopyTreeCommand('file', 'dst').apply(createCommandContext(cwd)), {instanceOf: IOFailureError})
})

test('copyRecursive merges into the destination', async t => {
  const cwd = await createTmpDir()
  await mkdir(join(cwd, 'src'))
  await writeFile(join(cwd, 'src', 'new.h'), 'new')
  await writeFile(join(cwd, 'src', 'shared.h'), 'from src')
  await mkdir(join(cwd, 'dst'))
  await writeFile(join(cwd, 'dst', 'kept.h'), 'kept')
  await writeFile(join(cwd, 'dst', 'shared.h'), 'from dst')

  await new CopyRecursiveCommand('src', 'dst').apply(createCommandContext(cwd))
  t.deepEqual((await readdir(join(cwd, 'dst'))).sort(), ['kept.h', 'new.h', 'shared.h'])
  t.is(await readFile(join(cwd, 'dst', 'shared.h'), 'utf8'), 'from src')
})

// -- move --------------------------------------------------------------------

test('move renames a file', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'a'), 'content')

  await new MoveCommand('a', 'nested/b').apply(createCommandContext(cwd))
  t.false(await exists(join(cwd, 'a')))
  t.is(await readFile(join(cwd, 'nested', 'b'), 'utf8'), 'content')
})

// -- mkdir -------------------------------------------------------------------

test('mkdir accepts an existing directory', async t => {
  const cwd = await createTmpDir()
  const command = new MkdirCommand('build')
  await command.apply(createCommandContext(cwd))
  await t.notThrowsAsync(async () => command.apply(createCommandContext(cwd)))
})

test('mkdir without parents needs the parent directory', async t => {
  const cwd = await createTmpDir()
  await t.throwsAsync(async () => new MkdirCommand('a/b/c').apply(createCommandContext(cwd)), {instanceOf: IOFailureError})
  await new MkdirCommand('a/b/c', true).apply(createCommandContext(cwd))
  t.true(await exists(join(cwd, 'a', 'b', 'c')))
})

test('mkdir over a file raises IOFailureError', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'taken'), 'x')
  await t.throwsAsync(async () => new MkdirCommand('taken').apply(createCommandContext(cwd)), {instanceOf: IOFailureError})
})

// -- remove ------------------------------------------------------------------

test('remove deletes files and ignores missing ones', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, 'a'), 'x')
  await mkdir(join(cwd, 'dir'))
  await writeFile(join(cwd, 'dir', 'b'), 'x')

  await new RemoveCommand('a', 'dir', 'missing').apply(createCommandContext(cwd))
  t.deepEqual(await readdir(cwd), [])
})

test('remove expands glob patterns', async t => {
  const cwd = await createTmpDir()
  await mkdir(join(cwd, 'lib', 'sub'), {recursive: true})
  await writeFile(join(cwd, 'lib', 'libz.la'), 'x')
  await writeFile(join(cwd, 'lib', 'libz.a'), 'x')
  await writeFile(join(cwd, 'lib', 'sub', 'libm.la'), 'x')

  await new RemoveCommand('lib/*.la').apply(createCommandContext(cwd))
  t.deepEqual((await readdir(join(cwd, 'lib'))).sort(), ['libz.a', 'sub'])
  t.deepEqual(await readdir(join(cwd, 'lib', 'sub')), ['libm.la'])

  await new RemoveCommand('lib/**/*.la').apply(createCommandContext(cwd))
  t.deepEqual(await readdir(join(cwd, 'lib', 'sub')), [])
})

test('remove needs at least one path', t => {
  t.throws(() => {
    new RemoveCommand().validate()
  }, {instanceOf: ValidationError})
})

test('removeDirectory deletes a tree and ignores a missing one', async t => {
  const cwd = await createTmpDir()
  await mkdir(join(cwd, 'tree', 'deep'), {recursive: true})
  const command = new RemoveDirectoryCommand('tree')
  await command.apply(createCommandContext(cwd))
  t.false(await exists(join(cwd, 'tree')))
  await t.notThrowsAsync(async () => command.apply(createCommandContext(cwd)))
})

// -- writeData ---------------------------------------------------------------

test('writeData writes the data verbatim', async t => {
  const cwd = await createTmpDir()
  await new WriteDataCommand('prefix=%(output)s\n', '%(output)s/lib/pkgconfig/z.pc').apply(createCommandContext(cwd))
  t.is(await readFile(join(cwd, 'out', 'lib', 'pkgconfig', 'z.pc'), 'utf8'), 'prefix=%(output)s\n')
})

test('describe lists the unresolved fields', t => {
  t.deepEqual(new CopyCommand('%(src)s/a', 'b').describe(), {kind: 'copy', src: '%(src)s/a', dst: 'b'})
  t.deepEqual(new MkdirCommand('x', true).describe(), {kind: 'mkdir', path: 'x', parents: true})
  t.deepEqual(new RemoveCommand('a', 'b').describe(), {kind: 'remove', paths: ['a', 'b']})
  t.is(new CopyCommand('a', 'b').toString(), 'copy a b')
})
