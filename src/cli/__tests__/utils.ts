import {mkdir, writeFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {ValidationError} from '../../errors.js'
import {parsePositiveInteger, resolveRecipeFile, resolveWorkdir, splitList} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('splitList trims and drops empty items', t => {
  t.deepEqual(splitList('sdk, linux_x86/tools,,'), ['sdk', 'linux_x86/tools'])
  t.deepEqual(splitList(''), [])
})

test('parsePositiveInteger accepts counts and rejects anything else', t => {
  t.is(parsePositiveInteger('4'), 4)
  for (const value of ['abc', '0', '-2', '1.5', '']) {
    t.throws(() => parsePositiveInteger(value), {instanceOf: InvalidArgumentError}, value)
  }
})

test('resolveWorkdir prefers the option, then the config, then ./workdir', t => {
  t.is(resolveWorkdir({workdir: '/a'}, {workdir: '/b'}), '/a')
  t.is(resolveWorkdir({}, {workdir: '/b'}), '/b')
  t.is(resolveWorkdir({}, {}), resolve('workdir'))
})

test('resolveRecipeFile returns a file as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'nightly.yml')
  await writeFile(file, 'recipes: {}')
  t.is(await resolveRecipeFile(file), file)
})

test('resolveRecipeFile searches a directory in order', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'kiln.json'), '{}')
  t.is(await resolveRecipeFile(dir), join(dir, 'kiln.json'))

  await writeFile(join(dir, 'kiln.yaml'), '')
  t.is(await resolveRecipeFile(dir), join(dir, 'kiln.yaml'))
})

test('resolveRecipeFile ignores a directory named like a recipe file', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'kiln.yml'))
  await writeFile(join(dir, 'kiln.json'), '{}')
  t.is(await resolveRecipeFile(dir), join(dir, 'kiln.json'))
})

test('resolveRecipeFile fails on a missing path or an empty directory', async t => {
  const dir = await createTmpDir()
  const missing = await t.throwsAsync(async () => resolveRecipeFile(join(dir, 'nope')), {instanceOf: ValidationError})
  t.is(missing?.message, `Path does not exist: ${join(dir, 'nope')}`)

  const empty = await t.throwsAsync(async () => resolveRecipeFile(dir), {instanceOf: ValidationError})
  t.is(empty?.message, `No recipe file found in ${dir}. Expected one of: kiln.yml, kiln.yaml, kiln.json`)
})
