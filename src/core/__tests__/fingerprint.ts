import {chmod, mkdir, symlink, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {run, syncGit} from '../../commands/index.js'
import {IOFailureError} from '../../errors.js'
import type {Recipe} from '../../types.js'
import {createBuildConfig} from '../build-config.js'
import {hashTree, recipeFingerprint, sourceFingerprint} from '../fingerprint.js'
import {createTmpDir} from '../../__tests__/helpers.js'

const config = createBuildConfig({host: 'x86_64-linux', cores: 4, constants: {version: '17', unused: 'x'}})

function zlib(argv: string[] = ['make', 'install'], variables?: Record<string, string>): Recipe {
  return {name: 'zlib', kind: 'build', variables, commands: [run(argv)]}
}

// -- recipeFingerprint -------------------------------------------------------

test('recipeFingerprint is a stable sha256 hex digest', t => {
  const first = recipeFingerprint(zlib(), config, [], [])
  t.regex(first, /^[\da-f]{64}$/)
  t.is(recipeFingerprint(zlib(), config, [], []), first)
})

test('recipeFingerprint changes with the command arguments', t => {
  t.not(
    recipeFingerprint(zlib(['make', 'install']), config, [], []),
    recipeFingerprint(zlib(['make', 'install', '-j4']), config, [], [])
  )
})

test('recipeFingerprint changes with the recipe kind', t => {
  const build = zlib()
  const work: Recipe = {...build, kind: 'work'}
  t.not(recipeFingerprint(build, config, [], []), recipeFingerprint(work, config, [], []))
})

test('recipeFingerprint changes with a dependency fingerprint', t => {
  t.not(
    recipeFingerprint(zlib(), config, [{name: 'src', fingerprint: 'a'}], []),
    recipeFingerprint(zlib(), config, [{name: 'src', fingerprint: 'b'}], [])
  )
})

test('recipeFingerprint changes with an input digest', t => {
  t.not(
    recipeFingerprint(zlib(), config, [], [{name: 'patches', digest: 'a'}]),
    recipeFingerprint(zlib(), config, [], [{name: 'patches', digest: 'b'}])
  )
})

test('recipeFingerprint only covers referenced constants', t => {
  const other = createBuildConfig({host: 'x86_64-linux', cores: 4, constants: {version: '17', unused: 'y'}})
  const templated = zlib(['make', 'VERSION=%(version)s'])
  t.is(recipeFingerprint(templated, config, [], []), recipeFingerprint(templated, other, [], []))

  const bumped = createBuildConfig({host: 'x86_64-linux', cores: 4, constants: {version: '18', unused: 'x'}})
  t.not(recipeFingerprint(templated, config, [], []), recipeFingerprint(templated, bumped, [], []))
})

test('recipeFingerprint ignores the core count and unreferenced host', t => {
  const other = createBuildConfig({host: 'aarch64-linux', cores: 64, constants: {version: '17', unused: 'x'}})
  t.is(recipeFingerprint(zlib(), config, [], []), recipeFingerprint(zlib(), other, [], []))

  const templated = zlib(['./configure', '--host=%(host)s'])
  t.not(recipeFingerprint(templated, config, [], []), recipeFingerprint(templated, other, [], []))
})

test('recipeFingerprint covers recipe variables', t => {
  t.not(
    recipeFingerprint(zlib(['make'], {flavor: 'debug'}), config, [], []),
    recipeFingerprint(zlib(['make'], {flavor: 'release'}), config, [], [])
  )
})

// -- sourceFingerprint -------------------------------------------------------

test('sourceFingerprint follows the synced revisions', t => {
  const source: Recipe = {name: 'llvm_src', kind: 'source', commands: []}
  const a = sourceFingerprint(source, config, [['https://example.com/llvm.git', 'commit-a']])
  t.is(sourceFingerprint(source, config, [['https://example.com/llvm.git', 'commit-a']]), a)
  t.not(sourceFingerprint(source, config, [['https://example.com/llvm.git', 'commit-b']]), a)
  t.not(sourceFingerprint(source, config, [], 'tree'), sourceFingerprint(source, config, []))
})

test('sourceFingerprint covers the commands run after syncing', t => {
  const patched = (patch: string): Recipe => ({
    name: 'llvm_src',
    kind: 'source',
    commands: [syncGit({url: 'https://example.com/llvm.git', revision: 'main'}), run(['patch', '-p1', '-i', patch])]
  })
  const revisions: Array<[string, string]> = [['https://example.com/llvm.git', 'commit-a']]
  t.not(sourceFingerprint(patched('fix-1.diff'), config, revisions), sourceFingerprint(patched('fix-2.diff'), config, revisions))
})

test('sourceFingerprint covers referenced constants', t => {
  const source: Recipe = {name: 'llvm_src', kind: 'source', commands: [run(['write', 'VERSION', '%(version)s'])]}
  const bumped = createBuildConfig({host: 'x86_64-linux', cores: 4, constants: {version: '18', unused: 'x'}})
  t.not(sourceFingerprint(source, config, []), sourceFingerprint(source, bumped, []))
})

// -- hashTree ----------------------------------------------------------------

async function makeTree(): Promise<string> {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'bin'))
  await writeFile(join(dir, 'bin', 'clang'), '#!/bin/sh\n')
  await writeFile(join(dir, 'README'), 'hello')
  return dir
}

test('hashTree is equal for identical trees in different places', async t => {
  t.is(await hashTree(await makeTree()), await hashTree(await makeTree()))
})

test('hashTree changes with file content', async t => {
  const a = await makeTree()
  const b = await makeTree()
  await writeFile(join(b, 'README'), 'hello!')
  t.not(await hashTree(a), await hashTree(b))
})

test('hashTree changes with the executable bit', async t => {
  const a = await makeTree()
  const b = await makeTree()
  await chmod(join(b, 'bin', 'clang'), 0o755)
  t.not(await hashTree(a), await hashTree(b))
})

test('hashTree changes with a symlink target', async t => {
  const a = await makeTree()
  const b = await makeTree()
  await symlink('clang', join(a, 'bin', 'cc'))
  await symlink('README', join(b, 'bin', 'cc'))
  t.not(await hashTree(a), await hashTree(b))
})

test('hashTree hashes a single file', async t => {
  const dir = await makeTree()
  t.regex(await hashTree(join(dir, 'README')), /^[\da-f]{64}$/)
})

test('hashTree throws IOFailureError for a missing path', async t => {
  const dir = await createTmpDir()
  await t.throwsAsync(async () => hashTree(join(dir, 'missing')), {instanceOf: IOFailureError})
})
