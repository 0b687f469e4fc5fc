import {readFile} from 'node:fs/promises'
import test from 'ava'
import {IncompletePackageError} from '../../errors.js'
import {Workspace} from '../../engine/workspace.js'
import type {RecipeResult} from '../../types.js'
import {assemblePackages, readPackageManifests, writePackageManifest} from '../package-aggregator.js'
import {createTmpDir} from '../../__tests__/helpers.js'

function built(name: string): RecipeResult {
  return {name, kind: 'build', outcome: 'built', outputDir: `/ws/output/${name}`, fingerprint: `fp-${name}`, durationMs: 1}
}

test('assemblePackages lists completed recipes in package order', t => {
  const results = new Map<string, RecipeResult>([
    ['a', built('a')],
    ['b', {...built('b'), outcome: 'cache-hit' as const}]
  ])
  const {manifests, incomplete} = assemblePackages([{name: 'sdk', target: 'linux_x86', recipes: ['b', 'a']}], results)
  t.deepEqual(incomplete, [])
  t.deepEqual(manifests, [{
    name: 'sdk',
    target: 'linux_x86',
    recipes: [
      {name: 'b', outputDir: '/ws/output/b', fingerprint: 'fp-b'},
      {name: 'a', outputDir: '/ws/output/a', fingerprint: 'fp-a'}
    ]
  }])
})

test('assemblePackages names the first missing recipe and keeps the others', t => {
  const results = new Map<string, RecipeResult>([
    ['a', built('a')],
    ['b', {name: 'b', kind: 'build', outcome: 'failed', durationMs: 1}],
    ['c', {name: 'c', kind: 'build', outcome: 'skipped', skipReason: 'dependency', durationMs: 0}]
  ])
  const {manifests, incomplete} = assemblePackages([
    {name: 'full', recipes: ['a', 'c', 'b']},
    {name: 'base', recipes: ['a']}
  ], results)

  t.deepEqual(manifests.map(manifest => manifest.name), ['base'])
  t.is(incomplete.length, 1)
  t.true(incomplete[0] instanceof IncompletePackageError)
  t.is(incomplete[0].packageName, 'full')
  t.is(incomplete[0].recipeName, 'c')
})

test('assemblePackages keys incomplete packages by target', t => {
  const results = new Map<string, RecipeResult>([['a', {name: 'a', kind: 'build', outcome: 'failed', durationMs: 1}]])
  const {incomplete} = assemblePackages([
    {name: 'sdk', target: 'linux_x86', recipes: ['a']},
    {name: 'sdk', target: 'mac_x86', recipes: ['a']}
  ], results)
  t.deepEqual(incomplete.map(error => error.message), [
    'Package \'linux_x86/sdk\' is incomplete: recipe \'a\' did not complete',
    'Package \'mac_x86/sdk\' is incomplete: recipe \'a\' did not complete'
  ])
})

test('manifests are written under packages/ and read back sorted', async t => {
  const root = await createTmpDir()
  const workspace = await Workspace.create(root, 'ws')
  const linux = {name: 'sdk', target: 'linux_x86', recipes: [{name: 'a', outputDir: '/ws/output/a'}]}
  const plain = {name: 'docs', recipes: []}

  const path = await writePackageManifest(workspace, linux)
  t.is(path, workspace.packageManifestPath('sdk', 'linux_x86'))
  const written: unknown = JSON.parse(await readFile(path, 'utf8'))
  t.deepEqual(written, linux)

  await writePackageManifest(workspace, plain)
  t.deepEqual(await readPackageManifests(workspace), [plain, linux])
})
