import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {dirSize, formatDuration, formatSize} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('dirSize sums regular files recursively', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'lib'))
  await writeFile(join(dir, 'README'), '12345')
  await writeFile(join(dir, 'lib', 'libz.a'), 'abc')
  t.is(await dirSize(dir), 8)
})

test('dirSize is 0 for a missing directory', async t => {
  const dir = await createTmpDir()
  t.is(await dirSize(join(dir, 'missing')), 0)
})

test('formatSize picks a unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(2 * 1024 * 1024 * 1024), '2.0 GB')
})

test('formatDuration picks a unit', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})
