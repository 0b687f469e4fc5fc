import {createHash} from 'node:crypto'
import {lstat, readdir, readFile, readlink} from 'node:fs/promises'
import {join} from 'node:path'
import {IOFailureError} from '../errors.js'
import type {BuildConfig, Recipe} from '../types.js'
import {referencedVariables} from './template.js'

const fingerprintVersion = 2

export type DependencyFingerprint = {
  name: string;
  fingerprint: string;
}

/** Digest of one input binding: tree digest of a host path, or the reference itself. */
export type InputDigest = {
  name: string;
  digest: string;
}

function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex')
}

function sortedEntries(record: Readonly<Record<string, string>>): Array<[string, string]> {
  return Object.entries(record).sort(([a], [b]) => a.localeCompare(b))
}

/**
 * Identity of a build or work recipe.
 *
 * ```
 * SHA256(JSON{name, kind, outputSubdir, commands, variables,
 *   referenced constants, dependency fingerprints, input digests})
 * ```
 *
 * Only constants (and `host`) that the commands reference are included.
 * Path variables are left out: they are covered by the dependency
 * fingerprints and input digests.
 */
export function recipeFingerprint(
  recipe: Recipe,
  config: BuildConfig,
  dependencies: DependencyFingerprint[],
  inputs: InputDigest[]
): string {
  const commands = recipe.commands.map(command => command.describe())
  return sha256(JSON.stringify({
    version: fingerprintVersion,
    name: recipe.name,
    kind: recipe.kind,
    outputSubdir: recipe.kind === 'source' ? null : recipe.outputSubdir ?? null,
    commands,
    variables: sortedEntries(recipe.variables ?? {}),
    constants: referencedConstants(recipe, config),
    dependencies: dependencies.map(({name, fingerprint}) => [name, fingerprint]),
    inputs: inputs.map(({name, digest}) => [name, digest])
  }))
}

/**
 * Identity of a synced source: its commands and the constants they
 * reference, plus the revisions its sync commands converged to, or the
 * digest of its tree when it has none.
 */
export function sourceFingerprint(
  recipe: Recipe,
  config: BuildConfig,
  revisions: Array<[url: string, revision: string]>,
  treeDigest?: string
): string {
  return sha256(JSON.stringify({
    version: fingerprintVersion,
    name: recipe.name,
    kind: recipe.kind,
    commands: recipe.commands.map(command => command.describe()),
    variables: sortedEntries(recipe.variables ?? {}),
    constants: referencedConstants(recipe, config),
    revisions,
    tree: treeDigest ?? null
  }))
}

/** Constants (and `host`) the commands reference and recipe variables do not shadow, sorted by name. */
function referencedConstants(recipe: Recipe, config: BuildConfig): Array<[string, string]> {
  const variables = recipe.variables ?? {}
  const globals: Record<string, string> = {...config.constants, host: config.host}
  return referencedVariables(JSON.stringify(recipe.commands.map(command => command.describe())))
    .filter(name => Object.hasOwn(globals, name) && !Object.hasOwn(variables, name))
    .sort((a, b) => a.localeCompare(b))
    .map((name): [string, string] => [name, globals[name]])
}

/**
 * Content digest of a file or directory tree: sorted relative paths,
 * entry types, executable bits, file contents and symlink targets.
 * @throws IOFailureError when the path does not exist
 */
export async function hashTree(path: string): Promise<string> {
  const hash = createHash('sha256')

  const visit = async (absolute: string, relativePath: string): Promise<void> => {
    const stats = await lstat(absolute)
    if (stats.isSymbolicLink()) {
      hash.update(`L\0${relativePath}\0${await readlink(absolute)}\0`)
    } else if (stats.isDirectory()) {
      hash.update(`D\0${relativePath}\0`)
      const names = (await readdir(absolute)).sort()
      for (const name of names) {
        await visit(join(absolute, name), relativePath ? `${relativePath}/${name}` : name)
      }
    } else {
      const executable = (stats.mode & 0o111) === 0 ? '-' : 'x'
      const content = await readFile(absolute)
      hash.update(`F\0${relativePath}\0${executable}\0${content.length}\0`)
      hash.update(content)
    }
  }

  try {
    await visit(path, '')
  } catch (error) {
    throw new IOFailureError(`Cannot hash ${path}`, {cause: error})
  }

  return hash.digest('hex')
}
