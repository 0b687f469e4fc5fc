import {mkdir, readdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {IncompletePackageError} from '../errors.js'
import type {Workspace} from '../engine/workspace.js'
import {packageKey} from './dag.js'
import {isCompleted, type PackageDefinition, type PackageManifest, type RecipeResult} from '../types.js'

export type PackageAssembly = {
  manifests: PackageManifest[];
  incomplete: IncompletePackageError[];
}

/**
 * Builds one manifest per package whose recipes all completed. A package
 * with a missing recipe yields an error keyed `target/name` naming the
 * first one listed, and does not affect the others.
 */
export function assemblePackages(packages: PackageDefinition[], results: Map<string, RecipeResult>): PackageAssembly {
  const manifests: PackageManifest[] = []
  const incomplete: IncompletePackageError[] = []

  for (const definition of packages) {
    const missing = definition.recipes.find(name => !isCompleted(results.get(name)))
    if (missing !== undefined) {
      incomplete.push(new IncompletePackageError(packageKey(definition), missing))
      continue
    }

    const recipes = definition.recipes.flatMap(name => {
      const result = results.get(name)
      return isCompleted(result) ? [{name, outputDir: result.outputDir, fingerprint: result.fingerprint}] : []
    })
    manifests.push({name: definition.name, target: definition.target, recipes})
  }

  return {manifests, incomplete}
}

/** Writes `packages/[target/]name.json` and returns its path. */
export async function writePackageManifest(workspace: Workspace, manifest: PackageManifest): Promise<string> {
  const path = workspace.packageManifestPath(manifest.name, manifest.target)
  await mkdir(dirname(path), {recursive: true})
  await writeFile(path, JSON.stringify(manifest, null, 2) + '\n', 'utf8')
  return path
}

function isManifest(value: unknown): value is PackageManifest {
  return typeof value === 'object' && value !== null
    && 'name' in value && typeof value.name === 'string'
    && 'recipes' in value && Array.isArray(value.recipes)
}

async function readManifest(path: string): Promise<PackageManifest | undefined> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'))
  return isManifest(parsed) ? parsed : undefined
}

/** Manifests written by previous builds, sorted by target then name. */
export async function readPackageManifests(workspace: Workspace): Promise<PackageManifest[]> {
  const root = join(workspace.root, 'packages')
  const paths: string[] = []
  for (const entry of await readdir(root, {withFileTypes: true})) {
    if (entry.isFile() && entry.name.endsWith('.json')) {
      paths.push(join(root, entry.name))
    } else if (entry.isDirectory()) {
      const names = await readdir(join(root, entry.name))
      paths.push(...names.filter(name => name.endsWith('.json')).map(name => join(root, entry.name, name)))
    }
  }

  const manifests: PackageManifest[] = []
  for (const path of paths) {
    const manifest = await readManifest(path)
    if (manifest) {
      manifests.push(manifest)
    }
  }

  return manifests.sort((a, b) => `${a.target ?? ''}/${a.name}`.localeCompare(`${b.target ?? ''}/${b.name}`))
}
