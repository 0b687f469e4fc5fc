import {readFile} from 'node:fs/promises'
import {basename, dirname, extname, isAbsolute, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {Command} from '../commands/command.js'
import {
  CopyCommand,
  CopyRecursiveCommand,
  CopyTreeCommand,
  MkdirCommand,
  MoveCommand,
  RemoveCommand,
  RemoveDirectoryCommand,
  WriteDataCommand
} from '../commands/builtin/filesystem.js'
import {RunCommand, type RunOptions} from '../commands/builtin/run.js'
import {SkipForIncrementalCommand} from '../commands/builtin/skip-for-incremental.js'
import {SyncGitCommand} from '../commands/builtin/sync-git.js'
import type {InputBinding, PackageDefinition, Recipe} from '../types.js'
import {validatePackages, validateRecipes} from './dag.js'
import {recipeName} from './naming.js'
import {loadComponentRevisions, revisionConstants} from './revisions.js'

/**
 * A recipe file, resolved against its directory.
 */
export type RecipeFile = {
  /** Workspace ID: `id`, or the slugified `name`, or the file name */
  id: string;
  name?: string;
  /** Directory of the file; relative host paths resolve against it */
  root: string;
  recipes: Recipe[];
  packages: PackageDefinition[];
  /** File constants merged with `revision_<key>` constants */
  constants: Record<string, string>;
}

export type RecipeLoaderOptions = {
  /** Host triples for `perHost` recipes, unless the file lists its own */
  hosts?: string[];
}

const hostSuffix = '@host'

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expectRecord(value: unknown, where: string): Fields {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be a mapping`)
  }

  return value
}

function expectString(value: unknown, where: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${where} must be a string`)
  }

  return value
}

function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : expectString(value, where)
}

function expectStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${where} must be a list of strings`)
  }

  return value.map((item, index) => expectString(item, `${where}[${index}]`))
}

function expectStringRecord(value: unknown, where: string): Record<string, string> {
  const record = expectRecord(value, where)
  const result: Record<string, string> = {}
  for (const [key, item] of Object.entries(record)) {
    // Numbers and booleans are common in YAML constants
    if (typeof item === 'number' || typeof item === 'boolean') {
      result[key] = String(item)
    } else {
      result[key] = expectString(item, `${where}.${key}`)
    }
  }

  return result
}

function onlyKeys(fields: Fields, allowed: string[], where: string): void {
  for (const key of Object.keys(fields)) {
    if (!allowed.includes(key)) {
      throw new ValidationError(`${where}: unknown field '${key}'`)
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parseRecipeFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    try {
      return parseYaml(content)
    } catch (error) {
      throw new ValidationError(`${filePath} is not valid YAML`, {cause: error})
    }
  }

  try {
    return JSON.parse(content)
  } catch (error) {
    throw new ValidationError(`${filePath} is not valid JSON`, {cause: error})
  }
}

function transferPaths(value: unknown, where: string): [string, string] {
  if (Array.isArray(value)) {
    const [src, dst] = expectStringList(value, where)
    if (value.length !== 2) {
      throw new ValidationError(`${where} must be [src, dst]`)
    }

    return [src, dst]
  }

  const fields = expectRecord(value, where)
  onlyKeys(fields, ['src', 'dst'], where)
  return [expectString(fields.src, `${where}.src`), expectString(fields.dst, `${where}.dst`)]
}

/**
 * Turns one command entry (a mapping with a single key naming the
 * command) into a command.
 */
export function parseCommand(entry: unknown, where: string): Command {
  const fields = expectRecord(entry, where)
  const kinds = Object.keys(fields)
  if (kinds.length !== 1) {
    throw new ValidationError(`${where} must have exactly one command key, got ${kinds.length === 0 ? 'none' : kinds.join(', ')}`)
  }

  const [kind] = kinds
  const value = fields[kind]
  const at = `${where}.${kind}`
  switch (kind) {
    case 'run': {
      if (Array.isArray(value)) {
        return new RunCommand(expectStringList(value, at))
      }

      const body = expectRecord(value, at)
      onlyKeys(body, ['argv', 'env', 'stdout', 'stderr', 'cwd', 'timeoutSec'], at)
      const options: RunOptions = {
        env: body.env === undefined ? undefined : expectStringRecord(body.env, `${at}.env`),
        stdout: optionalString(body.stdout, `${at}.stdout`),
        stderr: optionalString(body.stderr, `${at}.stderr`),
        cwd: optionalString(body.cwd, `${at}.cwd`)
      }
      if (body.timeoutSec !== undefined) {
        if (typeof body.timeoutSec !== 'number') {
          throw new ValidationError(`${at}.timeoutSec must be a number`)
        }

        options.timeoutSec = body.timeoutSec
      }

      return new RunCommand(expectStringList(body.argv, `${at}.argv`), options)
    }

    case 'copy': {
      return new CopyCommand(...transferPaths(value, at))
    }

    case 'copyTree': {
      return new CopyTreeCommand(...transferPaths(value, at))
    }

    case 'copyRecursive': {
      return new CopyRecursiveCommand(...transferPaths(value, at))
    }

    case 'move': {
      return new MoveCommand(...transferPaths(value, at))
    }

    case 'mkdir': {
      if (typeof value === 'string') {
        return new MkdirCommand(value)
      }

      const body = expectRecord(value, at)
      onlyKeys(body, ['path', 'parents'], at)
      return new MkdirCommand(expectString(body.path, `${at}.path`), body.parents === true)
    }

    case 'remove': {
      return typeof value === 'string' ? new RemoveCommand(value) : new RemoveCommand(...expectStringList(value, at))
    }

    case 'removeDirectory': {
      return new RemoveDirectoryCommand(expectString(value, at))
    }

    case 'writeData': {
      const body = expectRecord(value, at)
      onlyKeys(body, ['data', 'dst'], at)
      return new WriteDataCommand(expectString(body.data, `${at}.data`), expectString(body.dst, `${at}.dst`))
    }

    case 'syncGit': {
      const body = expectRecord(value, at)
      onlyKeys(body, ['url', 'revision', 'destination', 'clean', 'mirrors'], at)
      return new SyncGitCommand({
        url: expectString(body.url, `${at}.url`),
        revision: expectString(body.revision, `${at}.revision`),
        destination: optionalString(body.destination, `${at}.destination`),
        clean: body.clean === true,
        mirrors: body.mirrors === undefined ? undefined : expectStringList(body.mirrors, `${at}.mirrors`)
      })
    }

    case 'skipForIncremental': {
      if (!Array.isArray(value)) {
        throw new ValidationError(`${at} must be a list of commands`)
      }

      return new SkipForIncrementalCommand(value.map((item, index) => parseCommand(item, `${at}[${index}]`)))
    }

    default: {
      throw new ValidationError(`${where}: unknown command '${kind}'`)
    }
  }
}

/** Expands a `name@host` reference for the given host. */
function qualify(reference: string, host: string | undefined, where: string): string {
  if (!reference.endsWith(hostSuffix)) {
    return reference
  }

  if (host === undefined) {
    throw new ValidationError(`${where}: '${reference}' is only valid in a perHost recipe`)
  }

  return recipeName(reference.slice(0, -hostSuffix.length), host)
}

function parseInputs(value: unknown, root: string, host: string | undefined, where: string): Record<string, InputBinding> {
  const inputs: Record<string, InputBinding> = {}
  for (const [name, binding] of Object.entries(expectRecord(value, where))) {
    const at = `${where}.${name}`
    if (typeof binding === 'string') {
      inputs[name] = isAbsolute(binding) ? binding : resolve(root, binding)
      continue
    }

    const body = expectRecord(binding, at)
    onlyKeys(body, ['recipe', 'path'], at)
    inputs[name] = {
      recipe: qualify(expectString(body.recipe, `${at}.recipe`), host, at),
      path: optionalString(body.path, `${at}.path`)
    }
  }

  return inputs
}

function parseRecipe(key: string, value: unknown, root: string, host: string | undefined): Recipe {
  const where = `recipes.${key}`
  const fields = expectRecord(value, where)
  onlyKeys(fields, ['kind', 'perHost', 'dependencies', 'inputs', 'variables', 'outputDirname', 'outputSubdir', 'commands'], where)

  const name = host === undefined ? key : recipeName(key, host)
  const dependencies = fields.dependencies === undefined
    ? undefined
    : expectStringList(fields.dependencies, `${where}.dependencies`).map(dep => qualify(dep, host, where))
  const inputs = fields.inputs === undefined ? undefined : parseInputs(fields.inputs, root, host, `${where}.inputs`)
  const variables = {
    ...(fields.variables === undefined ? {} : expectStringRecord(fields.variables, `${where}.variables`)),
    ...(host === undefined ? {} : {host})
  }
  if (!Array.isArray(fields.commands)) {
    throw new ValidationError(`${where}.commands must be a list`)
  }

  const commands = fields.commands.map((entry, index) => parseCommand(entry, `${where}.commands[${index}]`))
  const base = {
    name,
    dependencies,
    inputs,
    variables: Object.keys(variables).length > 0 ? variables : undefined,
    commands
  }

  const kind = fields.kind ?? 'build'
  if (kind === 'source') {
    if (fields.outputSubdir !== undefined) {
      throw new ValidationError(`${where}: outputSubdir does not apply to source recipes`)
    }

    return {...base, kind: 'source', outputDirname: optionalString(fields.outputDirname, `${where}.outputDirname`)}
  }

  if (fields.outputDirname !== undefined) {
    throw new ValidationError(`${where}: outputDirname only applies to source recipes`)
  }

  const outputSubdir = optionalString(fields.outputSubdir, `${where}.outputSubdir`)
  switch (kind) {
    case 'build': {
      return {...base, kind: 'build', outputSubdir}
    }

    case 'work': {
      return {...base, kind: 'work', outputSubdir}
    }

    default: {
      throw new ValidationError(`${where}.kind must be one of source, build, work`)
    }
  }
}

/**
 * Packages are either `name: [recipes]` or grouped by target:
 * `target: {name: [recipes]}`.
 */
function parsePackages(value: unknown): PackageDefinition[] {
  const packages: PackageDefinition[] = []
  for (const [key, entry] of Object.entries(expectRecord(value, 'packages'))) {
    if (Array.isArray(entry)) {
      packages.push({name: key, recipes: expectStringList(entry, `packages.${key}`)})
      continue
    }

    for (const [name, recipes] of Object.entries(expectRecord(entry, `packages.${key}`))) {
      packages.push({name, target: key, recipes: expectStringList(recipes, `packages.${key}.${name}`)})
    }
  }

  return packages
}

/**
 * Loads recipe files (YAML or JSON).
 *
 * Recipes marked `perHost: true` are expanded once per host triple, named
 * `<key>_<legalized host>`, with `%(host)s` bound to that triple and
 * `name@host` references resolved to the same host's variant.
 */
export class RecipeLoader {
  constructor(private readonly options: RecipeLoaderOptions = {}) {}

  async load(filePath: string): Promise<RecipeFile> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  async parse(content: string, filePath: string): Promise<RecipeFile> {
    const root = dirname(resolve(filePath))
    const fields = expectRecord(parseRecipeFile(content, filePath), filePath)
    onlyKeys(fields, ['id', 'name', 'revisions', 'constants', 'hosts', 'recipes', 'packages'], filePath)

    const name = optionalString(fields.name, 'name')
    const id = optionalString(fields.id, 'id') ?? slugify(name ?? basename(filePath, extname(filePath)))
    if (id === '') {
      throw new ValidationError(`${filePath}: cannot derive a workspace ID, set "id"`)
    }

    let constants = fields.constants === undefined ? {} : expectStringRecord(fields.constants, 'constants')
    if (fields.revisions !== undefined) {
      const revisionsPath = resolve(root, expectString(fields.revisions, 'revisions'))
      constants = {...revisionConstants(await loadComponentRevisions(revisionsPath)), ...constants}
    }

    const hosts = fields.hosts === undefined ? this.options.hosts : expectStringList(fields.hosts, 'hosts')
    const recipes: Recipe[] = []
    for (const [key, value] of Object.entries(expectRecord(fields.recipes, 'recipes'))) {
      if (isRecord(value) && value.perHost === true) {
        if (!hosts || hosts.length === 0) {
          throw new ValidationError(`recipes.${key} is perHost but no hosts are configured`)
        }

        for (const host of hosts) {
          recipes.push(parseRecipe(key, value, root, host))
        }
      } else {
        recipes.push(parseRecipe(key, value, root, undefined))
      }
    }

    const packages = fields.packages === undefined ? [] : parsePackages(fields.packages)
    const graph = validateRecipes(recipes)
    validatePackages(packages, graph)
    return {id, name, root, recipes, packages, constants}
  }
}
