import type {Dirent} from 'node:fs'
import {copyFile, cp, mkdir, readdir, rename, rm, stat, writeFile} from 'node:fs/promises'
import {basename, dirname, join, resolve, sep} from 'node:path'
import ignore from 'ignore'
import {IOFailureError, ValidationError} from '../../errors.js'
import {substitute} from '../../core/template.js'
import {Command, type CommandContext, type CommandDescription} from '../command.js'

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined
}

async function statOrUndefined(path: string) {
  try {
    return await stat(path)
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined
    }

    throw new IOFailureError(`Cannot access ${path}`, {cause: error})
  }
}

function resolvePath(context: CommandContext, template: string): string {
  return resolve(context.cwd, substitute(template, context.scope))
}

function requirePath(kind: string, value: string, field: string): void {
  if (value.trim() === '') {
    throw new ValidationError(`${kind} command has an empty ${field}`)
  }
}

/** Base class of commands taking a source and a destination. */
abstract class TransferCommand extends Command {
  constructor(
    readonly src: string,
    readonly dst: string
  ) {
    super()
  }

  validate(): void {
    requirePath(this.kind, this.src, 'source')
    requirePath(this.kind, this.dst, 'destination')
  }

  describe(): CommandDescription {
    return {kind: this.kind, src: this.src, dst: this.dst}
  }

  protected async requireSource(path: string) {
    const stats = await statOrUndefined(path)
    if (!stats) {
      throw new IOFailureError(`${this.kind}: source ${path} does not exist`)
    }

    return stats
  }
}

/**
 * Copies a single file. A destination that is an existing directory
 * receives the file under its own name.
 */
export class CopyCommand extends TransferCommand {
  readonly kind = 'copy'

  async apply(context: CommandContext): Promise<void> {
    const src = resolvePath(context, this.src)
    let dst = resolvePath(context, this.dst)
    const stats = await this.requireSource(src)
    if (stats.isDirectory()) {
      throw new IOFailureError(`copy: source ${src} is a directory`)
    }

    if ((await statOrUndefined(dst))?.isDirectory()) {
      dst = join(dst, basename(src))
    }

    try {
      await mkdir(dirname(dst), {recursive: true})
      await copyFile(src, dst)
    } catch (error) {
      throw new IOFailureError(`copy: cannot copy ${src} to ${dst}`, {cause: error})
    }
  }
}

/** Replaces `dst` with a copy of the `src` directory tree. */
export class CopyTreeCommand extends TransferCommand {
  readonly kind = 'copyTree'

  async apply(context: CommandContext): Promise<void> {
    const src = resolvePath(context, this.src)
    const dst = resolvePath(context, this.dst)
    const stats = await this.requireSource(src)
    if (!stats.isDirectory()) {
      throw new IOFailureError(`copyTree: source ${src} is not a directory`)
    }

    try {
      await rm(dst, {recursive: true, force: true})
      await mkdir(dirname(dst), {recursive: true})
      await cp(src, dst, {recursive: true, verbatimSymlinks: true})
    } catch (error) {
      throw new IOFailureError(`copyTree: cannot copy ${src} to ${dst}`, {cause: error})
    }
  }
}

/** Merges the contents of `src` into `dst`, overwriting existing files. */
export class CopyRecursiveCommand extends TransferCommand {
  readonly kind = 'copyRecursive'

  async apply(context: CommandContext): Promise<void> {
    const src = resolvePath(context, this.src)
    const dst = resolvePath(context, this.dst)
    await this.requireSource(src)

    try {
      await mkdir(dirname(dst), {recursive: true})
      await cp(src, dst, {recursive: true, force: true, verbatimSymlinks: true})
    } catch (error) {
      throw new IOFailureError(`copyRecursive: cannot copy ${src} to ${dst}`, {cause: error})
    }
  }
}

export class MoveCommand extends TransferCommand {
  readonly kind = 'move'

  async apply(context: CommandContext): Promise<void> {
    const src = resolvePath(context, this.src)
    const dst = resolvePath(context, this.dst)
    await this.requireSource(src)

    try {
      await mkdir(dirname(dst), {recursive: true})
      await rename(src, dst)
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw new IOFailureError(`move: cannot move ${src} to ${dst}`, {cause: error})
      }

      // Across filesystems
      await cp(src, dst, {recursive: true, verbatimSymlinks: true})
      await rm(src, {recursive: true, force: true})
    }
  }
}

/**
 * Creates a directory. Without `parents` the parent must already exist;
 * an existing directory is accepted either way.
 */
export class MkdirCommand extends Command {
  readonly kind = 'mkdir'

  constructor(
    readonly path: string,
    readonly parents = false
  ) {
    super()
  }

  validate(): void {
    requirePath(this.kind, this.path, 'path')
  }

  async apply(context: CommandContext): Promise<void> {
    const path = resolvePath(context, this.path)
    try {
      await mkdir(path, {recursive: this.parents})
    } catch (error) {
      if (errorCode(error) === 'EEXIST' && (await statOrUndefined(path))?.isDirectory()) {
        return
      }

      throw new IOFailureError(`mkdir: cannot create ${path}`, {cause: error})
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, path: this.path, parents: this.parents}
  }
}

const globCharacters = /[*?[]/

/**
 * Splits an absolute pattern into the directory holding no glob character
 * and the remaining pattern, relative to it.
 */
function splitGlob(pattern: string): {base: string; rest: string} | undefined {
  const segments = pattern.split(sep)
  const index = segments.findIndex(segment => globCharacters.test(segment))
  if (index === -1) {
    return undefined
  }

  return {
    base: segments.slice(0, index).join(sep) || sep,
    rest: segments.slice(index).join('/')
  }
}

async function removeMatching(base: string, matches: (relative: string, isDirectory: boolean) => boolean, prefix = ''): Promise<void> {
  let entries: Dirent[]
  try {
    entries = await readdir(join(base, prefix), {withFileTypes: true})
  } catch (error) {
    if (errorCode(error) === 'ENOENT' || errorCode(error) === 'ENOTDIR') {
      return
    }

    throw new IOFailureError(`remove: cannot list ${join(base, prefix)}`, {cause: error})
  }

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name
    if (matches(relative, entry.isDirectory())) {
      await rm(join(base, relative), {recursive: true, force: true})
    } else if (entry.isDirectory()) {
      await removeMatching(base, matches, relative)
    }
  }
}

/**
 * Removes files and directories. Paths may hold glob patterns
 * (`*`, `?`, `[...]`, `**`); missing targets are ignored.
 */
export class RemoveCommand extends Command {
  readonly kind = 'remove'
  readonly paths: string[]

  constructor(...paths: string[]) {
    super()
    this.paths = paths
  }

  validate(): void {
    if (this.paths.length === 0) {
      throw new ValidationError('remove command needs at least one path')
    }

    for (const path of this.paths) {
      requirePath(this.kind, path, 'path')
    }
  }

  async apply(context: CommandContext): Promise<void> {
    for (const template of this.paths) {
      const path = resolvePath(context, template)
      const glob = splitGlob(path)
      try {
        if (glob) {
          const matcher = ignore().add(`/${glob.rest}`)
          await removeMatching(glob.base, (relative, isDirectory) =>
            matcher.ignores(relative) || (isDirectory && matcher.ignores(`${relative}/`)))
        } else {
          await rm(path, {recursive: true, force: true})
        }
      } catch (error) {
        if (error instanceof IOFailureError) {
          throw error
        }

        throw new IOFailureError(`remove: cannot remove ${path}`, {cause: error})
      }
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, paths: this.paths}
  }
}

/** Removes a directory tree; a missing directory is ignored. */
export class RemoveDirectoryCommand extends Command {
  readonly kind = 'removeDirectory'

  constructor(readonly path: string) {
    super()
  }

  validate(): void {
    requirePath(this.kind, this.path, 'path')
  }

  async apply(context: CommandContext): Promise<void> {
    const path = resolvePath(context, this.path)
    try {
      await rm(path, {recursive: true, force: true})
    } catch (error) {
      throw new IOFailureError(`removeDirectory: cannot remove ${path}`, {cause: error})
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, path: this.path}
  }
}

/** Writes a literal string to a file. The data is not templated. */
export class WriteDataCommand extends Command {
  readonly kind = 'writeData'

  constructor(
    readonly data: string,
    readonly dst: string
  ) {
    super()
  }

  validate(): void {
    requirePath(this.kind, this.dst, 'destination')
  }

  async apply(context: CommandContext): Promise<void> {
    const dst = resolvePath(context, this.dst)
    try {
      await mkdir(dirname(dst), {recursive: true})
      await writeFile(dst, this.data, 'utf8')
    } catch (error) {
      throw new IOFailureError(`writeData: cannot write ${dst}`, {cause: error})
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, data: this.data, dst: this.dst}
  }
}
