import process from 'node:process'
import {stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import {InvalidArgumentError, type Command} from 'commander'
import {ValidationError} from '../errors.js'
import type {KilnConfig} from '../types.js'

export type GlobalOptions = {
  workdir?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** `--workdir` (or `KILN_WORKDIR`), then `.kiln.yml`, then `./workdir`. */
export function resolveWorkdir(options: GlobalOptions, config: KilnConfig): string {
  return resolve(options.workdir ?? config.workdir ?? './workdir')
}

/** Option parser for counts such as `--concurrency`. */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }

  return parsed
}

/** Splits a comma-separated option value, dropping empty items. */
export function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0)
}

const recipeFilenames = ['kiln.yml', 'kiln.yaml', 'kiln.json']

async function statOrUndefined(path: string) {
  try {
    return await stat(path)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

/**
 * Resolves a recipe file argument: a file is used as is, a directory is
 * searched for kiln.yml, kiln.yaml, then kiln.json.
 */
export async function resolveRecipeFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())
  const stats = await statOrUndefined(target)
  if (!stats) {
    throw new ValidationError(`Path does not exist: ${target}`)
  }

  if (stats.isFile()) {
    return target
  }

  for (const filename of recipeFilenames) {
    const candidate = join(target, filename)
    if ((await statOrUndefined(candidate))?.isFile()) {
      return candidate
    }
  }

  throw new ValidationError(`No recipe file found in ${target}. Expected one of: ${recipeFilenames.join(', ')}`)
}
