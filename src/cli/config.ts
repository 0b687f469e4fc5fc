import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {KilnConfig, MirrorRewrite} from '../types.js'

export const configFilename = '.kiln.yml'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`${configFilename}: ${key} must be a string`)
  }

  return value
}

function parseStringList(value: unknown, key: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ValidationError(`${configFilename}: ${key} must be a list of strings`)
  }

  return value
}

function parseConstants(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    throw new ValidationError(`${configFilename}: constants must be a mapping`)
  }

  const constants: Record<string, string> = {}
  for (const [name, raw] of Object.entries(value)) {
    if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
      throw new ValidationError(`${configFilename}: constants.${name} must be a scalar`)
    }

    constants[name] = String(raw)
  }

  return constants
}

function parseMirrors(value: unknown): MirrorRewrite[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${configFilename}: knownMirrors must be a list`)
  }

  return value.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.mirror !== 'string' || typeof entry.canonical !== 'string') {
      throw new ValidationError(`${configFilename}: knownMirrors[${index}] needs "mirror" and "canonical" strings`)
    }

    return {mirror: entry.mirror, canonical: entry.canonical}
  })
}

/**
 * Validates the parsed content of a `.kiln.yml` file.
 */
export function parseConfig(parsed: unknown): KilnConfig {
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`${configFilename} must be a mapping`)
  }

  const config: KilnConfig = {}
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'workdir':
      case 'store':
      case 'host':
      case 'envFile': {
        config[key] = optionalString(value, key)
        break
      }

      case 'concurrency': {
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
          throw new ValidationError(`${configFilename}: concurrency must be a positive integer`)
        }

        config.concurrency = value
        break
      }

      case 'hosts': {
        config.hosts = parseStringList(value, key)
        break
      }

      case 'constants': {
        config.constants = parseConstants(value)
        break
      }

      case 'knownMirrors': {
        config.knownMirrors = parseMirrors(value)
        break
      }

      default: {
        throw new ValidationError(`${configFilename}: unknown key "${key}"`)
      }
    }
  }

  return config
}

/**
 * Loads the project-level `.kiln.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<KilnConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ValidationError(`${configFilename} is not valid YAML`, {cause: error})
  }

  return parseConfig(parsed)
}
