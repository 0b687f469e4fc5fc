import {readFile} from 'node:fs/promises'
import {ValidationError} from '../errors.js'

/**
 * Parses a component revisions file: one `key=value` per line, `#`
 * comments and blank lines ignored. Underscores in keys become dashes.
 * @throws ValidationError on a malformed line or a duplicate key
 */
export function parseComponentRevisions(content: string, source = 'revisions file'): Map<string, string> {
  const revisions = new Map<string, string>()
  const lines = content.split(/\r?\n/)
  for (const [index, raw] of lines.entries()) {
    const line = raw.trim()
    if (line === '' || line.startsWith('#')) {
      continue
    }

    const separator = line.indexOf('=')
    const key = separator === -1 ? '' : line.slice(0, separator).trim()
    const value = separator === -1 ? '' : line.slice(separator + 1).trim()
    if (key === '' || value === '') {
      throw new ValidationError(`${source}:${index + 1}: expected key=value, got '${line}'`)
    }

    const normalized = key.replaceAll('_', '-')
    if (revisions.has(normalized)) {
      throw new ValidationError(`${source}:${index + 1}: duplicate revision for '${normalized}'`)
    }

    revisions.set(normalized, value)
  }

  return revisions
}

export async function loadComponentRevisions(filePath: string): Promise<Map<string, string>> {
  const content = await readFile(filePath, 'utf8')
  return parseComponentRevisions(content, filePath)
}

/**
 * Constants exposing revisions to templates: `llvm-libcxx` becomes
 * `revision_llvm_libcxx`.
 */
export function revisionConstants(revisions: Map<string, string>): Record<string, string> {
  const constants: Record<string, string> = {}
  for (const [key, value] of revisions) {
    constants[`revision_${key.replaceAll(/\W/g, '_')}`] = value
  }

  return constants
}
