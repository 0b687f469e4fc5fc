import {relative} from 'node:path'
import type {BuildConfig} from '../types.js'
import {legalizeName} from './naming.js'
import type {VariableScope} from './template.js'

/** A named directory exposed as `%(name)s` and `%(abs_name)s`. */
export type PathBinding = {
  name: string;
  path: string;
}

export type ScopeOptions = {
  config: BuildConfig;
  /** Absolute working directory of the recipe */
  cwd: string;
  /** Absolute directory bound to `%(output)s` */
  outputDir: string;
  dependencies?: PathBinding[];
  inputs?: PathBinding[];
  variables?: Record<string, string>;
}

function relativeTo(cwd: string, path: string): string {
  return relative(cwd, path) || '.'
}

/**
 * Builds the variable scope of one recipe execution.
 *
 * Later bindings win: constants, `host`, recipe variables, `cores`,
 * dependencies, inputs, then `output` and `cwd`. Plain path names are
 * relative to `cwd`, `abs_` names absolute.
 */
export function buildScope(options: ScopeOptions): VariableScope {
  const {config, cwd, outputDir} = options
  const scope: Record<string, string> = {
    ...config.constants,
    host: config.host,
    ...options.variables,
    cores: String(config.cores)
  }

  for (const {name, path} of [...options.dependencies ?? [], ...options.inputs ?? []]) {
    const key = legalizeName(name)
    scope[key] = relativeTo(cwd, path)
    scope[`abs_${key}`] = path
  }

  scope.output = relativeTo(cwd, outputDir)
  scope.abs_output = outputDir
  scope.cwd = cwd
  return Object.freeze(scope)
}
