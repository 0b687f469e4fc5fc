import {cpus} from 'node:os'
import {ValidationError} from '../errors.js'
import type {BuildConfig, MirrorRewrite} from '../types.js'
import {currentPlatformTriple} from './naming.js'

export type BuildConfigInput = {
  host?: string;
  cores?: number;
  constants?: Record<string, string>;
  env?: Record<string, string>;
  knownMirrors?: MirrorRewrite[];
}

/**
 * Freezes a build configuration, filling in the host triple and the core
 * count of the running machine.
 */
export function createBuildConfig(input: BuildConfigInput = {}): BuildConfig {
  const cores = input.cores ?? cpus().length
  if (!Number.isInteger(cores) || cores < 1) {
    throw new ValidationError(`Invalid core count: ${cores}`)
  }

  for (const name of Object.keys(input.constants ?? {})) {
    if (!/^\w+$/.test(name)) {
      throw new ValidationError(`Invalid constant name '${name}': use letters, digits and '_'`)
    }
  }

  return Object.freeze({
    host: input.host ?? currentPlatformTriple(),
    cores,
    constants: Object.freeze({...input.constants}),
    env: Object.freeze({...input.env}),
    knownMirrors: Object.freeze((input.knownMirrors ?? []).map(rewrite => Object.freeze({...rewrite})))
  })
}
