import process from 'node:process'
import {resolve} from 'node:path'
import {createBuildConfig} from '../core/build-config.js'
import {loadEnvFile} from '../core/env-file.js'
import {RecipeLoader, type RecipeFile} from '../core/recipe-loader.js'
import type {BuildConfig, KilnConfig} from '../types.js'
import {loadConfig} from './config.js'
import {resolveRecipeFile, resolveWorkdir, type GlobalOptions} from './utils.js'

export type ProjectOptions = {
  host?: string;
  envFile?: string;
}

export type Project = {
  config: KilnConfig;
  file: RecipeFile;
  buildConfig: BuildConfig;
  workdir: string;
}

/**
 * Loads `.kiln.yml` from the current directory, then the recipe file, and
 * freezes the build configuration. Project constants override the file's.
 */
export async function loadProject(recipeArg: string | undefined, global: GlobalOptions, options: ProjectOptions = {}): Promise<Project> {
  const cwd = process.cwd()
  const config = await loadConfig(cwd)
  const recipeFile = await resolveRecipeFile(recipeArg)
  const file = await new RecipeLoader({hosts: config.hosts}).load(recipeFile)

  const envFile = options.envFile ?? config.envFile
  const env = envFile ? await loadEnvFile(resolve(cwd, envFile)) : {}

  const buildConfig = createBuildConfig({
    host: options.host ?? config.host,
    constants: {...file.constants, ...config.constants},
    env,
    knownMirrors: config.knownMirrors
  })

  return {config, file, buildConfig, workdir: resolveWorkdir(global, config)}
}
