/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {Kiln, createBuildConfig, run, syncGit} from 'kiln'
 *
 * const recipes = [
 *   {name: 'zlib_src', kind: 'source', commands: [syncGit({url: 'https://example.com/zlib.git', revision: 'v1.3'})]},
 *   {name: 'zlib', kind: 'build', dependencies: ['zlib_src'], commands: [
 *     run(['%(abs_zlib_src)s/configure', '--prefix=%(abs_output)s']),
 *     run(['make', '-j%(cores)s', 'install'])
 *   ]}
 * ]
 *
 * const kiln = new Kiln({workdir: './workdir'})
 * await kiln.build(recipes, [{name: 'libs', recipes: ['zlib']}], {workspace: 'toolchain', config: createBuildConfig()})
 * ```
 */

export * from './core/index.js'
export * from './engine/index.js'
export * from './commands/index.js'
export * from './errors.js'
export type {
  Recipe,
  RecipeKind,
  SourceRecipe,
  BuildRecipe,
  WorkRecipe,
  InputBinding,
  RecipeOutputRef,
  PackageDefinition,
  PackageManifest,
  PackageManifestEntry,
  RecipeOutcome,
  SkipReason,
  RecipeResult,
  MirrorRewrite,
  BuildConfig,
  KilnConfig
} from './types.js'
export {isSourceRecipe, isCompleted, recipeDependencies} from './types.js'
