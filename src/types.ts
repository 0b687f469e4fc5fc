// ---------------------------------------------------------------------------
// Recipe and package domain types.
//
// A recipe table is an ordered list of recipes; declaration order is the
// tie-breaker for every scheduling decision.
// ---------------------------------------------------------------------------

import type {Command} from './commands/command.js'

// -- Building blocks --------------------------------------------------------

/** Reference to another recipe's output, optionally narrowed to a sub-path. */
export type RecipeOutputRef = {
  recipe: string;
  /** Path relative to the referenced recipe's output directory. */
  path?: string;
}

/**
 * Named input exposed to templating as `%(name)s` / `%(abs_name)s`.
 * A string is a host path (relative paths resolve against the recipe file
 * directory); a recipe reference implies a dependency on that recipe.
 */
export type InputBinding = string | RecipeOutputRef

type RecipeBase = {
  /** Unique, stable key. Cache identity depends on it. */
  name: string;
  dependencies?: string[];
  inputs?: Record<string, InputBinding>;
  /** Recipe-level scope bindings, overriding constants and `host`. Always fingerprinted. */
  variables?: Record<string, string>;
  commands: Command[];
}

// -- Recipe variants ---------------------------------------------------------

/** Fetches external content. Always synced, never skipped from cache. */
export type SourceRecipe = RecipeBase & {
  kind: 'source';
  /** Directory name (or absolute path) of the synced tree, defaults to the recipe name. */
  outputDirname?: string;
}

/** Deterministic output from its inputs; eligible for cache-skip. */
export type BuildRecipe = RecipeBase & {
  kind: 'build';
  /** Nested path under the output directory that `%(output)s` points to. */
  outputSubdir?: string;
}

/** Produces output but is never memoized (non-canonical or per-host variants). */
export type WorkRecipe = RecipeBase & {
  kind: 'work';
  outputSubdir?: string;
}

export type Recipe = SourceRecipe | BuildRecipe | WorkRecipe

export type RecipeKind = Recipe['kind']

export function isSourceRecipe(recipe: Recipe): recipe is SourceRecipe {
  return recipe.kind === 'source'
}

/**
 * All recipes a recipe depends on, in declared order: explicit
 * dependencies first, then recipes referenced by inputs.
 */
export function recipeDependencies(recipe: Recipe): string[] {
  const deps: string[] = [...(recipe.dependencies ?? [])]
  for (const binding of Object.values(recipe.inputs ?? {})) {
    if (typeof binding !== 'string' && !deps.includes(binding.recipe)) {
      deps.push(binding.recipe)
    }
  }

  return deps
}

// -- Packages ---------------------------------------------------------------

/** A named bundle of recipe outputs for one target (host OS / architecture). */
export type PackageDefinition = {
  name: string;
  /** Package target, e.g. "linux_x86". */
  target?: string;
  recipes: string[];
}

export type PackageManifestEntry = {
  name: string;
  outputDir: string;
  fingerprint?: string;
}

export type PackageManifest = {
  name: string;
  target?: string;
  recipes: PackageManifestEntry[];
}

// -- Outcomes ----------------------------------------------------------------

export type RecipeOutcome = 'cache-hit' | 'built' | 'synced' | 'failed' | 'skipped'

export type SkipReason = 'dependency' | 'stopped' | 'cancelled'

export type RecipeResult = {
  name: string;
  kind: RecipeKind;
  outcome: RecipeOutcome;
  /** Committed output directory (absent when the recipe did not complete). */
  outputDir?: string;
  /** Fingerprint fed to dependents. */
  fingerprint?: string;
  durationMs: number;
  skipReason?: SkipReason;
  /** Description of the failing command, when one failed. */
  failedCommand?: string;
  error?: Error;
}

/** True when the recipe reached a terminal success state. */
export function isCompleted(result: RecipeResult | undefined): result is RecipeResult & {outputDir: string} {
  return result !== undefined
    && (result.outcome === 'built' || result.outcome === 'cache-hit' || result.outcome === 'synced')
    && result.outputDir !== undefined
}

// -- Configuration ------------------------------------------------------------

/** URL prefix rewrite: a mirror prefix mapped to its canonical prefix. */
export type MirrorRewrite = {
  mirror: string;
  canonical: string;
}

/**
 * Immutable build configuration threaded through recipe construction and
 * variable scopes.
 */
export type BuildConfig = Readonly<{
  /** Host triple of the machine running the build tools. */
  host: string;
  /** Parallelism hint exposed as `%(cores)s`. */
  cores: number;
  /** Global constants exposed to templating. Part of build fingerprints when referenced. */
  constants: Readonly<Record<string, string>>;
  /** Extra environment for run commands. */
  env: Readonly<Record<string, string>>;
  /** Known mirror prefixes rewritten to canonical URLs before syncing. */
  knownMirrors: readonly MirrorRewrite[];
}>

/** Project-level `.kiln.yml` configuration. */
export type KilnConfig = {
  /** Workspace root directory. */
  workdir?: string;
  /** Max parallel recipe executions. */
  concurrency?: number;
  /** Artifact store directory (defaults to `<workdir>/.store`). */
  store?: string;
  /** Host triple override. */
  host?: string;
  /** Host triples for `perHost` recipe fan-out. */
  hosts?: string[];
  constants?: Record<string, string>;
  knownMirrors?: MirrorRewrite[];
  /** Path to a dotenv file loaded into run command environments. */
  envFile?: string;
}
