import {join} from 'node:path'
import {BuildFailedError, ValidationError, type IncompletePackageError, type RecipeFailure} from '../errors.js'
import type {ArtifactStore} from '../engine/artifact-store.js'
import type {ProcessExecutor} from '../engine/executor.js'
import {GitCliSourceControl} from '../engine/git-source-control.js'
import {LocalArtifactStore} from '../engine/local-artifact-store.js'
import {ExecaProcessExecutor} from '../engine/process-executor.js'
import type {SourceControl} from '../engine/source-control.js'
import {Workspace} from '../engine/workspace.js'
import {WorkspaceLock} from '../engine/workspace-lock.js'
import type {BuildConfig, PackageDefinition, PackageManifest, Recipe, RecipeOutcome, RecipeResult} from '../types.js'
import {packageKey, validatePackages, validateRecipes} from './dag.js'
import {assemblePackages, writePackageManifest, type PackageAssembly} from './package-aggregator.js'
import {RecipeRunner} from './recipe-runner.js'
import {ConsoleReporter, type Reporter} from './reporter.js'
import {Scheduler, type ScheduleResult} from './scheduler.js'
import {StateManager} from './state.js'

export type KilnOptions = {
  /** Directory holding the workspaces */
  workdir: string;
  executor?: ProcessExecutor;
  sourceControl?: SourceControl;
  /** Artifact store; `false` disables it (default: `<workdir>/.store`) */
  store?: ArtifactStore | false;
  reporter?: Reporter;
}

export type BuildOptions = {
  /** Workspace ID under the workdir */
  workspace: string;
  config: BuildConfig;
  /** Packages to assemble, as `name` or `target/name` (default: all) */
  packages?: string[];
  /** Recipes to run without assembling packages */
  recipes?: string[];
  concurrency?: number;
  stopOnFirstFailure?: boolean;
  signal?: AbortSignal;
  force?: true | string[];
  clobber?: boolean;
  syncOnly?: boolean;
}

export type BuildReport = {
  workspace: Workspace;
  /** Active recipes in topological order */
  order: string[];
  results: Map<string, RecipeResult>;
  failures: RecipeFailure[];
  manifests: PackageManifest[];
  incompletePackages: IncompletePackageError[];
  success: boolean;
}

/**
 * Entry point: validates the tables, runs the recipes needed by the
 * requested packages and assembles them.
 *
 * @example
 * ```typescript
 * const kiln = new Kiln({workdir: './workdir'})
 * await kiln.build(recipes, packages, {workspace: 'toolchain', config: createBuildConfig()})
 * ```
 */
export class Kiln {
  readonly workdir: string
  private readonly reporter: Reporter
  private readonly scheduler: Scheduler

  constructor(options: KilnOptions) {
    this.workdir = options.workdir
    this.reporter = options.reporter ?? new ConsoleReporter()
    const store = options.store === false ? undefined : options.store ?? new LocalArtifactStore(join(options.workdir, '.store'))
    const runner = new RecipeRunner({
      executor: options.executor ?? new ExecaProcessExecutor(),
      sourceControl: options.sourceControl ?? new GitCliSourceControl(),
      store
    }, this.reporter)
    this.scheduler = new Scheduler(runner, this.reporter)
  }

  /**
   * Runs the build and reports failures by throwing.
   * @throws BuildFailedError when a recipe failed or a requested package is incomplete
   */
  async build(recipes: Recipe[], packages: PackageDefinition[], options: BuildOptions): Promise<BuildReport> {
    const report = await this.execute(recipes, packages, options)
    if (!report.success) {
      throw new BuildFailedError(report.failures, report.incompletePackages)
    }

    return report
  }

  /**
   * Runs the build and returns its report, successful or not.
   * @throws ConfigurationError when the tables are invalid, before anything runs
   * @throws WorkspaceLockedError when another process builds the workspace
   */
  async execute(recipes: Recipe[], packages: PackageDefinition[], options: BuildOptions): Promise<BuildReport> {
    const startedAt = Date.now()
    const graph = validateRecipes(recipes)
    validatePackages(packages, graph)
    const selected = selectPackages(packages, options.packages)
    const targets = options.recipes ?? (options.packages ? [...new Set(selected.flatMap(definition => definition.recipes))] : undefined)

    const workspace = await Workspace.create(this.workdir, options.workspace)
    const lock = await WorkspaceLock.acquire(workspace.root)
    try {
      await workspace.cleanupStaging()
      const state = new StateManager(workspace.root)
      await state.load()

      this.reporter.emit({
        event: 'BUILD_START',
        workspaceId: workspace.id,
        recipes: targets ?? recipes.map(recipe => recipe.name),
        packages: selected.map(definition => packageKey(definition))
      })

      let scheduled: ScheduleResult
      try {
        scheduled = await this.scheduler.run(recipes, {
          workspace,
          state,
          config: options.config,
          targets,
          concurrency: options.concurrency,
          stopOnFirstFailure: options.stopOnFirstFailure,
          signal: options.signal,
          force: options.force,
          clobber: options.clobber,
          syncOnly: options.syncOnly
        })
      } finally {
        await state.save()
      }

      const assembly: PackageAssembly = options.syncOnly || options.recipes
        ? {manifests: [], incomplete: []}
        : assemblePackages(selected, scheduled.results)
      for (const manifest of assembly.manifests) {
        const manifestPath = await writePackageManifest(workspace, manifest)
        this.reporter.emit({
          event: 'PACKAGE_ASSEMBLED',
          workspaceId: workspace.id,
          package: packageKey(manifest),
          recipes: manifest.recipes.length,
          manifestPath
        })
      }

      for (const error of assembly.incomplete) {
        this.reporter.emit({event: 'PACKAGE_INCOMPLETE', workspaceId: workspace.id, package: error.packageName, recipe: error.recipeName})
      }

      const success = scheduled.failures.length === 0 && assembly.incomplete.length === 0
      if (success) {
        this.reporter.emit({event: 'BUILD_FINISHED', workspaceId: workspace.id, outcomes: countOutcomes(scheduled.results), durationMs: Date.now() - startedAt})
      } else {
        this.reporter.emit({
          event: 'BUILD_FAILED',
          workspaceId: workspace.id,
          failures: scheduled.failures.map(({recipe, command, error}) => ({recipe, command, message: error.message})),
          incompletePackages: assembly.incomplete.map(error => error.packageName)
        })
      }

      return {
        workspace,
        order: scheduled.order,
        results: scheduled.results,
        failures: scheduled.failures,
        manifests: assembly.manifests,
        incompletePackages: assembly.incomplete,
        success
      }
    } finally {
      await lock.release()
    }
  }
}

/** Packages matching `name` or `target/name` keys, all of them without keys. */
export function selectPackages(packages: PackageDefinition[], requested?: string[]): PackageDefinition[] {
  if (!requested) {
    return packages
  }

  return requested.flatMap(key => {
    const matches = packages.filter(definition => definition.name === key || packageKey(definition) === key)
    if (matches.length === 0) {
      throw new ValidationError(`Unknown package '${key}'`)
    }

    return matches
  })
}

function countOutcomes(results: Map<string, RecipeResult>): Record<RecipeOutcome, number> {
  const counts: Record<RecipeOutcome, number> = {'cache-hit': 0, built: 0, synced: 0, failed: 0, skipped: 0}
  for (const result of results.values()) {
    counts[result.outcome]++
  }

  return counts
}
