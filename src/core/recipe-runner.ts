import {createWriteStream, type WriteStream} from 'node:fs'
import {mkdir} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command, CommandContext} from '../commands/command.js'
import {CacheStoreError, DigestMismatchError, KilnError} from '../errors.js'
import type {ArtifactStore, StoredArtifact} from '../engine/artifact-store.js'
import type {OnLogLine, ProcessExecutor} from '../engine/executor.js'
import type {SourceControl} from '../engine/source-control.js'
import type {Workspace} from '../engine/workspace.js'
import {
  recipeDependencies,
  type BuildConfig,
  type BuildRecipe,
  type Recipe,
  type RecipeResult,
  type SourceRecipe,
  type WorkRecipe
} from '../types.js'
import {hashTree, recipeFingerprint, sourceFingerprint, type InputDigest} from './fingerprint.js'
import type {Reporter} from './reporter.js'
import {buildScope, type PathBinding} from './scope.js'
import type {StateManager} from './state.js'

export type RecipeRunnerCollaborators = {
  executor: ProcessExecutor;
  sourceControl: SourceControl;
  /** Omitted: build outputs are reused only from the workspace itself */
  store?: ArtifactStore;
}

export type RecipeRunOptions = {
  workspace: Workspace;
  state: StateManager;
  config: BuildConfig;
  recipe: Recipe;
  /** Results of every dependency, all completed */
  dependencies: Map<string, RecipeResult>;
  /** Ignore recorded and stored outputs */
  force?: boolean;
  /** Wipe the work directory first */
  clobber?: boolean;
}

type ResolvedInputs = {
  bindings: PathBinding[];
  digests: InputDigest[];
}

type CommandFailure = {
  /** Absent when the recipe failed outside its commands */
  command?: Command;
  error: Error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Executes one recipe in a workspace.
 *
 * - source: commands run in place against the checkout directory; the
 *   fingerprint comes from the resolved revisions
 * - build: fingerprint first, then workspace state, then artifact store;
 *   commands only run on a miss and the output is stored afterwards
 * - work: always runs, never stored
 *
 * Never throws: every failure becomes a `failed` result naming the
 * command that broke, when there is one.
 */
export class RecipeRunner {
  constructor(
    private readonly collaborators: RecipeRunnerCollaborators,
    private readonly reporter: Reporter
  ) {}

  async run(options: RecipeRunOptions): Promise<RecipeResult> {
    const {recipe} = options
    const startedAt = Date.now()
    let failure: CommandFailure
    try {
      const result = recipe.kind === 'source'
        ? await this.runSource(recipe, options, startedAt)
        : await this.runBuild(recipe, options, startedAt)
      if ('outcome' in result) {
        return result
      }

      failure = result
    } catch (error) {
      failure = {error: toError(error)}
    }

    return this.failed(options, startedAt, failure)
  }

  private async runSource(recipe: SourceRecipe, options: RecipeRunOptions, startedAt: number): Promise<RecipeResult | CommandFailure> {
    const {workspace, clobber} = options
    const outputDir = workspace.sourcePath(recipe.name, recipe.outputDirname)
    await mkdir(outputDir, {recursive: true})
    const cwd = await workspace.prepareWork(recipe.name, clobber)

    this.reporter.emit({event: 'RECIPE_STARTING', workspaceId: workspace.id, recipe: recipe.name, kind: recipe.kind, incremental: false})

    const revisions: Array<[string, string]> = []
    const {bindings} = await this.resolveInputs(recipe, options.dependencies)
    const failure = await this.executeCommands(recipe, options, {
      cwd,
      outputDir,
      incremental: false,
      inputs: bindings,
      recordRevision(url, revision) {
        revisions.push([url, revision])
      }
    })
    if (failure) {
      return failure
    }

    const treeDigest = revisions.length === 0 ? await hashTree(outputDir) : undefined
    const fingerprint = sourceFingerprint(recipe, options.config, revisions, treeDigest)
    return this.succeeded(options, startedAt, {outcome: 'synced', outputDir, fingerprint, revisions: Object.fromEntries(revisions)})
  }

  private async runBuild(recipe: BuildRecipe | WorkRecipe, options: RecipeRunOptions, startedAt: number): Promise<RecipeResult | CommandFailure> {
    const {workspace, config, force, clobber} = options
    const {bindings, digests} = await this.resolveInputs(recipe, options.dependencies)
    const dependencyFingerprints = recipeDependencies(recipe).map(name => ({
      name,
      fingerprint: options.dependencies.get(name)?.fingerprint ?? ''
    }))
    const fingerprint = recipeFingerprint(recipe, config, dependencyFingerprints, digests)

    if (recipe.kind === 'build' && !force) {
      const outputDir = await this.lookupCache(recipe, fingerprint, options)
      if (outputDir) {
        return this.succeeded(options, startedAt, {outcome: 'cache-hit', outputDir, fingerprint})
      }
    }

    const cwd = await workspace.prepareWork(recipe.name, clobber)
    const incremental = await workspace.isIncremental(recipe.name, fingerprint)
    await workspace.clearIncremental(recipe.name)
    const staging = await workspace.prepareStaging(recipe.name)
    const outputDir = recipe.outputSubdir ? resolve(staging, recipe.outputSubdir) : staging
    await mkdir(outputDir, {recursive: true})

    this.reporter.emit({event: 'RECIPE_STARTING', workspaceId: workspace.id, recipe: recipe.name, kind: recipe.kind, incremental})

    const failure = await this.executeCommands(recipe, options, {
      cwd,
      outputDir,
      incremental,
      inputs: bindings,
      recordRevision() {
        // Revisions only identify source recipes
      }
    })
    if (failure) {
      await workspace.discardStaging(recipe.name)
      return failure
    }

    const committed = await workspace.commitOutput(recipe.name)
    await workspace.markIncremental(recipe.name, fingerprint)
    if (recipe.kind === 'build') {
      await this.storeOutput(recipe, fingerprint, committed, options)
    }

    return this.succeeded(options, startedAt, {outcome: 'built', outputDir: committed, fingerprint})
  }

  /**
   * Committed output directory holding `fingerprint`, restored from the
   * artifact store when needed; undefined on a miss.
   * @throws DigestMismatchError when the stored entry is corrupt
   */
  private async lookupCache(recipe: BuildRecipe, fingerprint: string, options: RecipeRunOptions): Promise<string | undefined> {
    const {workspace, state} = options
    const recorded = state.getRecipe(recipe.name)
    if (recorded?.fingerprint === fingerprint && recorded.kind === 'build' && await workspace.hasOutput(recipe.name)) {
      return workspace.outputPath(recipe.name)
    }

    const {store} = this.collaborators
    if (!store) {
      return undefined
    }

    let artifact: StoredArtifact | undefined
    try {
      artifact = await store.get(fingerprint)
    } catch (error) {
      if (error instanceof DigestMismatchError || !(error instanceof CacheStoreError)) {
        throw error
      }

      this.reporter.emit({event: 'CACHE_WARNING', workspaceId: workspace.id, recipe: recipe.name, fingerprint, operation: 'get', message: error.message})
      return undefined
    }

    if (!artifact) {
      return undefined
    }

    const staging = await workspace.prepareStaging(recipe.name)
    try {
      await artifact.materialize(staging)
    } catch (error) {
      await workspace.discardStaging(recipe.name)
      throw new CacheStoreError('CACHE_EXTRACT_FAILED', `Cannot extract cache entry ${fingerprint}`, {cause: error})
    }

    // The work directory no longer matches the committed output
    await workspace.clearIncremental(recipe.name)
    return workspace.commitOutput(recipe.name)
  }

  private async storeOutput(recipe: BuildRecipe, fingerprint: string, outputDir: string, options: RecipeRunOptions): Promise<void> {
    const {store} = this.collaborators
    if (!store) {
      return
    }

    try {
      await store.put(fingerprint, outputDir)
    } catch (error) {
      if (!(error instanceof CacheStoreError)) {
        throw error
      }

      this.reporter.emit({event: 'CACHE_WARNING', workspaceId: options.workspace.id, recipe: recipe.name, fingerprint, operation: 'put', message: error.message})
    }
  }

  private async resolveInputs(recipe: Recipe, dependencies: Map<string, RecipeResult>): Promise<ResolvedInputs> {
    const bindings: PathBinding[] = []
    const digests: InputDigest[] = []
    for (const [name, binding] of Object.entries(recipe.inputs ?? {})) {
      if (typeof binding === 'string') {
        const path = resolve(binding)
        bindings.push({name, path})
        digests.push({name, digest: await hashTree(path)})
      } else {
        const base = dependencies.get(binding.recipe)?.outputDir
        if (base === undefined) {
          throw new KilnError('INPUT_NOT_READY', `Input '${name}' of '${recipe.name}' refers to '${binding.recipe}', which has no output`)
        }

        bindings.push({name, path: binding.path ? resolve(base, binding.path) : base})
        digests.push({name, digest: `${binding.recipe}:${binding.path ?? ''}`})
      }
    }

    return {bindings, digests}
  }

  private async executeCommands(
    recipe: Recipe,
    options: RecipeRunOptions,
    execution: Pick<CommandContext, 'cwd' | 'outputDir' | 'incremental' | 'recordRevision'> & {inputs: PathBinding[]}
  ): Promise<CommandFailure | undefined> {
    const {workspace, config} = options
    const dependencies: PathBinding[] = []
    for (const name of recipeDependencies(recipe)) {
      const outputDir = options.dependencies.get(name)?.outputDir
      if (outputDir !== undefined) {
        dependencies.push({name, path: outputDir})
      }
    }

    const scope = buildScope({
      config,
      cwd: execution.cwd,
      outputDir: execution.outputDir,
      dependencies,
      inputs: execution.inputs,
      variables: recipe.variables
    })

    const logsDir = workspace.logsPath(recipe.name)
    await mkdir(logsDir, {recursive: true})
    const stdoutLog = createWriteStream(join(logsDir, 'stdout.log'))
    const stderrLog = createWriteStream(join(logsDir, 'stderr.log'))
    const onLogLine: OnLogLine = ({stream, line}) => {
      const log = stream === 'stdout' ? stdoutLog : stderrLog
      log.write(line + '\n')
      this.reporter.emit({event: 'RECIPE_LOG', workspaceId: workspace.id, recipe: recipe.name, stream, line})
    }

    const context: CommandContext = {
      recipe: recipe.name,
      cwd: execution.cwd,
      outputDir: execution.outputDir,
      scope,
      config,
      executor: this.collaborators.executor,
      sourceControl: this.collaborators.sourceControl,
      incremental: execution.incremental,
      onLogLine,
      recordRevision: execution.recordRevision
    }

    try {
      for (const command of recipe.commands) {
        try {
          await command.apply(context)
        } catch (error) {
          return {command, error: toError(error)}
        }
      }

      return undefined
    } finally {
      await closeStream(stdoutLog)
      await closeStream(stderrLog)
    }
  }

  private succeeded(
    options: RecipeRunOptions,
    startedAt: number,
    result: {outcome: 'built' | 'cache-hit' | 'synced'; outputDir: string; fingerprint: string; revisions?: Record<string, string>}
  ): RecipeResult {
    const {workspace, state, recipe} = options
    const durationMs = Date.now() - startedAt
    state.setRecipe(recipe.name, {
      kind: recipe.kind,
      fingerprint: result.fingerprint,
      outcome: result.outcome,
      outputDir: result.outputDir,
      finishedAt: new Date().toISOString(),
      durationMs,
      revisions: result.revisions
    })
    this.reporter.emit({
      event: 'RECIPE_FINISHED',
      workspaceId: workspace.id,
      recipe: recipe.name,
      kind: recipe.kind,
      outcome: result.outcome,
      durationMs,
      fingerprint: result.fingerprint
    })
    return {name: recipe.name, kind: recipe.kind, outcome: result.outcome, outputDir: result.outputDir, fingerprint: result.fingerprint, durationMs}
  }

  private failed(options: RecipeRunOptions, startedAt: number, failure: CommandFailure): RecipeResult {
    const {workspace, recipe} = options
    const durationMs = Date.now() - startedAt
    const command = failure.command?.toString()
    this.reporter.emit({
      event: 'RECIPE_FINISHED',
      workspaceId: workspace.id,
      recipe: recipe.name,
      kind: recipe.kind,
      outcome: 'failed',
      durationMs,
      command,
      error: failure.error.message
    })
    return {name: recipe.name, kind: recipe.kind, outcome: 'failed', durationMs, failedCommand: command, error: failure.error}
  }
}

async function closeStream(stream: WriteStream): Promise<void> {
  if (stream.destroyed) {
    return
  }

  return new Promise((resolve, reject) => {
    stream.end(() => {
      resolve()
    })
    stream.on('error', reject)
  })
}
