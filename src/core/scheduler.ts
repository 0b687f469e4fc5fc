import {cpus} from 'node:os'
import {ValidationError, type RecipeFailure} from '../errors.js'
import type {Workspace} from '../engine/workspace.js'
import {isCompleted, type BuildConfig, type Recipe, type RecipeResult, type SkipReason} from '../types.js'
import {subgraph, topologicalOrder, validateRecipes} from './dag.js'
import type {RecipeRunner} from './recipe-runner.js'
import type {Reporter} from './reporter.js'
import type {StateManager} from './state.js'

export type ScheduleOptions = {
  workspace: Workspace;
  state: StateManager;
  config: BuildConfig;
  /** Run only these recipes and their ancestors (default: all) */
  targets?: string[];
  /** Max recipes running at once (default: core count) */
  concurrency?: number;
  /** Start nothing new once a recipe failed */
  stopOnFirstFailure?: boolean;
  /** Start nothing new once aborted; running recipes finish */
  signal?: AbortSignal;
  /** Ignore cached outputs for all recipes, or for the named ones */
  force?: true | string[];
  clobber?: boolean;
  /** Only source recipes (and what they depend on) */
  syncOnly?: boolean;
}

export type ScheduleResult = {
  /** Active recipes in topological order */
  order: string[];
  results: Map<string, RecipeResult>;
  failures: RecipeFailure[];
}

/**
 * Runs a recipe table with bounded parallelism.
 *
 * A recipe starts once all its dependencies completed; among eligible
 * recipes the first declared starts first. A failed or skipped recipe
 * blocks its dependents, which are reported skipped. Other branches keep
 * going unless `stopOnFirstFailure` is set.
 */
export class Scheduler {
  constructor(
    private readonly runner: RecipeRunner,
    private readonly reporter: Reporter
  ) {}

  /**
   * @throws ConfigurationError when the table is invalid, before anything runs
   */
  async run(recipes: Recipe[], options: ScheduleOptions): Promise<ScheduleResult> {
    const graph = validateRecipes(recipes)
    const byName = new Map(recipes.map(recipe => [recipe.name, recipe]))
    for (const target of options.targets ?? []) {
      if (!byName.has(target)) {
        throw new ValidationError(`Unknown recipe '${target}'`)
      }
    }

    if (options.concurrency !== undefined && (!Number.isInteger(options.concurrency) || options.concurrency < 1)) {
      throw new ValidationError(`Invalid concurrency: ${options.concurrency}`)
    }

    let active = new Set(options.targets ? subgraph(graph, options.targets) : graph.keys())
    if (options.syncOnly) {
      const sources = [...active].filter(name => byName.get(name)?.kind === 'source')
      active = subgraph(graph, sources)
    }

    const order = topologicalOrder(graph).filter(name => active.has(name))
    const limit = options.concurrency ?? cpus().length
    const results = new Map<string, RecipeResult>()
    const failures: RecipeFailure[] = []
    const pending = [...order]
    const running = new Map<string, Promise<void>>()

    const depsOf = (name: string) => [...graph.get(name) ?? []]

    const start = async (recipe: Recipe): Promise<void> => {
      const dependencies = new Map<string, RecipeResult>()
      for (const dep of depsOf(recipe.name)) {
        const result = results.get(dep)
        if (result) {
          dependencies.set(dep, result)
        }
      }

      const force = options.force === true || (options.force?.includes(recipe.name) ?? false)
      const result = await this.runner.run({
        workspace: options.workspace,
        state: options.state,
        config: options.config,
        recipe,
        dependencies,
        force,
        clobber: options.clobber
      })
      results.set(recipe.name, result)
      if (result.outcome === 'failed') {
        failures.push({recipe: recipe.name, command: result.failedCommand, error: result.error ?? new Error(`Recipe ${recipe.name} failed`)})
      }
    }

    const skip = (recipe: Recipe, reason: SkipReason): void => {
      results.set(recipe.name, {name: recipe.name, kind: recipe.kind, outcome: 'skipped', durationMs: 0, skipReason: reason})
      this.reporter.emit({
        event: 'RECIPE_FINISHED',
        workspaceId: options.workspace.id,
        recipe: recipe.name,
        kind: recipe.kind,
        outcome: 'skipped',
        durationMs: 0,
        reason
      })
    }

    // Pending is in topological order, so one pass settles whole chains
    const settleBlocked = (): void => {
      for (const name of [...pending]) {
        const recipe = byName.get(name)
        if (!recipe) {
          continue
        }

        let reason: SkipReason | undefined
        const blocked = depsOf(name).some(dep => {
          const outcome = results.get(dep)?.outcome
          return outcome === 'failed' || outcome === 'skipped'
        })
        if (blocked) {
          reason = 'dependency'
        } else if (options.signal?.aborted) {
          reason = 'cancelled'
        } else if (options.stopOnFirstFailure && failures.length > 0) {
          reason = 'stopped'
        }

        if (reason) {
          pending.splice(pending.indexOf(name), 1)
          skip(recipe, reason)
        }
      }
    }

    for (;;) {
      settleBlocked()
      while (running.size < limit) {
        const next = pending.find(name => depsOf(name).every(dep => isCompleted(results.get(dep))))
        if (next === undefined) {
          break
        }

        const recipe = byName.get(next)
        pending.splice(pending.indexOf(next), 1)
        if (recipe) {
          running.set(next, start(recipe).finally(() => running.delete(next)))
        }
      }

      if (running.size === 0) {
        break
      }

      await Promise.race(running.values())
    }

    for (const name of pending) {
      const recipe = byName.get(name)
      if (recipe) {
        skip(recipe, 'dependency')
      }
    }

    return {order, results, failures}
  }
}
