import {readFile, rename, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import type {RecipeKind, RecipeOutcome} from '../types.js'

/**
 * Last committed result of a recipe.
 */
export type RecipeState = {
  kind: RecipeKind;
  /** Fingerprint of the committed output */
  fingerprint: string;
  outcome: RecipeOutcome;
  outputDir: string;
  finishedAt: string;
  durationMs: number;
  /** Commits resolved by sync commands, keyed by URL */
  revisions?: Record<string, string>;
}

/**
 * Workspace state, persisted as state.json.
 */
export type BuildState = {
  recipes: Record<string, RecipeState>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isRecipeState(value: unknown): value is RecipeState {
  return isRecord(value)
    && typeof value.fingerprint === 'string'
    && typeof value.outputDir === 'string'
    && typeof value.kind === 'string'
    && typeof value.outcome === 'string'
}

/**
 * Tracks which fingerprint each committed output holds.
 *
 * A build recipe whose fingerprint matches the recorded one, and whose
 * output directory still exists, is a cache hit without touching the
 * artifact store. A recipe that fails keeps its previous entry: its
 * committed output was not replaced.
 */
export class StateManager {
  private state: BuildState = {recipes: {}}
  private readonly path: string

  constructor(workspaceRoot: string) {
    this.path = join(workspaceRoot, 'state.json')
  }

  /**
   * Loads state.json. A missing file gives an empty state; unreadable
   * entries are dropped so their recipes rebuild.
   */
  async load(): Promise<void> {
    let content: string
    try {
      content = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissing(error)) {
        this.state = {recipes: {}}
        return
      }

      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch {
      parsed = undefined
    }

    const recipes: Record<string, RecipeState> = {}
    if (isRecord(parsed) && isRecord(parsed.recipes)) {
      for (const [name, entry] of Object.entries(parsed.recipes)) {
        if (isRecipeState(entry)) {
          recipes[name] = entry
        }
      }
    }

    this.state = {recipes}
  }

  /** Writes state.json atomically. */
  async save(): Promise<void> {
    const tmp = `${this.path}.tmp`
    await writeFile(tmp, JSON.stringify(this.state, null, 2), 'utf8')
    await rename(tmp, this.path)
  }

  getRecipe(name: string): RecipeState | undefined {
    return this.state.recipes[name]
  }

  setRecipe(name: string, entry: RecipeState): void {
    this.state.recipes[name] = entry
  }

  removeRecipe(name: string): void {
    delete this.state.recipes[name]
  }

  /** Recorded recipes in insertion order. */
  listRecipes(): Array<{name: string} & RecipeState> {
    return Object.entries(this.state.recipes).map(([name, entry]) => ({name, ...entry}))
  }
}
