import type {BuildConfig} from '../types.js'
import type {VariableScope} from '../core/template.js'
import type {OnLogLine, ProcessExecutor} from '../engine/executor.js'
import type {SourceControl} from '../engine/source-control.js'

/** JSON form of a command; feeds fingerprints and error messages. */
export type CommandDescription = {
  kind: string;
  [key: string]: JsonValue;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | {[key: string]: JsonValue}

/**
 * Everything a command may touch while its recipe runs.
 * Created by the recipe runner for one execution.
 */
export type CommandContext = {
  recipe: string;
  /** Absolute working directory (`work/{recipe}` or the source checkout parent) */
  cwd: string;
  /** Absolute directory bound to `%(output)s` */
  outputDir: string;
  scope: VariableScope;
  config: BuildConfig;
  executor: ProcessExecutor;
  sourceControl: SourceControl;
  /** The working directory holds a complete previous build */
  incremental: boolean;
  onLogLine: OnLogLine;
  /** Records the commit a sync command converged to */
  recordRevision(url: string, revision: string): void;
}

/**
 * A primitive step of a recipe.
 *
 * Commands hold unresolved templates; `apply` resolves them against the
 * context scope. `describe` must not depend on the scope: it is hashed into
 * the recipe fingerprint before any path is known.
 */
export abstract class Command {
  abstract readonly kind: string

  /**
   * Static checks run when the recipe table is registered.
   * @throws ValidationError
   */
  validate(): void {
    // Most primitives have nothing to check
  }

  /**
   * @throws CommandError subclasses on failure
   */
  abstract apply(context: CommandContext): Promise<void>

  abstract describe(): CommandDescription

  /** Commands wrapped by this one, for composite commands. */
  children(): Command[] {
    return []
  }

  toString(): string {
    const {kind, ...rest} = this.describe()
    const args = Object.values(rest).map(value => typeof value === 'string' ? value : JSON.stringify(value))
    return [kind, ...args].join(' ')
  }
}
