import pino from 'pino'
import type {RecipeKind, RecipeOutcome, SkipReason} from '../types.js'

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START - recipes selected, execution begins
 * 2. For each recipe:
 *    a. RECIPE_STARTING - commands are about to run (not sent for cache hits or skips)
 *    b. RECIPE_LOG - process output line
 *    c. CACHE_WARNING - artifact store degraded (read treated as a miss, write lost)
 *    d. RECIPE_FINISHED - terminal event carrying the outcome
 * 3. PACKAGE_ASSEMBLED / PACKAGE_INCOMPLETE - one per requested package
 * 4. BUILD_FINISHED - every requested package assembled
 *    OR BUILD_FAILED - failures or incomplete packages
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  workspaceId: string;
  recipes: string[];
  packages: string[];
}

export type RecipeStartingEvent = {
  event: 'RECIPE_STARTING';
  workspaceId: string;
  recipe: string;
  kind: RecipeKind;
  incremental: boolean;
}

export type RecipeLogEvent = {
  event: 'RECIPE_LOG';
  workspaceId: string;
  recipe: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type CacheWarningEvent = {
  event: 'CACHE_WARNING';
  workspaceId: string;
  recipe: string;
  fingerprint: string;
  operation: 'get' | 'put';
  message: string;
}

export type RecipeFinishedEvent = {
  event: 'RECIPE_FINISHED';
  workspaceId: string;
  recipe: string;
  kind: RecipeKind;
  outcome: RecipeOutcome;
  durationMs: number;
  fingerprint?: string;
  reason?: SkipReason;
  /** Failing command, for failed recipes */
  command?: string;
  /** Error message, for failed recipes */
  error?: string;
}

export type PackageAssembledEvent = {
  event: 'PACKAGE_ASSEMBLED';
  workspaceId: string;
  package: string;
  recipes: number;
  manifestPath: string;
}

export type PackageIncompleteEvent = {
  event: 'PACKAGE_INCOMPLETE';
  workspaceId: string;
  package: string;
  recipe: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  workspaceId: string;
  outcomes: Record<RecipeOutcome, number>;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  workspaceId: string;
  failures: Array<{recipe: string; command?: string; message: string}>;
  incompletePackages: string[];
}

export type BuildEvent =
  | BuildStartEvent
  | RecipeStartingEvent
  | RecipeLogEvent
  | CacheWarningEvent
  | RecipeFinishedEvent
  | PackageAssembledEvent
  | PackageIncompleteEvent
  | BuildFinishedEvent
  | BuildFailedEvent

/**
 * Receives build events.
 */
export type Reporter = {
  emit(event: BuildEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'CACHE_WARNING':
      case 'PACKAGE_INCOMPLETE': {
        this.logger.warn(event)
        break
      }

      case 'BUILD_FAILED': {
        this.logger.error(event)
        break
      }

      case 'RECIPE_FINISHED': {
        if (event.outcome === 'failed') {
          this.logger.error(event)
        } else {
          this.logger.info(event)
        }

        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
