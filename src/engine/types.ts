/**
 * Request to run an external program.
 */
export type RunProcessRequest = {
  /** Program and arguments, already substituted */
  argv: string[];
  /** Absolute working directory */
  cwd: string;
  /** Environment variables added to the inherited environment */
  env?: Record<string, string>;
  /** File receiving stdout lines (in addition to the log callback) */
  stdoutPath?: string;
  /** File receiving stderr lines (in addition to the log callback) */
  stderrPath?: string;
  /** Execution timeout in seconds (undefined = no timeout) */
  timeoutSec?: number;
}

/**
 * Result of a process execution.
 */
export type RunProcessResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Error message when the process could not run to completion */
  error?: string;
}

/**
 * Request to bring a working copy to a pinned revision.
 */
export type SyncRequest = {
  /** Canonical repository URL */
  url: string;
  /** Absolute path of the working copy */
  destination: string;
  /** Commit, tag or branch to check out */
  revision: string;
  /** Discard local modifications before checking out */
  clean: boolean;
  /** Alternate URLs tried in order when the canonical URL fails */
  mirrors: string[];
}

/**
 * Result of a sync: the commit the working copy now points to.
 */
export type SyncResult = {
  revision: string;
}
