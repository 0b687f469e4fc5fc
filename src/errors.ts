export class KilnError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'KilnError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigurationError extends KilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigurationError'
  }
}

export class ValidationError extends ConfigurationError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class MissingDependencyError extends ConfigurationError {
  constructor(
    readonly recipeName: string,
    readonly dependencyName: string,
    options?: {cause?: unknown}
  ) {
    super('MISSING_DEPENDENCY', `Recipe '${recipeName}' depends on unknown recipe '${dependencyName}'`, options)
    this.name = 'MissingDependencyError'
  }
}

export class CyclicDependencyError extends ConfigurationError {
  constructor(
    readonly cycle: string[],
    options?: {cause?: unknown}
  ) {
    super('CYCLIC_DEPENDENCY', `Dependency cycle: ${cycle.join(' -> ')}`, options)
    this.name = 'CyclicDependencyError'
  }
}

export class UnresolvedVariableError extends ConfigurationError {
  constructor(
    readonly variable: string,
    readonly template: string,
    options?: {cause?: unknown}
  ) {
    super('UNRESOLVED_VARIABLE', `No value for %(${variable})s in '${template}'`, options)
    this.name = 'UnresolvedVariableError'
  }
}

// -- Command errors ----------------------------------------------------------

export class CommandError extends KilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CommandError'
  }
}

export class CommandFailedError extends CommandError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('COMMAND_FAILED', `Command '${command}' failed with exit code ${exitCode}`, options)
    this.name = 'CommandFailedError'
  }
}

export class IOFailureError extends CommandError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('IO_FAILURE', message, options)
    this.name = 'IOFailureError'
  }
}

export class SyncError extends CommandError {
  constructor(
    readonly url: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('SYNC_FAILED', message, options)
    this.name = 'SyncError'
  }
}

// -- Cache errors ------------------------------------------------------------

export class CacheStoreError extends KilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CacheStoreError'
  }
}

export class DigestMismatchError extends CacheStoreError {
  constructor(
    readonly fingerprint: string,
    readonly expected: string,
    readonly actual: string,
    options?: {cause?: unknown}
  ) {
    super('DIGEST_MISMATCH', `Cache entry ${fingerprint} is corrupt: expected digest ${expected}, got ${actual}`, options)
    this.name = 'DigestMismatchError'
  }
}

// -- Workspace errors --------------------------------------------------------

export class WorkspaceError extends KilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkspaceError'
  }
}

export class StagingError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

export type LockInfo = {
  pid: number;
  startedAt: string;
  version: number;
}

export class WorkspaceLockedError extends WorkspaceError {
  constructor(
    readonly workspaceRoot: string,
    readonly lockInfo: LockInfo,
    options?: {cause?: unknown}
  ) {
    super('WORKSPACE_LOCKED', `Workspace ${workspaceRoot} is locked by process ${lockInfo.pid} since ${lockInfo.startedAt}`, options)
    this.name = 'WorkspaceLockedError'
  }
}

// -- Package errors ----------------------------------------------------------

export class PackageError extends KilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'PackageError'
  }
}

export class IncompletePackageError extends PackageError {
  constructor(
    readonly packageName: string,
    readonly recipeName: string,
    options?: {cause?: unknown}
  ) {
    super('INCOMPLETE_PACKAGE', `Package '${packageName}' is incomplete: recipe '${recipeName}' did not complete`, options)
    this.name = 'IncompletePackageError'
  }
}

/** A recipe that ended in failure, with the command that broke it when known. */
export type RecipeFailure = {
  recipe: string;
  command?: string;
  error: Error;
}

export class BuildFailedError extends KilnError {
  constructor(
    readonly failures: RecipeFailure[],
    readonly incompletePackages: IncompletePackageError[],
    options?: {cause?: unknown}
  ) {
    super('BUILD_FAILED', BuildFailedError.describe(failures, incompletePackages), options)
    this.name = 'BuildFailedError'
  }

  private static describe(failures: RecipeFailure[], incompletePackages: IncompletePackageError[]): string {
    const lines = ['Build failed']
    for (const failure of failures) {
      const where = failure.command ? ` in '${failure.command}'` : ''
      lines.push(`  recipe ${failure.recipe}${where}: ${failure.error.message}`)
    }

    for (const error of incompletePackages) {
      lines.push(`  ${error.message}`)
    }

    return lines.join('\n')
  }
}
