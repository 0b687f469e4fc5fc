import {execSync} from 'node:child_process'
import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {CommandContext} from '../commands/command.js'
import {createBuildConfig} from '../core/build-config.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import {buildScope} from '../core/scope.js'
import {ProcessExecutor, type OnLogLine} from '../engine/executor.js'
import {SourceControl} from '../engine/source-control.js'
import type {RunProcessRequest, RunProcessResult, SyncRequest, SyncResult} from '../engine/types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'kiln-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export type FakeProcess = (request: RunProcessRequest, onLogLine: OnLogLine) => Promise<number> | number

/**
 * Understands a tiny command language, relative paths resolving against the cwd:
 * - `write <path> <content>`: writes a file, creating its directory
 * - `echo <words...>`: one stdout line
 * - `warn <words...>`: one stderr line
 * - `fail [code]`: exits with the code (default 1)
 *
 * Anything else exits 0.
 */
export const scriptedProcess: FakeProcess = async ({argv, cwd}, onLogLine) => {
  const [program, ...args] = argv
  switch (program) {
    case 'write': {
      const path = join(cwd, args[0])
      await mkdir(dirname(path), {recursive: true})
      await writeFile(path, args.slice(1).join(' '), 'utf8')
      return 0
    }

    case 'echo': {
      onLogLine({stream: 'stdout', line: args.join(' ')})
      return 0
    }

    case 'warn': {
      onLogLine({stream: 'stderr', line: args.join(' ')})
      return 0
    }

    case 'fail': {
      return args.length > 0 ? Number(args[0]) : 1
    }

    default: {
      return 0
    }
  }
}

/**
 * Process executor that records invocations and simulates them in process.
 */
export class FakeProcessExecutor extends ProcessExecutor {
  readonly invocations: RunProcessRequest[] = []

  constructor(private readonly handler: FakeProcess = scriptedProcess) {
    super()
  }

  async run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult> {
    this.invocations.push(request)
    const startedAt = new Date()
    const exitCode = await this.handler(request, onLogLine)
    return {exitCode, startedAt, finishedAt: new Date()}
  }

  /** Command lines of the recorded invocations, in order. */
  commandLines(): string[] {
    return this.invocations.map(request => request.argv.join(' '))
  }
}

/**
 * Source control that writes a marker file instead of checking out, and
 * resolves every revision to a commit (`commit-<revision>` by default).
 */
export class FakeSourceControl extends SourceControl {
  readonly requests: SyncRequest[] = []

  constructor(private readonly resolveCommit: (revision: string) => string = revision => `commit-${revision}`) {
    super()
  }

  async sync(request: SyncRequest): Promise<SyncResult> {
    this.requests.push(request)
    await mkdir(request.destination, {recursive: true})
    await writeFile(join(request.destination, 'REVISION'), request.revision, 'utf8')
    return {revision: this.resolveCommit(request.revision)}
  }
}

/**
 * Checks if git is available on the host (synchronous for use at module level).
 */
export function isGitAvailable(): boolean {
  try {
    execSync('git --version', {stdio: 'ignore'})
    return true
  } catch {
    return false
  }
}

/**
 * Context for applying a single command outside a recipe run.
 * Output defaults to `<cwd>/out`; the host is fixed to x86_64-linux-gnu.
 */
export function createCommandContext(cwd: string, overrides: Partial<CommandContext> = {}): CommandContext {
  const config = overrides.config ?? createBuildConfig({host: 'x86_64-linux-gnu', cores: 4})
  const outputDir = overrides.outputDir ?? join(cwd, 'out')
  return {
    recipe: 'test',
    cwd,
    outputDir,
    scope: buildScope({config, cwd, outputDir}),
    config,
    executor: new FakeProcessExecutor(),
    sourceControl: new FakeSourceControl(),
    incremental: false,
    onLogLine() {/* noop */},
    recordRevision() {/* noop */},
    ...overrides
  }
}
