import {mkdir} from 'node:fs/promises'
import {dirname, resolve} from 'node:path'
import {CommandFailedError, ValidationError} from '../../errors.js'
import {substitute, substituteAll, type VariableScope} from '../../core/template.js'
import {Command, type CommandContext, type CommandDescription} from '../command.js'

export type RunOptions = {
  /** Extra environment, values templated */
  env?: Record<string, string>;
  /** File receiving stdout, relative to the working directory */
  stdout?: string;
  /** File receiving stderr, relative to the working directory */
  stderr?: string;
  /** Working directory override, relative to the recipe working directory */
  cwd?: string;
  timeoutSec?: number;
}

function substituteEnv(env: Record<string, string>, scope: VariableScope): Record<string, string> {
  return Object.fromEntries(Object.entries(env).map(([key, value]) => [key, substitute(value, scope)]))
}

/** Runs an external program; a non-zero exit fails the recipe. */
export class RunCommand extends Command {
  readonly kind = 'run'

  constructor(
    readonly argv: string[],
    readonly options: RunOptions = {}
  ) {
    super()
  }

  validate(): void {
    if (this.argv.length === 0 || this.argv[0].trim() === '') {
      throw new ValidationError('run command needs a program')
    }

    if (this.options.timeoutSec !== undefined && (!Number.isFinite(this.options.timeoutSec) || this.options.timeoutSec <= 0)) {
      throw new ValidationError(`Invalid timeout for '${this.toString()}': ${this.options.timeoutSec}`)
    }
  }

  async apply(context: CommandContext): Promise<void> {
    const {scope} = context
    const argv = substituteAll(this.argv, scope)
    const cwd = this.options.cwd ? resolve(context.cwd, substitute(this.options.cwd, scope)) : context.cwd
    const stdoutPath = this.options.stdout ? resolve(cwd, substitute(this.options.stdout, scope)) : undefined
    const stderrPath = this.options.stderr ? resolve(cwd, substitute(this.options.stderr, scope)) : undefined

    await mkdir(cwd, {recursive: true})
    for (const path of [stdoutPath, stderrPath]) {
      if (path) {
        await mkdir(dirname(path), {recursive: true})
      }
    }

    const result = await context.executor.run({
      argv,
      cwd,
      env: {...context.config.env, ...substituteEnv(this.options.env ?? {}, scope)},
      stdoutPath,
      stderrPath,
      timeoutSec: this.options.timeoutSec
    }, context.onLogLine)

    if (result.exitCode !== 0) {
      throw new CommandFailedError(this.toString(), result.exitCode, {
        cause: result.error ? new Error(result.error) : undefined
      })
    }
  }

  describe(): CommandDescription {
    const description: CommandDescription = {kind: this.kind, argv: this.argv}
    const {env, stdout, stderr, cwd, timeoutSec} = this.options
    if (env) {
      const sorted = Object.entries(env).sort(([a], [b]) => a.localeCompare(b))
      description.env = Object.fromEntries(sorted)
    }

    if (stdout !== undefined) {
      description.stdout = stdout
    }

    if (stderr !== undefined) {
      description.stderr = stderr
    }

    if (cwd !== undefined) {
      description.cwd = cwd
    }

    if (timeoutSec !== undefined) {
      description.timeoutSec = timeoutSec
    }

    return description
  }

  toString(): string {
    return this.argv.join(' ')
  }
}
