import {Command, type CommandContext, type CommandDescription} from '../command.js'

/**
 * Runs the wrapped commands only on a fresh working directory.
 * Typically wraps configure steps that a later `make` does not need again.
 */
export class SkipForIncrementalCommand extends Command {
  readonly kind = 'skipForIncremental'

  constructor(readonly commands: Command[]) {
    super()
  }

  validate(): void {
    for (const command of this.commands) {
      command.validate()
    }
  }

  async apply(context: CommandContext): Promise<void> {
    if (context.incremental) {
      return
    }

    for (const command of this.commands) {
      await command.apply(context)
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, commands: this.commands.map(command => command.describe())}
  }

  children(): Command[] {
    return this.commands
  }

  toString(): string {
    return `skipForIncremental(${this.commands.map(String).join('; ')})`
  }
}
