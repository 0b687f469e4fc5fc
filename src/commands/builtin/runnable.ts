import {CommandError, KilnError, ValidationError} from '../../errors.js'
import {substituteAll} from '../../core/template.js'
import {Command, type CommandContext, type CommandDescription} from '../command.js'

export type RunnableFunction = (context: CommandContext, ...args: string[]) => Promise<void> | void

/**
 * Calls an in-process function with templated string arguments.
 * The function source is part of the description, so editing it
 * invalidates the recipe.
 */
export class RunnableCommand extends Command {
  readonly kind = 'runnable'
  readonly args: string[]

  constructor(
    readonly name: string,
    readonly fn: RunnableFunction,
    ...args: string[]
  ) {
    super()
    this.args = args
  }

  validate(): void {
    if (this.name.trim() === '') {
      throw new ValidationError('runnable command needs a name')
    }
  }

  async apply(context: CommandContext): Promise<void> {
    const args = substituteAll(this.args, context.scope)
    try {
      await this.fn(context, ...args)
    } catch (error) {
      if (error instanceof KilnError) {
        throw error
      }

      throw new CommandError('RUNNABLE_FAILED', `${this.name} failed: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }
  }

  describe(): CommandDescription {
    return {kind: this.kind, name: this.name, source: this.fn.toString(), args: this.args}
  }

  toString(): string {
    return [this.name, ...this.args].join(' ')
  }
}
