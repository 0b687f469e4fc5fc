import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, RecipeFinishedEvent, RecipeLogEvent, Reporter} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

const skipLabels = {
  dependency: 'blocked by a failed dependency',
  stopped: 'stopped after first failure',
  cancelled: 'cancelled'
} as const

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly spinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        const what = event.packages.length > 0 ? `${event.packages.length} package(s)` : `${event.recipes.length} recipe(s)`
        console.log(chalk.bold(`\n▶ Building ${chalk.cyan(event.workspaceId)}: ${what}\n`))
        break
      }

      case 'RECIPE_STARTING': {
        const text = event.incremental ? `${event.recipe} (incremental)` : event.recipe
        this.spinners.set(event.recipe, ora({text, prefixText: ' '}).start())
        break
      }

      case 'RECIPE_LOG': {
        this.handleLog(event)
        break
      }

      case 'CACHE_WARNING': {
        this.printAbove(event.recipe, chalk.yellow(`  ! ${event.recipe}: cache ${event.operation} failed: ${event.message}`))
        break
      }

      case 'RECIPE_FINISHED': {
        this.handleRecipeFinished(event)
        break
      }

      case 'PACKAGE_ASSEMBLED': {
        console.log(`  ${chalk.blue('▣')} ${event.package} ${chalk.gray(`(${event.recipes} recipes)`)}`)
        break
      }

      case 'PACKAGE_INCOMPLETE': {
        console.log(`  ${chalk.red('▣')} ${chalk.red(`${event.package} incomplete: ${event.recipe} did not complete`)}`)
        break
      }

      case 'BUILD_FINISHED': {
        const {outcomes} = event
        const summary = `${outcomes.built} built, ${outcomes['cache-hit']} cached, ${outcomes.synced} synced`
        console.log(chalk.bold.green(`\n✓ Build completed in ${formatDuration(event.durationMs)} (${summary})\n`))
        break
      }

      case 'BUILD_FAILED': {
        console.log(chalk.bold.red(`\n✗ Build failed (${event.failures.length} failed recipe(s))\n`))
        break
      }
    }
  }

  private handleLog(event: RecipeLogEvent): void {
    if (this.verbose) {
      this.printAbove(event.recipe, `${chalk.gray(`  [${event.recipe}]`)} ${event.line}`)
    }

    if (event.stream === 'stderr') {
      let buffer = this.stderrBuffers.get(event.recipe)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(event.recipe, buffer)
      }

      buffer.push(event.line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handleRecipeFinished(event: RecipeFinishedEvent): void {
    const spinner = this.spinners.get(event.recipe)
    this.spinners.delete(event.recipe)
    const persist = (symbol: string, text: string) => {
      if (spinner) {
        spinner.stopAndPersist({symbol, text})
      } else {
        console.log(`  ${symbol} ${text}`)
      }
    }

    switch (event.outcome) {
      case 'cache-hit': {
        persist(chalk.gray('⊙'), chalk.gray(`${event.recipe} (cached)`))
        break
      }

      case 'built':
      case 'synced': {
        persist(chalk.green('✓'), chalk.green(`${event.recipe} (${formatDuration(event.durationMs)})`))
        break
      }

      case 'skipped': {
        const label = event.reason ? skipLabels[event.reason] : 'skipped'
        persist(chalk.yellow('○'), chalk.yellow(`${event.recipe} (${label})`))
        break
      }

      case 'failed': {
        const where = event.command ? ` in ${event.command}` : ''
        persist(chalk.red('✗'), chalk.red(`${event.recipe}${where}`))
        if (event.error) {
          console.log(chalk.red(`    ${event.error}`))
        }

        const stderr = this.stderrBuffers.get(event.recipe)
        if (stderr && stderr.length > 0) {
          console.log(chalk.red('  ── stderr ──'))
          for (const line of stderr) {
            console.log(chalk.red(`  ${line}`))
          }
        }

        break
      }
    }

    this.stderrBuffers.delete(event.recipe)
  }

  private printAbove(recipe: string, line: string): void {
    const spinner = this.spinners.get(recipe)
    if (spinner) {
      spinner.clear()
      console.log(line)
      spinner.render()
    } else {
      console.log(line)
    }
  }
}
