#!/usr/bin/env node
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {KilnError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCleanCommand} from './commands/clean.js'
import {registerListCommand} from './commands/list.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerPackagesCommand} from './commands/packages.js'
import {registerPlanCommand} from './commands/plan.js'
import {registerShowCommand} from './commands/show.js'

async function main() {
  const program = new Command()

  program
    .name('kiln')
    .description('Recipe-driven build-graph executor')
    .version('0.1.0')
    .option('--workdir <path>', 'Workspaces root directory (default: ./workdir)', process.env.KILN_WORKDIR)
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerPlanCommand(program)
  registerShowCommand(program)
  registerLogsCommand(program)
  registerPackagesCommand(program)
  registerListCommand(program)
  registerCleanCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof KilnError) {
    console.error(chalk.red(`${error.name}: ${error.message}`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
