import process from 'node:process'
import {rm} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {WorkspaceLock} from '../../engine/workspace-lock.js'
import {Workspace} from '../../engine/workspace.js'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove workspaces (all of them when none is named)')
    .argument('[workspaces...]', 'Workspace IDs to remove')
    .option('--store', 'Also empty the artifact store')
    .action(async (requested: string[], options: {store?: boolean}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const workdir = resolveWorkdir(global, config)
      const existing = await Workspace.list(workdir)

      const names = requested.length > 0 ? requested : existing
      for (const name of names) {
        if (!existing.includes(name)) {
          console.error(chalk.red(`Workspace not found: ${name}`))
          process.exitCode = 1
          return
        }

        const lock = await WorkspaceLock.check(join(workdir, name))
        if (lock) {
          console.error(chalk.red(`Workspace ${name} is being built by process ${lock.pid}`))
          process.exitCode = 1
          return
        }
      }

      for (const name of names) {
        await Workspace.remove(workdir, name)
      }

      if (options.store) {
        await rm(config.store ? resolve(config.store) : join(workdir, '.store'), {recursive: true, force: true})
      }

      if (names.length === 0 && !options.store) {
        console.log(chalk.gray('No workspaces to clean.'))
        return
      }

      const suffix = options.store ? ' and the artifact store' : ''
      console.log(chalk.green(`Removed ${names.length} workspace${names.length === 1 ? '' : 's'}${suffix}.`))
    })
}
