import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {StateManager} from '../../core/state.js'
import {dirSize, formatSize} from '../../core/utils.js'
import {Workspace} from '../../engine/workspace.js'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List workspaces')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const workdir = resolveWorkdir(global, await loadConfig(process.cwd()))
      const names = await Workspace.list(workdir)

      if (global.json) {
        console.log(JSON.stringify(names))
        return
      }

      if (names.length === 0) {
        console.log(chalk.gray('No workspaces found.'))
        return
      }

      const rows: Array<{name: string; recipes: number; size: string}> = []
      for (const name of names) {
        const workspace = await Workspace.open(workdir, name)
        const state = new StateManager(workspace.root)
        await state.load()
        rows.push({name, recipes: state.listRecipes().length, size: formatSize(await dirSize(workspace.root))})
      }

      const nameWidth = Math.max('WORKSPACE'.length, ...rows.map(r => r.name.length))
      const sizeWidth = Math.max('SIZE'.length, ...rows.map(r => r.size.length))
      console.log(chalk.bold(`${'WORKSPACE'.padEnd(nameWidth)}  RECIPES  ${'SIZE'.padStart(sizeWidth)}`))
      for (const row of rows) {
        console.log(`${row.name.padEnd(nameWidth)}  ${String(row.recipes).padStart(7)}  ${row.size.padStart(sizeWidth)}`)
      }
    })
}
