import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {StateManager} from '../../core/state.js'
import {dirSize, formatDuration, formatSize} from '../../core/utils.js'
import {Workspace} from '../../engine/workspace.js'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

type Row = {
  recipe: string;
  kind: string;
  outcome: string;
  duration: string;
  size: string;
  date: string;
}

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show the committed recipes of a workspace')
    .argument('<workspace>', 'Workspace ID')
    .action(async (workspaceId: string, _options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const workdir = resolveWorkdir(global, await loadConfig(process.cwd()))

      const workspace = await Workspace.open(workdir, workspaceId)
      const state = new StateManager(workspace.root)
      await state.load()

      const rows: Row[] = []
      let totalSize = 0
      for (const entry of state.listRecipes()) {
        const bytes = await dirSize(entry.outputDir)
        totalSize += bytes
        rows.push({
          recipe: entry.name,
          kind: entry.kind,
          outcome: entry.outcome,
          duration: formatDuration(entry.durationMs),
          size: formatSize(bytes),
          date: entry.finishedAt.replace('T', ' ').replace(/\.\d+Z$/, '')
        })
      }

      if (global.json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (rows.length === 0) {
        console.log(chalk.gray('No recipes built in this workspace.'))
        return
      }

      const columns = ['RECIPE', 'KIND', 'OUTCOME', 'DURATION', 'SIZE', 'FINISHED'] as const
      const values = (row: Row) => [row.recipe, row.kind, row.outcome, row.duration, row.size, row.date]
      const widths = columns.map((title, index) => Math.max(title.length, ...rows.map(row => values(row)[index].length)))

      console.log(chalk.bold(columns.map((title, index) => title.padEnd(widths[index])).join('  ')))
      for (const row of rows) {
        const cells = values(row).map((value, index) => value.padEnd(widths[index]))
        cells[2] = row.outcome === 'cache-hit' ? chalk.gray(cells[2]) : chalk.green(cells[2])
        console.log(cells.join('  '))
      }

      if (rows.length > 1) {
        console.log(chalk.gray(`\n  Total: ${formatSize(totalSize)}`))
      }
    })
}
