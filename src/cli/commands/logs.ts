import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Workspace} from '../../engine/workspace.js'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

async function readLog(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show the output of the last execution of a recipe')
    .argument('<workspace>', 'Workspace ID')
    .argument('<recipe>', 'Recipe name')
    .option('-s, --stream <stream>', 'Show only stdout or stderr', 'both')
    .action(async (workspaceId: string, recipe: string, options: {stream: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const workdir = resolveWorkdir(global, await loadConfig(process.cwd()))
      const workspace = await Workspace.open(workdir, workspaceId)
      const logsDir = workspace.logsPath(recipe)

      const stdout = options.stream === 'stderr' ? undefined : await readLog(join(logsDir, 'stdout.log'))
      const stderr = options.stream === 'stdout' ? undefined : await readLog(join(logsDir, 'stderr.log'))
      if (stdout === undefined && stderr === undefined) {
        console.error(chalk.red(`No logs found for recipe: ${recipe}`))
        process.exitCode = 1
        return
      }

      if (stdout) {
        process.stdout.write(stdout)
      }

      if (stderr) {
        if (options.stream === 'both') {
          console.error(chalk.red('── stderr ──'))
        }

        process.stderr.write(stderr)
      }
    })
}
