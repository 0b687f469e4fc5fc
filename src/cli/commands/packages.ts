import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {packageKey} from '../../core/dag.js'
import {readPackageManifests} from '../../core/package-aggregator.js'
import {Workspace} from '../../engine/workspace.js'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

export function registerPackagesCommand(program: Command): void {
  program
    .command('packages')
    .description('List the packages assembled in a workspace')
    .argument('<workspace>', 'Workspace ID')
    .option('--paths', 'Show the output directory of each recipe')
    .action(async (workspaceId: string, options: {paths?: boolean}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const workdir = resolveWorkdir(global, await loadConfig(process.cwd()))
      const workspace = await Workspace.open(workdir, workspaceId)
      const manifests = await readPackageManifests(workspace)

      if (global.json) {
        console.log(JSON.stringify(manifests, null, 2))
        return
      }

      if (manifests.length === 0) {
        console.log(chalk.gray('No packages assembled in this workspace.'))
        return
      }

      for (const manifest of manifests) {
        console.log(chalk.bold(packageKey(manifest)))
        for (const entry of manifest.recipes) {
          const detail = options.paths ? entry.outputDir : (entry.fingerprint?.slice(0, 12) ?? '')
          console.log(`  ${entry.name}  ${chalk.gray(detail)}`)
        }
      }
    })
}
