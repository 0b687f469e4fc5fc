import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {BuildFailedError} from '../../errors.js'
import {Kiln} from '../../core/kiln.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {LocalArtifactStore} from '../../engine/local-artifact-store.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {loadProject} from '../project.js'
import {getGlobalOptions, parsePositiveInteger, splitList} from '../utils.js'

type BuildCommandOptions = {
  workspace?: string;
  package?: string;
  recipe?: string;
  concurrency?: number;
  stopOnFirstFailure?: boolean;
  force?: string | boolean;
  clobber?: boolean;
  syncOnly?: boolean;
  envFile?: string;
  host?: string;
  cache: boolean;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build recipes and assemble packages')
    .argument('[recipes]', 'Recipe file or directory (default: current directory)')
    .option('-w, --workspace <name>', 'Workspace ID (default: the recipe file ID)')
    .option('-p, --package <packages>', 'Assemble only these packages, as name or target/name (comma-separated)')
    .option('-r, --recipe <recipes>', 'Run only these recipes and their dependencies, without packaging (comma-separated)')
    .option('-c, --concurrency <number>', 'Max parallel recipe executions (default: CPU count)', parsePositiveInteger)
    .option('--stop-on-first-failure', 'Start no new recipe after the first failure')
    .option('-f, --force [recipes]', 'Ignore the cache for all recipes, or a comma-separated list')
    .option('--clobber', 'Wipe work directories before building')
    .option('--sync-only', 'Only run source recipes')
    .option('--env-file <path>', 'Load environment variables from a dotenv file for all run commands')
    .option('--host <triple>', 'Host triple (default: the running machine)')
    .option('--no-cache', 'Disable the artifact store')
    .option('--verbose', 'Stream process output in real time (interactive mode)')
    .action(async (recipeArg: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const {config, file, buildConfig, workdir} = await loadProject(recipeArg, global, {host: options.host, envFile: options.envFile})

      const reporter = global.json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const store = options.cache
        ? (config.store ? new LocalArtifactStore(resolve(config.store)) : undefined)
        : false
      const kiln = new Kiln({workdir, reporter, store})

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      const force = options.force === true
        ? true
        : (typeof options.force === 'string' ? splitList(options.force) : undefined)

      try {
        await kiln.build(file.recipes, file.packages, {
          workspace: options.workspace ?? file.id,
          config: buildConfig,
          packages: options.package ? splitList(options.package) : undefined,
          recipes: options.recipe ? splitList(options.recipe) : undefined,
          concurrency: options.concurrency ?? config.concurrency,
          stopOnFirstFailure: options.stopOnFirstFailure,
          signal: controller.signal,
          force,
          clobber: options.clobber,
          syncOnly: options.syncOnly
        })
      } catch (error) {
        if (error instanceof BuildFailedError) {
          if (global.json) {
            console.error(error.message)
          }

          process.exitCode = 1
          return
        }

        throw error
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
