import chalk from 'chalk'
import type {Command} from 'commander'
import {subgraph, topologicalLevels, validateRecipes} from '../../core/dag.js'
import {selectPackages} from '../../core/kiln.js'
import {loadProject} from '../project.js'
import {getGlobalOptions, splitList} from '../utils.js'

const kindColors = {
  source: chalk.magenta,
  build: chalk.cyan,
  work: chalk.yellow
} as const

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Validate a recipe file and show the execution levels')
    .argument('[recipes]', 'Recipe file or directory (default: current directory)')
    .option('-p, --package <packages>', 'Plan only these packages (comma-separated)')
    .option('-r, --recipe <recipes>', 'Plan only these recipes and their dependencies (comma-separated)')
    .option('--host <triple>', 'Host triple (default: the running machine)')
    .action(async (recipeArg: string | undefined, options: {package?: string; recipe?: string; host?: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const {file} = await loadProject(recipeArg, global, {host: options.host})

      const graph = validateRecipes(file.recipes)
      let targets: string[] | undefined
      if (options.recipe) {
        targets = splitList(options.recipe)
      } else if (options.package) {
        targets = selectPackages(file.packages, splitList(options.package)).flatMap(definition => definition.recipes)
      }

      const active = targets ? subgraph(graph, targets) : undefined
      const levels = topologicalLevels(graph)
        .map(level => level.filter(name => !active || active.has(name)))
        .filter(level => level.length > 0)

      if (global.json) {
        console.log(JSON.stringify({id: file.id, levels}, null, 2))
        return
      }

      const kinds = new Map(file.recipes.map(recipe => [recipe.name, recipe.kind]))
      console.log(chalk.bold(`\n${file.name ?? file.id}\n`))
      for (const [index, level] of levels.entries()) {
        const names = level.map(name => {
          const kind = kinds.get(name) ?? 'build'
          return kindColors[kind](name)
        })
        console.log(`  ${chalk.gray(String(index + 1).padStart(2))}  ${names.join(', ')}`)
      }

      console.log()
    })
}
