import {isAbsolute} from 'node:path'
import {CyclicDependencyError, MissingDependencyError, ValidationError} from '../errors.js'
import {recipeDependencies, type PackageDefinition, type Recipe} from '../types.js'
import {Workspace} from '../engine/workspace.js'

/** Maps each recipe name to its dependency names, in declaration order. */
export type RecipeGraph = Map<string, Set<string>>

/** Builds a dependency graph; map order is recipe declaration order. */
export function buildGraph(recipes: Recipe[]): RecipeGraph {
  const graph: RecipeGraph = new Map()
  for (const recipe of recipes) {
    graph.set(recipe.name, new Set(recipeDependencies(recipe)))
  }

  return graph
}

/**
 * Checks a recipe table before any execution: unique valid names, known
 * references, no cycle, valid commands.
 * @throws ConfigurationError subclasses
 */
export function validateRecipes(recipes: Recipe[]): RecipeGraph {
  const seen = new Set<string>()
  for (const recipe of recipes) {
    if (!/^[\w.-]+$/.test(recipe.name) || recipe.name.includes('..')) {
      throw new ValidationError(`Invalid recipe name '${recipe.name}': use letters, digits, '_', '-' and '.'`)
    }

    if (seen.has(recipe.name)) {
      throw new ValidationError(`Duplicate recipe name '${recipe.name}'`)
    }

    seen.add(recipe.name)
  }

  const graph = buildGraph(recipes)
  for (const [name, deps] of graph) {
    for (const dep of deps) {
      if (!graph.has(dep)) {
        throw new MissingDependencyError(name, dep)
      }
    }
  }

  detectCycles(graph)

  for (const recipe of recipes) {
    for (const inputName of Object.keys(recipe.inputs ?? {})) {
      if (!/^\w+$/.test(inputName)) {
        throw new ValidationError(`Recipe '${recipe.name}' has an invalid input name '${inputName}'`)
      }
    }

    if (recipe.kind === 'source' && recipe.outputDirname !== undefined && !isAbsolute(recipe.outputDirname)) {
      Workspace.validateName(recipe.outputDirname, 'output directory name')
    }

    for (const command of recipe.commands) {
      try {
        command.validate()
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(`Recipe '${recipe.name}': ${error.message}`, {cause: error})
        }

        throw error
      }
    }
  }

  return graph
}

/** Checks that every package lists known recipes. */
export function validatePackages(packages: PackageDefinition[], graph: RecipeGraph): void {
  const seen = new Set<string>()
  for (const definition of packages) {
    const key = packageKey(definition)
    if (seen.has(key)) {
      throw new ValidationError(`Duplicate package '${key}'`)
    }

    seen.add(key)
    for (const recipe of definition.recipes) {
      if (!graph.has(recipe)) {
        throw new ValidationError(`Package '${key}' references unknown recipe '${recipe}'`)
      }
    }
  }
}

export function packageKey(definition: {name: string; target?: string}): string {
  return definition.target === undefined ? definition.name : `${definition.target}/${definition.name}`
}

/**
 * Depth-first search with visiting/visited coloring. The reported cycle
 * starts and ends with the same recipe, e.g. `a -> b -> a`.
 */
function detectCycles(graph: RecipeGraph): void {
  const visited = new Set<string>()
  const visiting: string[] = []

  const visit = (name: string): void => {
    if (visited.has(name)) {
      return
    }

    const index = visiting.indexOf(name)
    if (index !== -1) {
      throw new CyclicDependencyError([...visiting.slice(index), name])
    }

    visiting.push(name)
    for (const dep of graph.get(name) ?? []) {
      visit(dep)
    }

    visiting.pop()
    visited.add(name)
  }

  for (const name of graph.keys()) {
    visit(name)
  }
}

/**
 * Kahn's algorithm. Among recipes ready at the same time, the one declared
 * first comes first.
 */
export function topologicalOrder(graph: RecipeGraph): string[] {
  const declared = [...graph.keys()]
  const remaining = new Map<string, number>()
  for (const [name, deps] of graph) {
    remaining.set(name, [...deps].filter(dep => graph.has(dep)).length)
  }

  const order: string[] = []
  const done = new Set<string>()
  while (order.length < declared.length) {
    const next = declared.find(name => !done.has(name) && remaining.get(name) === 0)
    if (next === undefined) {
      throw new CyclicDependencyError(declared.filter(name => !done.has(name)))
    }

    order.push(next)
    done.add(next)
    for (const [name, deps] of graph) {
      if (deps.has(next)) {
        remaining.set(name, (remaining.get(name) ?? 0) - 1)
      }
    }
  }

  return order
}

/** Recipes grouped by topological level (parallelizable groups). */
export function topologicalLevels(graph: RecipeGraph): string[][] {
  const depth = new Map<string, number>()
  const levels: string[][] = []
  for (const name of topologicalOrder(graph)) {
    let level = 0
    for (const dep of graph.get(name) ?? []) {
      level = Math.max(level, (depth.get(dep) ?? -1) + 1)
    }

    depth.set(name, level)
    levels[level] ??= []
    levels[level].push(name)
  }

  return levels
}

/** Targets and all their ancestors. */
export function subgraph(graph: RecipeGraph, targets: string[]): Set<string> {
  const result = new Set<string>()
  const queue = [...targets]

  let current = queue.shift()
  while (current !== undefined) {
    if (!result.has(current)) {
      result.add(current)
      for (const dep of graph.get(current) ?? []) {
        queue.push(dep)
      }
    }

    current = queue.shift()
  }

  return result
}

/** Recipes no other recipe depends on. */
export function leafNodes(graph: RecipeGraph): string[] {
  const depended = new Set<string>()
  for (const deps of graph.values()) {
    for (const dep of deps) {
      depended.add(dep)
    }
  }

  return [...graph.keys()].filter(name => !depended.has(name))
}

/** Recipes that depend, directly or not, on the given one. */
export function dependents(graph: RecipeGraph, name: string): Set<string> {
  const result = new Set<string>()
  let grew = true
  while (grew) {
    grew = false
    for (const [candidate, deps] of graph) {
      if (!result.has(candidate) && [...deps].some(dep => dep === name || result.has(dep))) {
        result.add(candidate)
        grew = true
      }
    }
  }

  return result
}
