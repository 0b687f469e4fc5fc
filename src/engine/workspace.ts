import {access, mkdir, readdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {isAbsolute, join} from 'node:path'
import {WorkspaceError, StagingError} from '../errors.js'

const incrementalMarker = '.kiln-incremental'

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch (error) {
    if (isMissing(error)) {
      return false
    }

    throw error
  }
}

async function listDirectories(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, {withFileTypes: true})
    return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
  } catch (error) {
    if (isMissing(error)) {
      return []
    }

    throw error
  }
}

/**
 * Directory tree owned by one build.
 *
 * - **work/{recipe}/**: scratch directory, the cwd of a recipe's commands.
 *   Kept between runs so incremental rebuilds can reuse it.
 * - **staging/{recipe}/**: output being written by a running recipe
 * - **output/{recipe}/**: committed outputs read by dependents and packages
 * - **logs/{recipe}/**: stdout.log and stderr.log of the last execution
 * - **packages/**: package manifests
 * - **state.json**: fingerprints of committed outputs
 *
 * ## Output Lifecycle
 *
 * 1. `prepareStaging()` empties `staging/{recipe}/`
 * 2. Commands write to it through `%(output)s`
 * 3. Success: `commitOutput()` replaces `output/{recipe}/` by rename
 *    OR Failure: `discardStaging()` deletes it, leaving the previous output intact
 *
 * The staging path of a recipe is stable across runs, so paths recorded by
 * incremental tools in the work directory stay valid.
 *
 * @example
 * ```typescript
 * const ws = await Workspace.create('/tmp/workdir', 'toolchain')
 * const staging = await ws.prepareStaging('libcxx')
 * // ... commands write to staging ...
 * await ws.commitOutput('libcxx')
 * ```
 */
export class Workspace {
  /**
   * Creates a workspace (or reopens an existing one) with its directory layout.
   */
  static async create(workdirRoot: string, id: string): Promise<Workspace> {
    Workspace.validateName(id, 'workspace ID')
    const root = join(workdirRoot, id)
    for (const dir of ['work', 'staging', 'output', 'logs', 'packages']) {
      await mkdir(join(root, dir), {recursive: true})
    }

    return new Workspace(id, root)
  }

  /**
   * Opens an existing workspace.
   * @throws WorkspaceError if the workspace does not exist
   */
  static async open(workdirRoot: string, id: string): Promise<Workspace> {
    Workspace.validateName(id, 'workspace ID')
    const root = join(workdirRoot, id)
    if (!await exists(root)) {
      throw new WorkspaceError('WORKSPACE_NOT_FOUND', `No workspace '${id}' in ${workdirRoot}`)
    }

    return new Workspace(id, root)
  }

  /** Sorted workspace IDs under a workdir root; dot-directories are skipped. */
  static async list(workdirRoot: string): Promise<string[]> {
    const names = await listDirectories(workdirRoot)
    return names.filter(name => !name.startsWith('.'))
  }

  static async remove(workdirRoot: string, id: string): Promise<void> {
    Workspace.validateName(id, 'workspace ID')
    await rm(join(workdirRoot, id), {recursive: true, force: true})
  }

  /**
   * Recipe names and workspace IDs become directory names.
   * @throws WorkspaceError on separators or traversal
   */
  static validateName(name: string, what = 'recipe name'): void {
    if (!/^[\w.-]+$/.test(name) || name === '.' || name.includes('..')) {
      throw new WorkspaceError('INVALID_NAME', `Invalid ${what}: ${name}. Must contain only alphanumeric characters, dots, dashes, and underscores.`)
    }
  }

  private constructor(
    readonly id: string,
    readonly root: string
  ) {}

  workPath(recipe: string): string {
    Workspace.validateName(recipe)
    return join(this.root, 'work', recipe)
  }

  stagingPath(recipe: string): string {
    Workspace.validateName(recipe)
    return join(this.root, 'staging', recipe)
  }

  outputPath(recipe: string): string {
    Workspace.validateName(recipe)
    return join(this.root, 'output', recipe)
  }

  logsPath(recipe: string): string {
    Workspace.validateName(recipe)
    return join(this.root, 'logs', recipe)
  }

  /**
   * Output location of a source recipe: an absolute `outputDirname` is used
   * as is, a relative one lands under `output/`.
   */
  sourcePath(recipe: string, outputDirname?: string): string {
    if (outputDirname === undefined) {
      return this.outputPath(recipe)
    }

    if (isAbsolute(outputDirname)) {
      return outputDirname
    }

    Workspace.validateName(outputDirname, 'output directory name')
    return join(this.root, 'output', outputDirname)
  }

  packageManifestPath(name: string, target?: string): string {
    Workspace.validateName(name, 'package name')
    if (target === undefined) {
      return join(this.root, 'packages', `${name}.json`)
    }

    Workspace.validateName(target, 'package target')
    return join(this.root, 'packages', target, `${name}.json`)
  }

  /**
   * Creates the work directory of a recipe.
   * @param clobber - Wipe it first, dropping any incremental state
   */
  async prepareWork(recipe: string, clobber = false): Promise<string> {
    const path = this.workPath(recipe)
    if (clobber) {
      await rm(path, {recursive: true, force: true})
    }

    await mkdir(path, {recursive: true})
    return path
  }

  /**
   * Empties the staging directory of a recipe.
   * @returns Absolute path to the staging directory
   */
  async prepareStaging(recipe: string): Promise<string> {
    const path = this.stagingPath(recipe)
    try {
      await rm(path, {recursive: true, force: true})
      await mkdir(path, {recursive: true})
      return path
    } catch (error) {
      throw new StagingError(`Failed to prepare staging for ${recipe}`, {cause: error})
    }
  }

  /** Replaces the committed output of a recipe with its staging directory. */
  async commitOutput(recipe: string): Promise<string> {
    const target = this.outputPath(recipe)
    try {
      await rm(target, {recursive: true, force: true})
      await rename(this.stagingPath(recipe), target)
      return target
    } catch (error) {
      throw new StagingError(`Failed to commit output of ${recipe}`, {cause: error})
    }
  }

  async discardStaging(recipe: string): Promise<void> {
    try {
      await rm(this.stagingPath(recipe), {recursive: true, force: true})
    } catch (error) {
      throw new StagingError(`Failed to discard staging of ${recipe}`, {cause: error})
    }
  }

  /**
   * Removes all staging directories.
   * Called before a build to drop leftovers of an interrupted one.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    for (const name of await listDirectories(stagingDir)) {
      await rm(join(stagingDir, name), {recursive: true, force: true})
    }
  }

  async hasOutput(recipe: string): Promise<boolean> {
    return exists(this.outputPath(recipe))
  }

  /** Recipe names with a committed output directory. */
  async listOutputs(): Promise<string[]> {
    return listDirectories(join(this.root, 'output'))
  }

  /**
   * Removes committed outputs and work directories not in the given set.
   * @returns Number of recipes removed
   */
  async prune(keep: Set<string>): Promise<number> {
    let removed = 0
    for (const name of await this.listOutputs()) {
      if (!keep.has(name)) {
        await rm(join(this.root, 'output', name), {recursive: true, force: true})
        await rm(join(this.root, 'work', name), {recursive: true, force: true})
        removed++
      }
    }

    return removed
  }

  /** Removes the output, work directory and logs of one recipe. */
  async removeRecipe(recipe: string): Promise<void> {
    for (const path of [this.outputPath(recipe), this.workPath(recipe), this.logsPath(recipe)]) {
      await rm(path, {recursive: true, force: true})
    }
  }

  /**
   * True when the previous successful run of a recipe left its work
   * directory for the same fingerprint.
   */
  async isIncremental(recipe: string, fingerprint: string): Promise<boolean> {
    try {
      return (await readFile(join(this.workPath(recipe), incrementalMarker), 'utf8')).trim() === fingerprint
    } catch (error) {
      if (isMissing(error)) {
        return false
      }

      throw error
    }
  }

  async markIncremental(recipe: string, fingerprint: string): Promise<void> {
    await writeFile(join(this.workPath(recipe), incrementalMarker), fingerprint + '\n', 'utf8')
  }

  async clearIncremental(recipe: string): Promise<void> {
    await rm(join(this.workPath(recipe), incrementalMarker), {force: true})
  }
}
