import {access, mkdir, rm} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {execa, ExecaError} from 'execa'
import {SyncError} from '../errors.js'
import {SourceControl} from './source-control.js'
import type {SyncRequest, SyncResult} from './types.js'

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof ExecaError) {
    return error.stderr ? String(error.stderr).trim() : error.shortMessage
  }

  return error instanceof Error ? error.message : String(error)
}

export class GitCliSourceControl extends SourceControl {
  constructor(private readonly gitBinary = 'git') {
    super()
  }

  async sync(request: SyncRequest): Promise<SyncResult> {
    const {url, destination, revision, clean, mirrors} = request
    const candidates = [url, ...mirrors]

    const cloned = !await exists(join(destination, '.git'))
    if (cloned) {
      await this.clone(candidates, destination)
    }

    await this.git(destination, url, ['remote', 'set-url', 'origin', url])

    if (clean) {
      await this.git(destination, url, ['reset', '--hard', '--quiet'])
      await this.git(destination, url, ['clean', '-fdxq'])
    }

    let commit = await this.resolve(destination, revision)
    if (!commit) {
      await this.fetch(candidates, destination)
      commit = await this.resolve(destination, revision)
    }

    if (!commit) {
      throw new SyncError(url, `Revision ${revision} not found in ${url}`)
    }

    // A fresh clone has no files checked out yet
    if (cloned || await this.resolve(destination, 'HEAD') !== commit) {
      await this.git(destination, url, ['-c', 'advice.detachedHead=false', 'checkout', '--quiet', '--detach', commit])
    }

    return {revision: commit}
  }

  private async clone(candidates: string[], destination: string): Promise<void> {
    await mkdir(dirname(destination), {recursive: true})
    const failures: string[] = []
    for (const candidate of candidates) {
      try {
        await execa(this.gitBinary, ['clone', '--quiet', '--no-checkout', candidate, destination])
        return
      } catch (error) {
        failures.push(`${candidate}: ${describeFailure(error)}`)
        await rm(destination, {recursive: true, force: true})
      }
    }

    throw new SyncError(candidates[0], `Failed to clone ${candidates[0]}\n${failures.join('\n')}`)
  }

  private async fetch(candidates: string[], destination: string): Promise<void> {
    const failures: string[] = []
    for (const candidate of candidates) {
      try {
        await execa(this.gitBinary, ['fetch', '--quiet', '--tags', candidate, '+refs/heads/*:refs/remotes/origin/*'], {cwd: destination})
        return
      } catch (error) {
        failures.push(`${candidate}: ${describeFailure(error)}`)
      }
    }

    throw new SyncError(candidates[0], `Failed to fetch ${candidates[0]}\n${failures.join('\n')}`)
  }

  /** Commit hash of a revision, trying remote branches for branch names. */
  private async resolve(destination: string, revision: string): Promise<string | undefined> {
    for (const candidate of [revision, `origin/${revision}`]) {
      const result = await execa(this.gitBinary, ['rev-parse', '--verify', '--quiet', `${candidate}^{commit}`], {cwd: destination, reject: false})
      if (result.exitCode === 0) {
        return result.stdout.trim()
      }
    }

    return undefined
  }

  private async git(cwd: string, url: string, args: string[]): Promise<void> {
    try {
      await execa(this.gitBinary, args, {cwd})
    } catch (error) {
      throw new SyncError(url, `git ${args.join(' ')} failed in ${cwd}: ${describeFailure(error)}`, {cause: error})
    }
  }
}
