import {resolve} from 'node:path'
import {SyncError, ValidationError} from '../../errors.js'
import {substitute, substituteAll} from '../../core/template.js'
import type {MirrorRewrite} from '../../types.js'
import {Command, type CommandContext, type CommandDescription} from '../command.js'

export type SyncGitOptions = {
  url: string;
  revision: string;
  /** Checkout directory, defaults to `%(output)s` */
  destination?: string;
  /** Discard local modifications before checking out */
  clean?: boolean;
  /** Alternate URLs tried in order */
  mirrors?: string[];
}

/** Rewrites a URL using a known mirror prefix to its canonical form. */
export function canonicalUrl(url: string, knownMirrors: readonly MirrorRewrite[]): string {
  for (const {mirror, canonical} of knownMirrors) {
    if (url.startsWith(mirror)) {
      return canonical + url.slice(mirror.length)
    }
  }

  return url
}

/** Converges a git working copy to a pinned revision. */
export class SyncGitCommand extends Command {
  readonly kind = 'syncGit'

  constructor(readonly options: SyncGitOptions) {
    super()
  }

  validate(): void {
    if (this.options.url.trim() === '') {
      throw new ValidationError('syncGit command needs a url')
    }

    if (this.options.revision.trim() === '') {
      throw new ValidationError(`syncGit of ${this.options.url} needs a revision`)
    }
  }

  async apply(context: CommandContext): Promise<void> {
    const {scope, config} = context
    const url = canonicalUrl(substitute(this.options.url, scope), config.knownMirrors)
    const request = {
      url,
      destination: resolve(context.cwd, substitute(this.options.destination ?? '%(abs_output)s', scope)),
      revision: substitute(this.options.revision, scope),
      clean: this.options.clean ?? false,
      mirrors: substituteAll(this.options.mirrors ?? [], scope)
    }

    try {
      const {revision} = await context.sourceControl.sync(request)
      context.recordRevision(url, revision)
    } catch (error) {
      if (error instanceof SyncError) {
        throw error
      }

      throw new SyncError(url, `Failed to sync ${url}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }
  }

  describe(): CommandDescription {
    const {url, revision, destination, clean, mirrors} = this.options
    const description: CommandDescription = {kind: this.kind, url, revision, clean: clean ?? false, mirrors: mirrors ?? []}
    if (destination !== undefined) {
      description.destination = destination
    }

    return description
  }

  toString(): string {
    return `sync ${this.options.url}@${this.options.revision}`
  }
}
