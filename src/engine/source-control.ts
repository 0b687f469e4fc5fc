import type {SyncRequest, SyncResult} from './types.js'

/**
 * Brings a working copy to a pinned revision.
 *
 * Implementations:
 * - `GitCliSourceControl`: drives the `git` executable
 *
 * Syncing is idempotent: a working copy already at the requested revision
 * is left as is, local modifications included unless `clean` is set.
 */
export abstract class SourceControl {
  /**
   * @throws SyncError when no URL can provide the revision
   */
  abstract sync(request: SyncRequest): Promise<SyncResult>
}
