/**
 * Archived output of a build recipe, verified on retrieval.
 */
export type StoredArtifact = {
  fingerprint: string;
  /** sha256 of the archive bytes */
  digest: string;
  size: number;
  /** Replaces `destination` with the archived tree. */
  materialize(destination: string): Promise<void>;
}

/**
 * Content-addressed storage of build outputs, keyed by fingerprint.
 *
 * Implementations:
 * - `LocalArtifactStore`: gzipped tarballs in a directory
 *
 * Contract:
 * - `get` returns undefined on a miss and throws `CacheStoreError` when the
 *   store cannot be read; a stored entry whose bytes do not match its recorded
 *   digest throws `DigestMismatchError`.
 * - `put` of an existing fingerprint is a no-op; concurrent puts of the same
 *   fingerprint leave exactly one entry.
 */
export abstract class ArtifactStore {
  abstract get(fingerprint: string): Promise<StoredArtifact | undefined>
  abstract put(fingerprint: string, directory: string): Promise<void>
  abstract has(fingerprint: string): Promise<boolean>
}
