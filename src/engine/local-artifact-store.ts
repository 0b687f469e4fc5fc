import {Buffer} from 'node:buffer'
import {createHash, randomUUID} from 'node:crypto'
import {mkdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {Readable} from 'node:stream'
import {buffer as streamToBuffer} from 'node:stream/consumers'
import {pipeline} from 'node:stream/promises'
import * as tar from 'tar'
import {CacheStoreError, DigestMismatchError} from '../errors.js'
import {ArtifactStore, type StoredArtifact} from './artifact-store.js'

type EntryManifest = {
  fingerprint: string;
  digest: string;
  size: number;
  createdAt: string;
}

function isEntryManifest(value: unknown): value is EntryManifest {
  return typeof value === 'object' && value !== null
    && 'fingerprint' in value && typeof value.fingerprint === 'string'
    && 'digest' in value && typeof value.digest === 'string'
    && 'size' in value && typeof value.size === 'number'
    && 'createdAt' in value && typeof value.createdAt === 'string'
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function sha256(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Artifact store on the local filesystem.
 *
 * Layout: `{root}/{fp[0..2]}/{fp}.tar.gz` next to `{fp}.json`, which records
 * the archive digest. The JSON file is written last, so an entry exists once
 * its manifest does.
 */
export class LocalArtifactStore extends ArtifactStore {
  /** Last pending write per fingerprint; later writes chain onto it. */
  private readonly writes = new Map<string, Promise<void>>()

  constructor(readonly root: string) {
    super()
  }

  async has(fingerprint: string): Promise<boolean> {
    return (await this.readManifest(fingerprint)) !== undefined
  }

  async get(fingerprint: string): Promise<StoredArtifact | undefined> {
    const manifest = await this.readManifest(fingerprint)
    if (!manifest) {
      return undefined
    }

    let archive: Buffer
    try {
      archive = await readFile(this.archivePath(fingerprint))
    } catch (error) {
      throw new CacheStoreError('CACHE_ENTRY_UNREADABLE', `Cache entry ${fingerprint} has no readable archive`, {cause: error})
    }

    const actual = sha256(archive)
    if (actual !== manifest.digest) {
      throw new DigestMismatchError(fingerprint, manifest.digest, actual)
    }

    return {
      fingerprint,
      digest: manifest.digest,
      size: manifest.size,
      async materialize(destination: string) {
        await rm(destination, {recursive: true, force: true})
        await mkdir(destination, {recursive: true})
        await pipeline(Readable.from(archive), tar.extract({cwd: destination}))
      }
    }
  }

  /**
   * Stores a directory unless an intact entry already holds the
   * fingerprint. An entry whose manifest or archive is damaged is replaced.
   */
  async put(fingerprint: string, directory: string): Promise<void> {
    LocalArtifactStore.validateFingerprint(fingerprint)
    await this.serialize(fingerprint, async () => {
      if (await this.isIntact(fingerprint)) {
        return
      }

      try {
        const stream = tar.create({cwd: directory, gzip: true, portable: true}, ['.'])
        const archive = Buffer.from(await streamToBuffer(stream))
        const manifest: EntryManifest = {
          fingerprint,
          digest: sha256(archive),
          size: archive.length,
          createdAt: new Date().toISOString()
        }

        await mkdir(this.shardPath(fingerprint), {recursive: true})
        const tmpArchive = join(this.shardPath(fingerprint), `.${randomUUID()}.tar.gz`)
        const tmpManifest = join(this.shardPath(fingerprint), `.${randomUUID()}.json`)
        await writeFile(tmpArchive, archive)
        await rename(tmpArchive, this.archivePath(fingerprint))
        await writeFile(tmpManifest, JSON.stringify(manifest, null, 2), 'utf8')
        await rename(tmpManifest, this.manifestPath(fingerprint))
      } catch (error) {
        throw new CacheStoreError('CACHE_WRITE_FAILED', `Failed to store ${fingerprint}`, {cause: error})
      }
    })
  }

  archivePath(fingerprint: string): string {
    return join(this.shardPath(fingerprint), `${fingerprint}.tar.gz`)
  }

  manifestPath(fingerprint: string): string {
    return join(this.shardPath(fingerprint), `${fingerprint}.json`)
  }

  private shardPath(fingerprint: string): string {
    LocalArtifactStore.validateFingerprint(fingerprint)
    return join(this.root, fingerprint.slice(0, 2))
  }

  /** Runs writes of one fingerprint one after another. */
  private async serialize(fingerprint: string, write: () => Promise<void>): Promise<void> {
    const previous = this.writes.get(fingerprint) ?? Promise.resolve()
    const current = previous.then(write)
    // Failures reach the caller through `current`
    const settled = current.then(() => undefined, () => undefined)
    this.writes.set(fingerprint, settled)
    try {
      await current
    } finally {
      if (this.writes.get(fingerprint) === settled) {
        this.writes.delete(fingerprint)
      }
    }
  }

  /** True when the manifest parses and the archive matches its digest. */
  private async isIntact(fingerprint: string): Promise<boolean> {
    let manifest: EntryManifest | undefined
    try {
      manifest = await this.readManifest(fingerprint)
    } catch (error) {
      if (error instanceof CacheStoreError && error.code === 'CACHE_ENTRY_CORRUPT') {
        return false
      }

      throw error
    }

    if (!manifest) {
      return false
    }

    let archive: Buffer
    try {
      archive = await readFile(this.archivePath(fingerprint))
    } catch (error) {
      if (isMissing(error)) {
        return false
      }

      throw new CacheStoreError('CACHE_STORE_UNAVAILABLE', `Cannot read cache entry ${fingerprint}`, {cause: error})
    }

    return sha256(archive) === manifest.digest
  }

  private async readManifest(fingerprint: string): Promise<EntryManifest | undefined> {
    let content: string
    try {
      content = await readFile(this.manifestPath(fingerprint), 'utf8')
    } catch (error) {
      if (isMissing(error)) {
        return undefined
      }

      throw new CacheStoreError('CACHE_STORE_UNAVAILABLE', `Cannot read cache entry ${fingerprint}`, {cause: error})
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      throw new CacheStoreError('CACHE_ENTRY_CORRUPT', `Cache entry ${fingerprint} has a malformed manifest`, {cause: error})
    }

    if (!isEntryManifest(parsed) || parsed.fingerprint !== fingerprint) {
      throw new CacheStoreError('CACHE_ENTRY_CORRUPT', `Cache entry ${fingerprint} has a malformed manifest`)
    }

    return parsed
  }

  private static validateFingerprint(fingerprint: string): void {
    if (!/^[\da-f]{64}$/.test(fingerprint)) {
      throw new CacheStoreError('INVALID_FINGERPRINT', `Invalid fingerprint: ${fingerprint}`)
    }
  }
}
