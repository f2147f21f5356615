/**
 * @shardwatch/shard-store — Store Interface
 *
 * Read/overwrite access to a fixed set of named shard locations.
 * Content is opaque bytes; there is no version history, so an overwrite
 * is final.
 */

export interface ShardStore {
  /** Rejects with ShardNotFoundError when the id does not resolve. */
  readAll(shard_id: string): Promise<Uint8Array>

  /** Replaces the full content. Rejects with ShardWriteError on failure. */
  overwrite(shard_id: string, content: Uint8Array): Promise<void>
}
