/**
 * @shardwatch/shard-store — In-Memory Shard Store
 *
 * DEVELOPMENT: resets on restart — fine for tests and demos.
 * PRODUCTION: use FileShardStore (or an HSM-backed store) without changing
 *             any calling code. The interface is identical.
 *
 * Content is copied on the way in and on the way out so callers can never
 * mutate stored bytes behind the enforcer's back.
 */

import { ShardNotFoundError, ShardWriteError } from './errors'
import type { ShardStore } from './types'

export interface ShardWrite {
  shard_id: string
  length: number
  written_at: string
}

export class MemoryShardStore implements ShardStore {
  private shards = new Map<string, Uint8Array>()
  private failingWrites = new Set<string>()
  // Every successful overwrite, oldest first
  private writes: ShardWrite[] = []

  constructor(initial: Record<string, Uint8Array> = {}) {
    for (const [shard_id, content] of Object.entries(initial)) this.seed(shard_id, content)
  }

  async readAll(shard_id: string): Promise<Uint8Array> {
    const content = this.shards.get(shard_id)
    if (!content) throw new ShardNotFoundError(shard_id)
    return content.slice()
  }

  async overwrite(shard_id: string, content: Uint8Array): Promise<void> {
    if (this.failingWrites.has(shard_id)) {
      throw new ShardWriteError(shard_id, { cause: new Error('simulated write failure') })
    }
    this.shards.set(shard_id, content.slice())
    this.writes.push({ shard_id, length: content.length, written_at: new Date().toISOString() })
  }

  /** Put content in place without recording it as an overwrite. */
  seed(shard_id: string, content: Uint8Array): void {
    this.shards.set(shard_id, content.slice())
  }

  /** Make every overwrite of this shard fail until cleared. */
  failWritesFor(shard_id: string, failing = true): void {
    if (failing) this.failingWrites.add(shard_id)
    else this.failingWrites.delete(shard_id)
  }

  peek(shard_id: string): Uint8Array | undefined {
    return this.shards.get(shard_id)?.slice()
  }

  getWrites(): ShardWrite[] {
    return [...this.writes]
  }
}
