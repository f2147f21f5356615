/**
 * @shardwatch/shard-store — File Shard Store
 *
 * Shards are files. An id is a path, resolved against `root_dir` when one
 * is given (absolute ids are used as-is).
 *
 * Overwrite truncates and writes in place — one pass, no backup, no
 * secure-erase guarantees beyond that.
 */

import { readFile, writeFile } from 'fs/promises'
import { isAbsolute, resolve } from 'path'
import { ShardNotFoundError, ShardReadError, ShardWriteError } from './errors'
import type { ShardStore } from './types'

export class FileShardStore implements ShardStore {
  constructor(private readonly root_dir?: string) {}

  resolvePath(shard_id: string): string {
    if (isAbsolute(shard_id) || !this.root_dir) return resolve(shard_id)
    return resolve(this.root_dir, shard_id)
  }

  async readAll(shard_id: string): Promise<Uint8Array> {
    try {
      const buf = await readFile(this.resolvePath(shard_id))
      return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength)
    } catch (err) {
      if (isMissing(err)) throw new ShardNotFoundError(shard_id, { cause: err })
      throw new ShardReadError(shard_id, { cause: err })
    }
  }

  async overwrite(shard_id: string, content: Uint8Array): Promise<void> {
    try {
      await writeFile(this.resolvePath(shard_id), content)
    } catch (err) {
      throw new ShardWriteError(shard_id, { cause: err })
    }
  }
}

function isMissing(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false
  return err.code === 'ENOENT' || err.code === 'ENOTDIR' || err.code === 'EISDIR'
}
