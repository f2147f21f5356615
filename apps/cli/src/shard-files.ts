/**
 * Shard Files
 *
 * One raw blob per file, named shard-<index>.bin, so the directory can be
 * handed straight to `shardwatch monitor`.
 */

import { mkdir, readFile, writeFile } from 'fs/promises'
import { join } from 'path'

export async function writeShardFiles(dir: string, shards: readonly Uint8Array[]): Promise<string[]> {
  await mkdir(dir, { recursive: true })
  const paths: string[] = []
  for (const blob of shards) {
    const path = join(dir, `shard-${blob[0]}.bin`)
    // wx: never clobber an existing shard
    await writeFile(path, blob, { flag: 'wx', mode: 0o600 })
    paths.push(path)
  }
  return paths
}

export async function readShardFiles(paths: readonly string[]): Promise<Uint8Array[]> {
  return Promise.all(paths.map(async (path) => new Uint8Array(await readFile(path))))
}
