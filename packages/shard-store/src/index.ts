/**
 * @shardwatch/shard-store — Public API
 */

export type { ShardStore } from './types'
export {
  ShardStoreError,
  ShardNotFoundError,
  ShardReadError,
  ShardWriteError,
} from './errors'
export { FileShardStore } from './file-shard-store'
export { MemoryShardStore } from './memory-shard-store'
export type { ShardWrite } from './memory-shard-store'
