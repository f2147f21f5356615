/**
 * @shardwatch/key-sharding — Public API
 *
 *   import { TimelockKeySharding } from '@shardwatch/key-sharding'
 */

export {
  TimelockKeySharding,
  keyShardingOptionsSchema,
  COMMITMENT_BYTES,
  MAX_SHARDS,
} from './timelock-key-sharding'

export type {
  KeyShardingOptions,
  KeyShardingOptionsInput,
  KeyShardingDeps,
} from './timelock-key-sharding'

export {
  KeyShardingError,
  InsufficientShardsError,
  ShardFormatError,
  KeyVerificationError,
} from './errors'

export { gfMul, gfDiv, gfEval, gfInterpolateAtZero } from './gf256'
