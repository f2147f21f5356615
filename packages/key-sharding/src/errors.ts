/**
 * @shardwatch/key-sharding — Errors
 */

export class KeyShardingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KeyShardingError'
  }
}

export class InsufficientShardsError extends KeyShardingError {
  constructor(readonly needed: number, readonly provided: number) {
    super(`Need at least ${needed} shards, but only ${provided} provided`)
    this.name = 'InsufficientShardsError'
  }
}

/** A shard blob that cannot belong to any split: bad hex, wrong size, mixed splits. */
export class ShardFormatError extends KeyShardingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ShardFormatError'
  }
}

/** The recombined secret does not match the time-lock commitment. */
export class KeyVerificationError extends KeyShardingError {
  constructor() {
    super('Reconstructed key does not match the shard commitment')
    this.name = 'KeyVerificationError'
  }
}
