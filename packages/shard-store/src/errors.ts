/**
 * @shardwatch/shard-store — I/O errors
 *
 * Transient by definition: the enforcer logs them, skips the shard for the
 * current sub-check and carries on.
 */

export class ShardStoreError extends Error {
  constructor(
    message: string,
    readonly shard_id: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ShardStoreError'
  }
}

/** The shard id does not resolve to existing content. */
export class ShardNotFoundError extends ShardStoreError {
  constructor(shard_id: string, options?: { cause?: unknown }) {
    super(`Shard not found: ${shard_id}`, shard_id, options)
    this.name = 'ShardNotFoundError'
  }
}

/** The shard could not be overwritten. Remediation is best-effort. */
export class ShardWriteError extends ShardStoreError {
  constructor(shard_id: string, options?: { cause?: unknown }) {
    super(`Failed to write shard: ${shard_id}`, shard_id, options)
    this.name = 'ShardWriteError'
  }
}

export class ShardReadError extends ShardStoreError {
  constructor(shard_id: string, options?: { cause?: unknown }) {
    super(`Failed to read shard: ${shard_id}`, shard_id, options)
    this.name = 'ShardReadError'
  }
}
