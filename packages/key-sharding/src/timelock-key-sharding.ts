/**
 * @shardwatch/key-sharding — Time-lock Key Sharding
 *
 * Produces the shards the enforcer watches. A key is split with Shamir
 * secret sharing over GF(256): any `threshold` shards recombine it, fewer
 * reveal nothing about it.
 *
 * Shard blob layout:
 *
 *   [ x : 1 ][ y : frame length ][ commitment : 32 ]
 *
 * The frame is [ key length : 2, big-endian ][ key ][ random padding ],
 * padded up to `share_bytes` so shards can be made long enough to clear the
 * entropy screen. The commitment is SHA-256 applied 2^difficulty times to
 * the frame; every shard carries it, and reconstruction must reproduce it.
 * Checking a candidate key therefore costs 2^difficulty sequential hashes.
 */

import { createHash, randomBytes } from 'crypto'
import { z } from 'zod'
import {
  BIT_BALANCE_TOLERANCE,
  setBitFraction,
  shannonEntropy,
} from '@shardwatch/entropy'
import { gfEval, gfInterpolateAtZero } from './gf256'
import {
  InsufficientShardsError,
  KeyShardingError,
  KeyVerificationError,
  ShardFormatError,
} from './errors'

export const COMMITMENT_BYTES = 32
export const MAX_SHARDS = 255
const FRAME_HEADER_BYTES = 2
const MAX_KEY_BYTES = 0xffff

export const keyShardingOptionsSchema = z.object({
  difficulty:        z.number().int().min(0).max(24).default(10),
  threshold:         z.number().int().min(2).max(MAX_SHARDS).default(3),
  share_bytes:       z.number().int().min(0).max(FRAME_HEADER_BYTES + MAX_KEY_BYTES).default(0),
  // Floor applied by checkShardEntropy(), bits/byte
  entropy_threshold: z.number().min(0).max(8).default(7.2),
})

export type KeyShardingOptionsInput = z.input<typeof keyShardingOptionsSchema>
export type KeyShardingOptions = Readonly<z.output<typeof keyShardingOptionsSchema>>

export interface KeyShardingDeps {
  random?: (size: number) => Uint8Array
}

export class TimelockKeySharding {
  readonly options: KeyShardingOptions
  private readonly random: (size: number) => Uint8Array

  constructor(options: KeyShardingOptionsInput = {}, deps: KeyShardingDeps = {}) {
    const result = keyShardingOptionsSchema.safeParse(options)
    if (!result.success) {
      throw new KeyShardingError(
        'Invalid key sharding options: ' +
        result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
      )
    }
    this.options = Object.freeze(result.data)
    this.random = deps.random ?? randomBytes
  }

  // ─── Split ──────────────────────────────────────────────────────────────────

  shard(key: Uint8Array | string, count: number): Uint8Array[] {
    const { threshold } = this.options
    if (!Number.isInteger(count) || count < threshold || count > MAX_SHARDS) {
      throw new KeyShardingError(`Shard count must be an integer in [${threshold}, ${MAX_SHARDS}], got ${count}`)
    }

    const frame = this.frame(toBytes(key))
    const commitment = this.commit(frame)
    const ys = Array.from({ length: count }, () => new Uint8Array(frame.length))

    // One polynomial per frame byte: constant term is the byte, the rest random
    const noise = this.random(frame.length * (threshold - 1))
    const coefficients = new Uint8Array(threshold)
    for (let k = 0; k < frame.length; k++) {
      coefficients[0] = frame[k]
      coefficients.set(noise.subarray(k * (threshold - 1), (k + 1) * (threshold - 1)), 1)
      for (let i = 0; i < count; i++) ys[i][k] = gfEval(coefficients, i + 1)
    }

    return ys.map((y, i) => {
      const blob = new Uint8Array(1 + y.length + COMMITMENT_BYTES)
      blob[0] = i + 1
      blob.set(y, 1)
      blob.set(commitment, 1 + y.length)
      return blob
    })
  }

  /** Split a UTF-8 key into hex-encoded shards. */
  shardKey(key: string, count: number): string[] {
    return this.shard(key, count).map(blob => Buffer.from(blob).toString('hex'))
  }

  // ─── Recombine ──────────────────────────────────────────────────────────────

  reconstruct(shards: readonly Uint8Array[]): Uint8Array {
    const { threshold } = this.options
    if (shards.length < threshold) throw new InsufficientShardsError(threshold, shards.length)

    const first = shards[0]
    if (first.length < 1 + FRAME_HEADER_BYTES + COMMITMENT_BYTES) {
      throw new ShardFormatError(`Shard is too short (${first.length} bytes)`)
    }
    const frameLength = first.length - 1 - COMMITMENT_BYTES
    const commitment = first.subarray(1 + frameLength)

    // Repeated x values add nothing to the interpolation
    const byX = new Map<number, Uint8Array>()
    for (const blob of shards) {
      if (blob.length !== first.length) throw new ShardFormatError('Shards differ in length')
      if (blob[0] === 0) throw new ShardFormatError('Shard index 0 is reserved for the key')
      if (!Buffer.from(blob.subarray(1 + frameLength)).equals(Buffer.from(commitment))) {
        throw new ShardFormatError('Shards come from different splits')
      }
      if (!byX.has(blob[0])) byX.set(blob[0], blob.subarray(1, 1 + frameLength))
    }
    if (byX.size < threshold) throw new InsufficientShardsError(threshold, byX.size)

    const points = [...byX].slice(0, threshold)
    const xs = points.map(([x]) => x)
    const frame = new Uint8Array(frameLength)
    for (let k = 0; k < frameLength; k++) {
      frame[k] = gfInterpolateAtZero(xs, points.map(([, y]) => y[k]))
    }

    if (!Buffer.from(this.commit(frame)).equals(Buffer.from(commitment))) throw new KeyVerificationError()

    const keyLength = (frame[0] << 8) | frame[1]
    if (FRAME_HEADER_BYTES + keyLength > frame.length) throw new ShardFormatError('Key length exceeds shard size')
    return frame.slice(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + keyLength)
  }

  /** Recombine hex-encoded shards into the UTF-8 key. */
  reconstructKey(shards: readonly string[]): string {
    const key = this.reconstruct(shards.map(fromHex))
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(key)
    } catch (err) {
      throw new KeyShardingError('Reconstructed key is not valid UTF-8', { cause: err })
    }
  }

  // ─── Screening ──────────────────────────────────────────────────────────────

  /**
   * The enforcer's screen applied ahead of time: false if any shard is
   * undecodable, below the entropy floor, or bit-balanced.
   */
  checkShardEntropy(shards: ReadonlyArray<Uint8Array | string>): boolean {
    for (const shard of shards) {
      let bytes: Uint8Array
      try {
        bytes = typeof shard === 'string' ? fromHex(shard) : shard
      } catch (err) {
        if (err instanceof ShardFormatError) return false
        throw err
      }
      if (shannonEntropy(bytes) < this.options.entropy_threshold) return false
      if (Math.abs(setBitFraction(bytes) - 0.5) < BIT_BALANCE_TOLERANCE) return false
    }
    return true
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private frame(key: Uint8Array): Uint8Array {
    if (key.length > MAX_KEY_BYTES) throw new KeyShardingError(`Key exceeds ${MAX_KEY_BYTES} bytes`)

    const used = FRAME_HEADER_BYTES + key.length
    const frame = new Uint8Array(Math.max(used, this.options.share_bytes))
    frame[0] = key.length >> 8
    frame[1] = key.length & 0xff
    frame.set(key, FRAME_HEADER_BYTES)
    if (frame.length > used) frame.set(this.random(frame.length - used), used)
    return frame
  }

  private commit(frame: Uint8Array): Uint8Array {
    const rounds = 2 ** this.options.difficulty
    let digest = createHash('sha256').update(frame).digest()
    for (let i = 1; i < rounds; i++) digest = createHash('sha256').update(digest).digest()
    return digest
  }
}

function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === 'string' ? new TextEncoder().encode(input) : input
}

function fromHex(hex: string): Uint8Array {
  if (!/^(?:[0-9a-f]{2})+$/i.test(hex)) throw new ShardFormatError('Shard is not valid hex')
  return Uint8Array.from(Buffer.from(hex, 'hex'))
}
