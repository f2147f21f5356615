import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { createHash } from 'crypto'

import {
  gfDiv,
  gfMul,
  gfEval,
  InsufficientShardsError,
  KeyShardingError,
  KeyVerificationError,
  ShardFormatError,
  TimelockKeySharding,
} from '../index'

const zeros = (size: number) => new Uint8Array(size)

const popcount = (byte: number) => {
  let n = 0
  for (let b = byte; b; b >>= 1) n += b & 1
  return n
}

describe('GF(256)', () => {
  it('multiplies in the AES field', () => {
    assert.equal(gfMul(0x57, 0x83), 0xc1)
    assert.equal(gfMul(0x53, 0xca), 0x01)
    assert.equal(gfMul(0, 0x83), 0)
  })

  it('divides as the inverse of multiplication', () => {
    assert.equal(gfDiv(0xc1, 0x83), 0x57)
    assert.equal(gfDiv(0, 7), 0)
    assert.throws(() => gfDiv(7, 0), RangeError)
  })

  it('evaluates polynomials constant term first', () => {
    assert.equal(gfEval(Uint8Array.of(5, 0, 0), 9), 5)
    // 1 + x at x = 2 → 1 XOR 2
    assert.equal(gfEval(Uint8Array.of(1, 1), 2), 3)
  })
})

describe('TimelockKeySharding.shard', () => {
  it('lays out index, share and commitment', () => {
    const sharding = new TimelockKeySharding({ threshold: 2, difficulty: 0 }, { random: zeros })
    const frame = Uint8Array.of(0, 3, 0x6b, 0x65, 0x79)
    const commitment = createHash('sha256').update(frame).digest()

    const shards = sharding.shard('key', 3)

    assert.equal(shards.length, 3)
    shards.forEach((blob, i) => {
      assert.equal(blob[0], i + 1)
      // Zero coefficients make every share equal to the frame itself
      assert.deepEqual(blob.subarray(1, 6), frame)
      assert.deepEqual(Buffer.from(blob.subarray(6)), commitment)
    })
  })

  it('pads shares up to share_bytes', () => {
    const sharding = new TimelockKeySharding({ share_bytes: 1024, difficulty: 2 })
    const shards = sharding.shard('k', 4)
    assert.ok(shards.every(blob => blob.length === 1 + 1024 + 32))
    assert.equal(new TextDecoder().decode(sharding.reconstruct(shards.slice(1))), 'k')
  })

  it('rejects counts below the threshold or above 255', () => {
    const sharding = new TimelockKeySharding({ threshold: 3 })
    assert.throws(() => sharding.shard('key', 2), KeyShardingError)
    assert.throws(() => sharding.shard('key', 256), KeyShardingError)
  })

  it('validates its options', () => {
    assert.throws(() => new TimelockKeySharding({ threshold: 1 }), /threshold/)
    assert.throws(() => new TimelockKeySharding({ difficulty: 30 }), /difficulty/)
  })
})

describe('TimelockKeySharding.reconstruct', () => {
  const sharding = new TimelockKeySharding({ threshold: 3, difficulty: 4 })

  it('recovers the key from any threshold-sized subset', () => {
    const shards = sharding.shardKey('test-secret', 5)
    for (const picks of [[0, 1, 2], [0, 2, 4], [1, 3, 4], [4, 3, 2]]) {
      assert.equal(sharding.reconstructKey(picks.map(i => shards[i])), 'test-secret')
    }
  })

  it('needs at least threshold distinct shards', () => {
    const shards = sharding.shard('test-secret', 5)
    assert.throws(() => sharding.reconstruct(shards.slice(0, 2)), (err: unknown) => {
      assert.ok(err instanceof InsufficientShardsError)
      assert.equal(err.needed, 3)
      assert.equal(err.provided, 2)
      return true
    })
    assert.throws(
      () => sharding.reconstruct([shards[0], shards[0], shards[1]]),
      (err: unknown) => err instanceof InsufficientShardsError && err.provided === 2
    )
  })

  it('detects a corrupted share through the commitment', () => {
    const shards = sharding.shard('test-secret', 3)
    const corrupted = shards[0].slice()
    corrupted[2] ^= 0xff
    assert.throws(() => sharding.reconstruct([corrupted, shards[1], shards[2]]), KeyVerificationError)
  })

  it('refuses to mix shards from different splits', () => {
    const a = sharding.shard('test-secret', 3)
    const b = sharding.shard('test-secreT', 3)
    assert.throws(() => sharding.reconstruct([a[0], a[1], b[2]]), /different splits/)
  })

  it('fails verification when recombined under the wrong threshold', () => {
    const shards = sharding.shard('test-secret', 3)
    const lax = new TimelockKeySharding({ threshold: 2, difficulty: 4 })
    assert.throws(() => lax.reconstruct(shards.slice(0, 2)), KeyVerificationError)
  })

  it('rejects malformed hex and non-UTF-8 keys', () => {
    assert.throws(() => sharding.reconstructKey(['zz', 'zz', 'zz']), ShardFormatError)
    const binary = sharding.shard(Uint8Array.of(0xff, 0xfe), 3).map(b => Buffer.from(b).toString('hex'))
    assert.throws(() => sharding.reconstructKey(binary), /not valid UTF-8/)
  })
})

describe('TimelockKeySharding.checkShardEntropy', () => {
  const sharding = new TimelockKeySharding()

  it('fails short shards on entropy', () => {
    const shards = new TimelockKeySharding({ difficulty: 0 }, { random: zeros }).shard('key', 3)
    assert.equal(sharding.checkShardEntropy(shards), false)
  })

  it('fails high-entropy shards whose bits are balanced', () => {
    const everyByte = Uint8Array.from({ length: 256 }, (_, i) => i)
    assert.equal(sharding.checkShardEntropy([everyByte]), false)
  })

  it('passes high-entropy shards with skewed bits, raw or hex', () => {
    // 163 distinct values (log2 ≈ 7.35 bits/byte), set-bit fraction ≈ 0.61
    const heavy = Uint8Array.from(Array.from({ length: 256 }, (_, i) => i).filter(b => popcount(b) >= 4))
    assert.equal(heavy.length, 163)
    assert.equal(sharding.checkShardEntropy([heavy]), true)
    assert.equal(sharding.checkShardEntropy([Buffer.from(heavy).toString('hex')]), true)
  })

  it('fails undecodable hex', () => {
    assert.equal(sharding.checkShardEntropy(['not-hex']), false)
  })
})
