import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import { DecoySink, DECOY_MARKERS, generateTrap, firstPrimes } from '../index'

const payload = new TextEncoder().encode('shard payload for the decoy sink '.repeat(8))

describe('generateTrap', () => {
  it('draws primes from 2 upwards', () => {
    assert.deepEqual(firstPrimes(10), [2, 3, 5, 7, 11, 13, 17, 19, 23, 29])
  })

  it('xors primes with the low seed byte at level 1', () => {
    assert.deepEqual([...generateTrap(1, 0, 40)], [2, 3, 5, 7, 11, 13, 17, 19, 23, 29])
    assert.deepEqual([...generateTrap(1, 0x101, 8)], [3, 2])
  })

  it('mixes primes at level 2', () => {
    assert.deepEqual([...generateTrap(2, 12345, 16)], [3, 4, 7, 10])
  })

  it('fills the full size at levels 3 and 4', () => {
    assert.equal(generateTrap(3, 77, 40).length, 40)
    assert.equal(generateTrap(4, 77, 40).length, 40)
  })

  it('steps a 32-bit LCG at level 4', () => {
    // 1013904223 = 0x3c6ef35f
    assert.equal(generateTrap(4, 0, 1)[0], 0x5f)
  })

  it('packs big-endian float32 at level 5', () => {
    const out = generateTrap(5, 0, 41)
    assert.equal(out.length, 40)
    assert.deepEqual([...out.subarray(0, 4)], [0x40, 0x00, 0x00, 0x00])
  })
})

describe('DecoySink', () => {
  it('clamps its options', () => {
    const high = new DecoySink({ poison_ratio: 3, complexity_level: 9 })
    assert.equal(high.poison_ratio, 1)
    assert.equal(high.complexity_level, 5)
    const low = new DecoySink({ poison_ratio: -1, complexity_level: 0 })
    assert.equal(low.poison_ratio, 0)
    assert.equal(low.complexity_level, 1)
    const defaults = new DecoySink()
    assert.equal(defaults.poison_ratio, 0.1)
    assert.equal(defaults.complexity_level, 3)
  })

  it('is deterministic', () => {
    const sink = new DecoySink()
    assert.deepEqual(sink.poison(payload), sink.poison(payload))
  })

  it('places the marker where the plan says', () => {
    for (let level = 1; level <= 5; level++) {
      const sink = new DecoySink({ complexity_level: level, poison_ratio: 0.25 })
      const plan = sink.plan(payload)
      const out = sink.poison(payload)
      assert.equal(out.length, payload.length + plan.marker.length + plan.decoy.length)
      assert.deepEqual(out.subarray(plan.offset, plan.offset + plan.marker.length), plan.marker)
      assert.ok(DECOY_MARKERS.includes(plan.marker))
    }
  })

  it('adds only the marker when the ratio is zero', () => {
    const sink = new DecoySink({ poison_ratio: 0 })
    assert.equal(sink.poison(payload).length, payload.length + 5)
  })

  it('detects poisoned payloads', () => {
    const sink = new DecoySink()
    assert.equal(sink.isPoisoned(payload), false)
    assert.equal(sink.isPoisoned(sink.poison(payload)), true)
    assert.equal(sink.isPoisoned(Uint8Array.of(9, 0xca, 0xfe, 0xba, 0xbe, 0x01, 9)), true)
    assert.equal(sink.isPoisoned(Uint8Array.of(0xca, 0xfe, 0xba, 0xbe)), false)
  })

  it('treats strings as their UTF-8 bytes', () => {
    const sink = new DecoySink()
    assert.deepEqual(sink.poison('plain text'), sink.poison(new TextEncoder().encode('plain text')))
    assert.equal(sink.isPoisoned('plain text'), false)
  })

  it('poisons an empty payload with the marker alone', () => {
    const out = new DecoySink().poison(new Uint8Array(0))
    assert.equal(out.length, 5)
    assert.ok(DECOY_MARKERS.some(m => Buffer.from(out).equals(Buffer.from(m))))
  })
})
