/**
 * @shardwatch/decoy-sink — Decoy Sink
 *
 * Stateless encode/detect utility that plants a marked decoy chunk inside a
 * payload. Anything harvesting the payload wholesale picks up the decoy too;
 * anything holding the sink can tell a planted payload from a clean one.
 *
 *   poison(data)      → data with marker + decoy at a seed-chosen position
 *   isPoisoned(data)  → true when any known marker occurs in data
 *
 * The seed is the first four bytes (big-endian) of BLAKE2s-256(data), so
 * poisoning is deterministic: the same payload always yields the same bytes.
 */

import { createHash } from 'crypto'
import { generateTrap, type ComplexityLevel } from './traps'

export const DECOY_MARKERS: readonly Uint8Array[] = [
  Uint8Array.of(0x00, 0xde, 0xad, 0xfa, 0x11),
  Uint8Array.of(0xca, 0xfe, 0xba, 0xbe, 0x01),
  Uint8Array.of(0xfe, 0xed, 0xfa, 0xce, 0x02),
  Uint8Array.of(0xc0, 0xde, 0xc0, 0xde, 0x03),
  Uint8Array.of(0x10, 0xad, 0xba, 0x11, 0x04),
]

export type DecoyPlacement = 'prepend' | 'append' | 'insert'

export interface DecoySinkOptions {
  poison_ratio?: number       // Decoy size as a share of the payload, clamped to [0, 1]
  complexity_level?: number   // Clamped to [1, 5]
}

export interface PoisonPlan {
  seed: number
  marker: Uint8Array
  decoy: Uint8Array
  placement: DecoyPlacement
  offset: number              // Where the marker starts in the output
}

export class DecoySink {
  readonly poison_ratio: number
  readonly complexity_level: ComplexityLevel

  constructor(options: DecoySinkOptions = {}) {
    this.poison_ratio = clamp(options.poison_ratio ?? 0.1, 0, 1)
    this.complexity_level = toLevel(options.complexity_level ?? 3)
  }

  /** Work out where and what would be planted, without building the output. */
  plan(input: Uint8Array | string): PoisonPlan {
    const data = toBytes(input)
    const seed = seedOf(data)
    const decoy = generateTrap(this.complexity_level, seed, Math.floor(data.length * this.poison_ratio))
    const marker = DECOY_MARKERS[seed % DECOY_MARKERS.length]

    switch (seed % 3) {
      case 0:  return { seed, marker, decoy, placement: 'prepend', offset: decoy.length }
      case 1:  return { seed, marker, decoy, placement: 'append', offset: data.length }
      default: return { seed, marker, decoy, placement: 'insert', offset: data.length > 0 ? seed % data.length : 0 }
    }
  }

  poison(input: Uint8Array | string): Uint8Array {
    const data = toBytes(input)
    const { marker, decoy, placement, offset } = this.plan(data)

    switch (placement) {
      case 'prepend': return concat(decoy, marker, data)
      case 'append':  return concat(data, marker, decoy)
      case 'insert':  return concat(data.subarray(0, offset), marker, decoy, data.subarray(offset))
    }
  }

  isPoisoned(input: Uint8Array | string): boolean {
    const haystack = Buffer.from(toBytes(input))
    return DECOY_MARKERS.some(marker => haystack.includes(Buffer.from(marker)))
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === 'string' ? new TextEncoder().encode(input) : input
}

function seedOf(data: Uint8Array): number {
  const digest = createHash('blake2s256').update(data).digest()
  return digest.readUInt32BE(0)
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const part of parts) {
    out.set(part, at)
    at += part.length
  }
  return out
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function toLevel(value: number): ComplexityLevel {
  const level = clamp(Math.round(value), 1, 5)
  switch (level) {
    case 1: return 1
    case 2: return 2
    case 3: return 3
    case 4: return 4
    default: return 5
  }
}
