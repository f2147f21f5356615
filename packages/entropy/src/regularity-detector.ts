/**
 * @shardwatch/entropy — Regularity Detector
 *
 * Screens key material for structure a weakened generator leaves behind.
 * Two independent heuristics, cheapest first, first hit wins:
 *
 *   BIT BALANCE  — set-bit fraction within 0.01 of exactly 0.5.
 *                  Real key material rarely lands that precisely on 50%,
 *                  so a perfect balance is itself treated as a signal.
 *   REPETITION   — any 2/3/4-byte substring seen more than 10x as often
 *                  as uniform random data of the same length would give.
 *
 * This is a fixed heuristic, not a statistical test suite. False positives
 * are expected; the remediation policy has to live with them.
 */

import type { RegularityKind } from '@shardwatch/types'

export const MIN_REGULARITY_SAMPLE_BYTES = 100
export const BIT_BALANCE_TOLERANCE = 0.01
export const REPETITION_PATTERN_LENGTHS = [2, 3, 4] as const
export const REPETITION_FACTOR = 10

// ─── Findings ─────────────────────────────────────────────────────────────────

export interface BitBalanceFinding {
  kind: Extract<RegularityKind, 'bit_balance'>
  set_bit_fraction: number
}

export interface RepetitionFinding {
  kind: Extract<RegularityKind, 'repetition'>
  pattern_hex: string
  pattern_length: number
  occurrences: number
  expected_occurrences: number
}

export type RegularityFinding = BitBalanceFinding | RepetitionFinding

// ─── Heuristics ───────────────────────────────────────────────────────────────

export function setBitFraction(data: Uint8Array): number {
  if (data.length === 0) return 0
  let set = 0
  for (let byte of data) {
    while (byte) {
      set += byte & 1
      byte >>= 1
    }
  }
  return set / (data.length * 8)
}

function checkBitBalance(data: Uint8Array): BitBalanceFinding | null {
  const fraction = setBitFraction(data)
  if (Math.abs(fraction - 0.5) < BIT_BALANCE_TOLERANCE) {
    return { kind: 'bit_balance', set_bit_fraction: fraction }
  }
  return null
}

function checkRepetition(data: Uint8Array, pattern_length: number): RepetitionFinding | null {
  // Patterns are keyed numerically; 4 bytes fit in a double
  // The window starting at len - pattern_length is not counted.
  const counts = new Map<number, number>()
  for (let i = 0; i < data.length - pattern_length; i++) {
    let key = 0
    for (let j = 0; j < pattern_length; j++) key = key * 256 + data[i + j]
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }

  const expected = data.length / 256 ** pattern_length

  for (const [key, occurrences] of counts) {
    if (occurrences > expected * REPETITION_FACTOR) {
      return {
        kind: 'repetition',
        pattern_hex: key.toString(16).padStart(pattern_length * 2, '0'),
        pattern_length,
        occurrences,
        expected_occurrences: expected,
      }
    }
  }
  return null
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Run both heuristics and report the first one that fires.
 * Returns null for clean data and for samples under 100 bytes.
 */
export function analyzeRegularity(data: Uint8Array): RegularityFinding | null {
  if (data.length < MIN_REGULARITY_SAMPLE_BYTES) return null

  const balance = checkBitBalance(data)
  if (balance) return balance

  for (const pattern_length of REPETITION_PATTERN_LENGTHS) {
    const repetition = checkRepetition(data, pattern_length)
    if (repetition) return repetition
  }

  return null
}

export function detectRegularity(data: Uint8Array): boolean {
  return analyzeRegularity(data) !== null
}
