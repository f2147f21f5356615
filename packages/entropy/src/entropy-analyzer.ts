/**
 * @shardwatch/entropy — Entropy Analyzer
 *
 * Shannon entropy over the byte-value distribution, in bits/byte.
 * 8.0 = every byte value equally likely. 0.0 = a single repeated byte
 * (or no bytes at all).
 */

export const MAX_ENTROPY_BITS_PER_BYTE = 8

/** Count of each byte value 0–255. */
export function byteHistogram(data: Uint8Array): Uint32Array {
  const counts = new Uint32Array(256)
  for (const byte of data) counts[byte]++
  return counts
}

export function shannonEntropy(data: Uint8Array): number {
  if (data.length === 0) return 0

  const counts = byteHistogram(data)
  const total = data.length
  let entropy = 0

  for (const count of counts) {
    if (count === 0) continue
    const p = count / total
    entropy -= p * Math.log2(p)
  }

  // Rounding can push a uniform distribution a hair past the ceiling
  return Math.min(entropy, MAX_ENTROPY_BITS_PER_BYTE)
}
