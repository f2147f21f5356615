/**
 * @shardwatch/decoy-sink — Decoy Generators
 *
 * Five deterministic byte generators of rising complexity. Output looks
 * noisy but is fully determined by the seed, so the sink can reproduce any
 * decoy it has planted.
 *
 *   1  XOR       — small primes XOR the low seed byte
 *   2  MIX       — p + p/2 over small primes
 *   3  LOGISTIC  — logistic map in its chaotic regime (r = 3.9)
 *   4  LCG       — 32-bit linear congruential generator
 *   5  FLOAT     — big-endian float32 of prime / (seed + 1)
 *
 * Prime-driven levels draw floor(size / 4) primes, so levels 1 and 2 emit
 * a quarter of the requested size and level 5 a whole number of floats.
 */

export type ComplexityLevel = 1 | 2 | 3 | 4 | 5

export function firstPrimes(count: number): number[] {
  const primes: number[] = []
  let n = 1
  while (primes.length < count) {
    n++
    let prime = true
    for (let d = 2; d * d <= n; d++) {
      if (n % d === 0) { prime = false; break }
    }
    if (prime) primes.push(n)
  }
  return primes
}

export function generateTrap(level: ComplexityLevel, seed: number, size: number): Uint8Array {
  switch (level) {
    case 1: {
      const primes = firstPrimes(Math.floor(size / 4))
      return Uint8Array.from(primes, p => (p ^ (seed & 0xff)) & 0xff)
    }
    case 2: {
      const primes = firstPrimes(Math.floor(size / 4))
      return Uint8Array.from(primes, p => (p + (p >> 1)) & 0xff)
    }
    case 3: {
      // Start strictly inside (0, 1); 0 and 1 are fixed points of the map
      let x = ((seed % 255) + 1) / 257
      const out = new Uint8Array(size)
      for (let i = 0; i < size; i++) {
        x = 3.9 * x * (1 - x)
        out[i] = Math.floor(x * 255)
      }
      return out
    }
    case 4: {
      let x = seed >>> 0
      const out = new Uint8Array(size)
      for (let i = 0; i < size; i++) {
        x = (Math.imul(x, 1664525) + 1013904223) >>> 0
        out[i] = x & 0xff
      }
      return out
    }
    case 5: {
      const primes = firstPrimes(Math.floor(size / 4))
      const out = new Uint8Array(primes.length * 4)
      const view = new DataView(out.buffer)
      primes.forEach((p, i) => view.setFloat32(i * 4, p / (seed + 1), false))
      return out
    }
  }
}
