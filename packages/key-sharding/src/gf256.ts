/**
 * @shardwatch/key-sharding — GF(2^8) arithmetic
 *
 * The AES field (reduction polynomial x^8 + x^4 + x^3 + x + 1) through
 * log/antilog tables with generator 3. Addition and subtraction are XOR.
 */

const EXP = new Uint8Array(510)
const LOG = new Uint8Array(256)

{
  let x = 1
  for (let i = 0; i < 255; i++) {
    EXP[i] = x
    LOG[x] = i
    // x * 3 = x * 2 XOR x
    const doubled = (x << 1) ^ (x & 0x80 ? 0x11b : 0)
    x = (doubled ^ x) & 0xff
  }
  for (let i = 255; i < 510; i++) EXP[i] = EXP[i - 255]
}

export function gfMul(a: number, b: number): number {
  if (a === 0 || b === 0) return 0
  return EXP[LOG[a] + LOG[b]]
}

export function gfDiv(a: number, b: number): number {
  if (b === 0) throw new RangeError('Division by zero in GF(256)')
  if (a === 0) return 0
  return EXP[LOG[a] + 255 - LOG[b]]
}

/** Evaluate the polynomial with the given coefficients (constant term first) at x. */
export function gfEval(coefficients: Uint8Array, x: number): number {
  let y = 0
  for (let i = coefficients.length - 1; i >= 0; i--) y = gfMul(y, x) ^ coefficients[i]
  return y
}

/** Lagrange interpolation at x = 0 through the points (xs[i], ys[i]). */
export function gfInterpolateAtZero(xs: readonly number[], ys: readonly number[]): number {
  let secret = 0
  for (let i = 0; i < xs.length; i++) {
    let basis = 1
    for (let j = 0; j < xs.length; j++) {
      if (i === j) continue
      basis = gfMul(basis, gfDiv(xs[j], xs[i] ^ xs[j]))
    }
    secret ^= gfMul(ys[i], basis)
  }
  return secret
}
