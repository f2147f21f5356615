/**
 * @shardwatch/enforcer — Ciphertext Entropy Gate
 *
 * The encryption wrapper (a binding around a homomorphic-encryption
 * library) is an external collaborator. All the core needs from it is:
 * submit plaintext, get back ciphertext or an error.
 *
 * The gate checks every ciphertext the wrapper returns and refuses the
 * batch if any of it falls below the entropy floor. A ciphertext that
 * low is treated as a broken or tampered encryptor.
 */

import { shannonEntropy } from '@shardwatch/entropy'

export const DEFAULT_CIPHERTEXT_ENTROPY_THRESHOLD = 7.9

export interface EncryptionWrapper {
  encrypt(plaintext: Uint8Array): Promise<Uint8Array>
}

export class EntropyGateError extends Error {
  constructor(
    readonly chunk_index: number,
    readonly entropy: number,
    readonly threshold: number,
  ) {
    super(
      `Ciphertext for chunk ${chunk_index} has entropy ${entropy.toFixed(4)} bits/byte, ` +
      `below the ${threshold} bits/byte floor`
    )
    this.name = 'EntropyGateError'
  }
}

/**
 * Encrypt each chunk in order. Rejects with EntropyGateError on the first
 * low-entropy ciphertext; wrapper errors propagate unchanged.
 */
export async function encryptWithEntropyGate(
  wrapper: EncryptionWrapper,
  chunks: Uint8Array[],
  threshold: number = DEFAULT_CIPHERTEXT_ENTROPY_THRESHOLD
): Promise<Uint8Array[]> {
  const ciphertexts: Uint8Array[] = []

  for (const [index, chunk] of chunks.entries()) {
    const ciphertext = await wrapper.encrypt(chunk)
    const entropy = shannonEntropy(ciphertext)
    if (entropy < threshold) throw new EntropyGateError(index, entropy, threshold)
    ciphertexts.push(ciphertext)
  }

  return ciphertexts
}
