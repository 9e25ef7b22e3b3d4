import crypto from 'hypercore-crypto'
import { addressFromPublicKey, type Address } from './address.js'
import type { Identity } from './identity.js'

const PUBLIC_KEY_BYTES = 32
const ED25519_SIGNATURE_BYTES = 64

/** Signatures carry the signer's public key so the address can be recovered. */
export const SIGNATURE_BYTES = PUBLIC_KEY_BYTES + ED25519_SIGNATURE_BYTES

export const EMPTY_SIGNATURE = '00'.repeat(SIGNATURE_BYTES)

const SIGNATURE_PATTERN = new RegExp(`^[a-f0-9]{${SIGNATURE_BYTES * 2}}$`, 'i')

function digest(data: Buffer | string): Buffer {
  return crypto.hash(typeof data === 'string' ? Buffer.from(data, 'utf8') : data)
}

/**
 * Recover the signing address from a `publicKey || signature` blob.
 * Returns null for malformed, empty or non-verifying signatures.
 */
export function recoverAddress(data: Buffer | string, signature: string): Address | null {
  if (!SIGNATURE_PATTERN.test(signature) || signature === EMPTY_SIGNATURE) return null

  const raw = Buffer.from(signature, 'hex')
  const publicKey = raw.subarray(0, PUBLIC_KEY_BYTES)
  const sig = raw.subarray(PUBLIC_KEY_BYTES)

  try {
    if (!crypto.verify(digest(data), sig, publicKey)) return null
  } catch {
    return null
  }
  return addressFromPublicKey(publicKey)
}

/** Signs BLAKE2b digests with the node's Ed25519 key. */
export class Signer {
  readonly address: Address
  private readonly publicKey: Buffer
  private readonly secretKey: Buffer

  constructor(identity: Identity) {
    this.publicKey = Buffer.from(identity.publicKey, 'hex')
    this.secretKey = Buffer.from(identity.secretKey, 'hex')
    this.address = addressFromPublicKey(this.publicKey)
  }

  /** Hex-encoded `publicKey || signature`. */
  sign(data: Buffer | string): string {
    const sig = crypto.sign(digest(data), this.secretKey)
    return Buffer.concat([this.publicKey, sig]).toString('hex')
  }
}
