import crypto from 'hypercore-crypto'

/** 20-byte account identity, always stored as lowercase `0x`-prefixed hex. */
export type Address = string & { readonly __address: unique symbol }

export const ADDRESS_LENGTH = 20

const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/

export const EMPTY_ADDRESS = toAddress('0x' + '00'.repeat(ADDRESS_LENGTH))

export function isAddress(value: unknown): value is string {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value)
}

export function validateAddress(value: string): string | null {
  if (!value) return 'Address is required'
  if (!ADDRESS_PATTERN.test(value)) {
    return 'Address must be 0x followed by 40 hexadecimal characters'
  }
  return null
}

export function toAddress(value: string): Address {
  if (!ADDRESS_PATTERN.test(value)) {
    throw new TypeError(`Invalid address: ${value}`)
  }
  return value.toLowerCase() as Address
}

export function tryToAddress(value: string): Address | null {
  return ADDRESS_PATTERN.test(value) ? (value.toLowerCase() as Address) : null
}

export function addressFromPublicKey(publicKey: Buffer): Address {
  const digest = crypto.hash(publicKey)
  return toAddress('0x' + digest.subarray(digest.length - ADDRESS_LENGTH).toString('hex'))
}

/**
 * Mixed-case checksum encoding: a hex letter is upper-cased when the matching
 * nibble of BLAKE2b(lowercase hex) is 8 or above.
 */
export function toChecksumAddress(address: Address): string {
  const hex = address.slice(2)
  const digest = crypto.hash(Buffer.from(hex, 'utf8')).toString('hex')
  let out = '0x'
  for (let i = 0; i < hex.length; i++) {
    const char = hex.charAt(i)
    out += parseInt(digest.charAt(i), 16) >= 8 ? char.toUpperCase() : char
  }
  return out
}

export function isChecksumAddress(value: string): boolean {
  const address = tryToAddress(value)
  return address !== null && toChecksumAddress(address) === value
}

/** Shortened form used in log lines. */
export function shortAddress(address: Address): string {
  return `${toChecksumAddress(address).slice(0, 10)}...`
}
