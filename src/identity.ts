import fs from 'node:fs'
import path from 'node:path'
import crypto from 'hypercore-crypto'
import { getConfigDir, ensureConfigDir } from './config.js'
import { addressFromPublicKey, type Address } from './address.js'

export interface Identity {
  publicKey: string  // 64 hex chars (32 bytes)
  secretKey: string  // 128 hex chars (64 bytes)
}

const ID_FILE = 'id'
const ID_PUB_FILE = 'id_pub'

export function getIdentityPath(dir: string = getConfigDir()): string {
  return path.join(dir, ID_FILE)
}

export function getPublicKeyPath(dir: string = getConfigDir()): string {
  return path.join(dir, ID_PUB_FILE)
}

export function validatePublicKey(pubkey: string): string | null {
  if (!pubkey) return 'Public key is required'
  if (!/^[a-f0-9]{64}$/i.test(pubkey)) {
    return 'Public key must be 64 hexadecimal characters'
  }
  return null
}

function validateSecretKey(secretKey: string): boolean {
  return /^[a-f0-9]{128}$/i.test(secretKey)
}

export function generateIdentity(seed?: Buffer): Identity {
  const keyPair = crypto.keyPair(seed)
  return {
    publicKey: keyPair.publicKey.toString('hex'),
    secretKey: keyPair.secretKey.toString('hex')
  }
}

export function identityAddress(identity: Identity): Address {
  return addressFromPublicKey(Buffer.from(identity.publicKey, 'hex'))
}

export function saveIdentity(identity: Identity, dir: string = getConfigDir()): void {
  const pubkeyError = validatePublicKey(identity.publicKey)
  if (pubkeyError) {
    console.error(`Cannot save invalid identity: ${pubkeyError}`)
    return
  }

  ensureConfigDir(dir)
  const idPath = getIdentityPath(dir)

  try {
    fs.writeFileSync(idPath, identity.secretKey)
    fs.chmodSync(idPath, 0o600)
    fs.writeFileSync(getPublicKeyPath(dir), identity.publicKey)
  } catch (err) {
    console.error('Failed to save identity:', err)
  }
}

/** Load the node identity, creating and persisting a fresh one when missing or corrupt. */
export function loadOrCreateIdentity(dir: string = getConfigDir()): Identity {
  const idPath = getIdentityPath(dir)
  const pubPath = getPublicKeyPath(dir)

  try {
    if (fs.existsSync(idPath) && fs.existsSync(pubPath)) {
      const secretKey = fs.readFileSync(idPath, 'utf8').trim()
      const publicKey = fs.readFileSync(pubPath, 'utf8').trim()

      const pubErr = validatePublicKey(publicKey)
      if (!pubErr && validateSecretKey(secretKey)) {
        return {
          publicKey: publicKey.toLowerCase(),
          secretKey: secretKey.toLowerCase()
        }
      }
      console.error(`Invalid key files in ${dir}: ${pubErr ?? 'malformed secret key'}`)
      console.error('Generating new identity...')
    }
  } catch (err) {
    console.error('Failed to load identity:', err)
    console.error('Generating new identity...')
  }

  const identity = generateIdentity()
  saveIdentity(identity, dir)
  return identity
}

export function checkIdentityPermissions(dir: string = getConfigDir()): string | null {
  const idPath = getIdentityPath(dir)

  try {
    if (!fs.existsSync(idPath)) return null

    const perms = fs.statSync(idPath).mode & 0o777
    if (perms !== 0o600) {
      const octal = '0' + perms.toString(8)
      return `Private key file has permissions ${octal}, expected 0600.\n` +
        `Fix with: chmod 600 ${idPath}`
    }
  } catch (err) {
    return `Cannot check permissions on ${idPath}: ${err}`
  }

  return null
}
