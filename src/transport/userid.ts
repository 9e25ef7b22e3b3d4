import crypto from 'hypercore-crypto'
import { recoverAddress, type Signer } from '../crypto.js'
import { toAddress, type Address } from '../address.js'
import { TransportError, isChatRequestError, errorMessage } from '../errors.js'
import { serverNameFromUrl, type ChatClient, type ChatUser } from './types.js'

const USER_ID_PATTERN = /^@(0x[0-9a-f]{40})(?:\.[0-9a-f]{8})?:(.+)$/
const LOGIN_ATTEMPTS = 5

const CHAIN_NAMES: Record<number, string> = {
  1: 'mainnet',
  5: 'goerli',
  17000: 'holesky',
  11155111: 'sepolia'
}

export function chainName(chainId: number): string {
  return CHAIN_NAMES[chainId] ?? String(chainId)
}

/** Room alias local part: `ferry_<chain>_<part>_<part>...`. */
export function makeRoomAlias(chainId: number, ...parts: string[]): string {
  return ['ferry', chainName(chainId), ...parts].join('_')
}

/** Alias of the room two peers share, the same whichever side computes it. */
export function makePeerRoomAlias(chainId: number, a: Address, b: Address): string {
  const [first, second] = a < b ? [a, b] : [b, a]
  return makeRoomAlias(chainId, first, second)
}

export function addressFromUserId(userId: string): Address | null {
  const match = USER_ID_PATTERN.exec(userId)
  return match?.[1] ? toAddress(match[1]) : null
}

export function serverFromUserId(userId: string): string | null {
  return USER_ID_PATTERN.exec(userId)?.[2] ?? null
}

/**
 * The address a user proves to own: the display name must be a signature over
 * the user id by the address embedded in that id.
 */
export function validateUserIdSignature(user: ChatUser): Address | null {
  const address = addressFromUserId(user.userId)
  if (!address || !user.displayName) return null
  const recovered = recoverAddress(user.userId, user.displayName)
  return recovered === address ? address : null
}

export function formatAuthData(userId: string, accessToken: string): string {
  return `${userId}/${accessToken}`
}

export function parseAuthData(authData: string | null): { userId: string; accessToken: string } | null {
  if (!authData) return null
  const slash = authData.indexOf('/')
  if (slash <= 0 || slash === authData.length - 1) return null
  return { userId: authData.slice(0, slash), accessToken: authData.slice(slash + 1) }
}

/** Usernames tried in order: the bare address, then seeded suffixes. */
export function candidateUsernames(signer: Signer, count: number = LOGIN_ATTEMPTS): string[] {
  const base = signer.address
  const names: string[] = [base]
  if (count <= 1) return names

  const seed = Buffer.from(signer.sign('seed'), 'hex').subarray(-32)
  for (let i = 1; i < count; i++) {
    const digest = crypto.hash(Buffer.concat([seed, Buffer.from([i])]))
    names.push(`${base}.${digest.subarray(0, 4).toString('hex')}`)
  }
  return names
}

/**
 * Log in with the previous session when it still belongs to us, otherwise
 * with a password derived from our key, registering on first use.
 * Returns the auth data to persist.
 */
export async function loginOrRegister(
  client: ChatClient,
  signer: Signer,
  prevAuthData: string | null
): Promise<string> {
  const serverName = serverNameFromUrl(client.baseUrl)
  const prev = parseAuthData(prevAuthData)

  let loggedIn = false
  if (prev && addressFromUserId(prev.userId) === signer.address && serverFromUserId(prev.userId) === serverName) {
    client.useAccessToken(prev.userId, prev.accessToken)
    try {
      await client.checkSession()
      loggedIn = true
      console.log(`Reusing previous session for ${prev.userId}`)
    } catch (err) {
      if (!isChatRequestError(err)) throw err
      console.log(`Could not reuse previous session (${errorMessage(err)}), logging in again`)
    }
  }

  if (!loggedIn) {
    const password = signer.sign(serverName)
    for (const username of candidateUsernames(signer)) {
      try {
        await client.login(username, password)
        loggedIn = true
        break
      } catch (err) {
        if (!isChatRequestError(err, [403])) throw err
      }
      try {
        await client.register(username, password)
        loggedIn = true
        console.log(`Registered ${username} on ${serverName}`)
        break
      } catch (err) {
        if (!isChatRequestError(err, [400])) throw err
      }
    }
  }

  const { userId, accessToken } = client
  if (!loggedIn || !userId || !accessToken) {
    throw new TransportError(`Could not register or login on ${serverName}`)
  }

  await client.setDisplayName(signer.sign(userId))
  return formatAuthData(userId, accessToken)
}
