import { test, describe, beforeEach } from 'node:test'
import assert from 'node:assert'
import {
  chainName,
  makeRoomAlias,
  makePeerRoomAlias,
  addressFromUserId,
  serverFromUserId,
  validateUserIdSignature,
  formatAuthData,
  parseAuthData,
  candidateUsernames,
  loginOrRegister
} from '../src/transport/userid.js'
import { MemoryChatNetwork, type MemoryChatClient } from './helpers/memory-network.js'
import { makeSigner, userIdFor, SERVER_URL, SERVER_NAME } from './helpers/fixtures.js'

const alice = makeSigner(1)
const bob = makeSigner(2)

describe('room aliases', () => {
  test('known chains are named', () => {
    assert.strictEqual(chainName(1), 'mainnet')
    assert.strictEqual(chainName(11155111), 'sepolia')
    assert.strictEqual(chainName(4321), '4321')
  })

  test('aliases are prefixed with the chain', () => {
    assert.strictEqual(makeRoomAlias(5, 'discovery'), 'ferry_goerli_discovery')
  })

  test('peer room alias does not depend on who computes it', () => {
    const ab = makePeerRoomAlias(1, alice.address, bob.address)
    assert.strictEqual(ab, makePeerRoomAlias(1, bob.address, alice.address))
    const [low, high] = [alice.address, bob.address].sort()
    assert.strictEqual(ab, `ferry_mainnet_${low}_${high}`)
  })
})

describe('user ids', () => {
  test('address and server are extracted', () => {
    const userId = `@${alice.address}:${SERVER_NAME}`
    assert.strictEqual(addressFromUserId(userId), alice.address)
    assert.strictEqual(serverFromUserId(userId), SERVER_NAME)
  })

  test('a seeded suffix is allowed', () => {
    const userId = `@${alice.address}.0a1b2c3d:${SERVER_NAME}`
    assert.strictEqual(addressFromUserId(userId), alice.address)
  })

  test('other user ids carry no address', () => {
    assert.strictEqual(addressFromUserId('@someone:alpha.test'), null)
    assert.strictEqual(addressFromUserId(`@${alice.address}`), null)
    assert.strictEqual(serverFromUserId('@someone:alpha.test'), null)
  })
})

describe('validateUserIdSignature', () => {
  const userId = userIdFor(alice)

  test('accepts a display name signed by the embedded address', () => {
    assert.strictEqual(validateUserIdSignature({ userId, displayName: alice.sign(userId) }), alice.address)
  })

  test('rejects a display name signed by someone else', () => {
    assert.strictEqual(validateUserIdSignature({ userId, displayName: bob.sign(userId) }), null)
  })

  test('rejects a signature over another user id', () => {
    assert.strictEqual(validateUserIdSignature({ userId, displayName: alice.sign('@other:alpha.test') }), null)
  })

  test('rejects missing display names and non-address ids', () => {
    assert.strictEqual(validateUserIdSignature({ userId, displayName: null }), null)
    assert.strictEqual(validateUserIdSignature({ userId: '@x:alpha.test', displayName: alice.sign('@x:alpha.test') }), null)
  })
})

describe('auth data', () => {
  test('formats and parses', () => {
    const authData = formatAuthData('@u:alpha.test', 'token-1')
    assert.strictEqual(authData, '@u:alpha.test/token-1')
    assert.deepStrictEqual(parseAuthData(authData), { userId: '@u:alpha.test', accessToken: 'token-1' })
  })

  test('rejects incomplete values', () => {
    assert.strictEqual(parseAuthData(null), null)
    assert.strictEqual(parseAuthData('no-slash'), null)
    assert.strictEqual(parseAuthData('/token'), null)
    assert.strictEqual(parseAuthData('@u:alpha.test/'), null)
  })
})

describe('candidateUsernames', () => {
  test('starts with the bare address and is deterministic', () => {
    const names = candidateUsernames(alice)
    assert.strictEqual(names.length, 5)
    assert.strictEqual(names[0], alice.address)
    assert.deepStrictEqual(candidateUsernames(alice), names)
  })

  test('suffixes are eight hex digits and distinct', () => {
    const names = candidateUsernames(alice).slice(1)
    for (const name of names) {
      assert.match(name, new RegExp(`^${alice.address}\\.[0-9a-f]{8}$`))
    }
    assert.strictEqual(new Set(names).size, names.length)
  })

  test('count of one yields only the address', () => {
    assert.deepStrictEqual(candidateUsernames(alice, 1), [alice.address])
  })
})

describe('loginOrRegister', () => {
  let network: MemoryChatNetwork
  let client: MemoryChatClient

  beforeEach(() => {
    network = new MemoryChatNetwork()
    client = network.client(SERVER_URL)
  })

  test('registers on first use and signs the display name', async () => {
    const authData = await loginOrRegister(client, alice, null)
    const userId = userIdFor(alice)

    assert.strictEqual(authData, `${userId}/${client.accessToken}`)
    assert.strictEqual(client.userId, userId)
    assert.deepStrictEqual(validateUserIdSignature(client.getUser(userId)), alice.address)
    assert.strictEqual(network.callsTo('register').length, 1)
  })

  test('reuses a valid previous session without logging in', async () => {
    const authData = await loginOrRegister(client, alice, null)
    const loginsBefore = network.callsTo('login').length

    const again = network.client(SERVER_URL)
    assert.strictEqual(await loginOrRegister(again, alice, authData), authData)
    assert.strictEqual(network.callsTo('login').length, loginsBefore)
  })

  test('logs in again when the previous token is stale', async () => {
    await loginOrRegister(client, alice, null)
    const stale = formatAuthData(userIdFor(alice), 'token-stale')

    const again = network.client(SERVER_URL)
    const authData = await loginOrRegister(again, alice, stale)
    assert.notStrictEqual(authData, stale)
    assert.strictEqual(again.userId, userIdFor(alice))
  })

  test('ignores a previous session belonging to another address', async () => {
    const foreign = formatAuthData(userIdFor(bob), 'token-9')
    const authData = await loginOrRegister(client, alice, foreign)
    assert.ok(authData.startsWith(`${userIdFor(alice)}/`))
  })

  test('moves to a suffixed name when the bare address is taken', async () => {
    network.addUser(userIdFor(alice), null)
    await loginOrRegister(client, alice, null)

    const expected = `@${candidateUsernames(alice)[1]}:${SERVER_NAME}`
    assert.strictEqual(client.userId, expected)
    assert.strictEqual(addressFromUserId(expected), alice.address)
  })

  test('fails once every candidate is taken', async () => {
    network.failNext('register', 400, 5)
    await assert.rejects(loginOrRegister(client, alice, null), {
      name: 'TransportError',
      message: `Could not register or login on ${SERVER_NAME}`
    })
  })

  test('unexpected errors propagate', async () => {
    network.failNext('login', 500)
    await assert.rejects(loginOrRegister(client, alice, null), { name: 'ChatRequestError', message: /500/ })
  })
})
