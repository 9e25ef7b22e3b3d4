import { test, describe, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert'
import fs from 'node:fs'
import path from 'node:path'
import {
  DEFAULT_TRANSPORT_CONFIG,
  validateAlias,
  validateServerUrl,
  validateConfig,
  loadConfig,
  saveConfig,
  getConfigDir,
  getConfigPath,
  resolveTransportConfig,
  resolveServers,
  addPeer,
  removePeer,
  getPeerAddress,
  getPeerAlias
} from '../src/config.js'
import { TransportError } from '../src/errors.js'
import { tempDir, removeDir } from './helpers/fixtures.js'

const PEER = '0x' + '12'.repeat(20)

describe('validateAlias', () => {
  test('accepts simple aliases', () => {
    assert.strictEqual(validateAlias('bob'), null)
    assert.strictEqual(validateAlias('node-2.eu_west'), null)
  })

  test('rejects empty, long and punctuated aliases', () => {
    assert.strictEqual(validateAlias(''), 'Alias is required')
    assert.strictEqual(validateAlias('a'.repeat(33)), 'Alias must be 32 characters or less')
    assert.strictEqual(
      validateAlias('bob smith'),
      'Alias can only contain letters, numbers, dots, underscores, and hyphens'
    )
  })

  test('accepts short hex aliases but not addresses', () => {
    assert.strictEqual(validateAlias('0x' + 'ab'.repeat(15)), null)
    assert.strictEqual(validateAlias('0x' + 'ab'.repeat(20)), 'Alias cannot look like an address')
    assert.strictEqual(validateAlias('0x' + 'AB'.repeat(20)), 'Alias cannot look like an address')
    assert.strictEqual(validateAlias('0x' + 'ab'.repeat(21)), 'Alias must be 32 characters or less')
  })
})

describe('validateServerUrl', () => {
  test('accepts auto and http(s) URLs', () => {
    assert.strictEqual(validateServerUrl('auto'), null)
    assert.strictEqual(validateServerUrl('https://chat.example.org'), null)
    assert.strictEqual(validateServerUrl('http://localhost:8008'), null)
  })

  test('rejects other schemes and garbage', () => {
    assert.strictEqual(validateServerUrl('ftp://example.org'), 'Server must be "auto" or an http(s) URL')
    assert.strictEqual(validateServerUrl('not a url'), 'Server must be "auto" or an http(s) URL')
  })
})

describe('validateConfig', () => {
  test('accepts an empty config', () => {
    assert.deepStrictEqual(validateConfig({}), [])
  })

  test('accepts a full valid config', () => {
    assert.deepStrictEqual(validateConfig({
      server: 'auto',
      availableServers: ['https://a.example.org'],
      chainId: 5,
      retryInterval: 1000,
      retriesBeforeBackoff: 0,
      globalRooms: ['discovery'],
      privateRooms: true,
      stopTimeout: 500,
      peers: { bob: PEER },
      debug: false
    }), [])
  })

  test('rejects non-objects', () => {
    assert.deepStrictEqual(validateConfig([]), [{ field: 'config', message: 'Config must be an object' }])
    assert.deepStrictEqual(validateConfig(null), [{ field: 'config', message: 'Config must be an object' }])
  })

  test('reports numeric fields', () => {
    const errors = validateConfig({ chainId: 0, retryInterval: 1.5, retriesBeforeBackoff: -1 })
    assert.deepStrictEqual(errors.map(e => e.field), ['chainId', 'retryInterval', 'retriesBeforeBackoff'])
  })

  test('reports list entries by index', () => {
    const errors = validateConfig({
      availableServers: ['https://ok.example.org', 'auto'],
      globalRooms: ['discovery', 'Bad Room']
    })
    assert.deepStrictEqual(errors.map(e => e.field), ['availableServers.1', 'globalRooms.1'])
  })

  test('reports peers by alias', () => {
    const errors = validateConfig({ peers: { bob: 'nope' } })
    assert.deepStrictEqual(errors, [
      { field: 'peers.bob', message: 'Address must be 0x followed by 40 hexadecimal characters' }
    ])
  })

  test('reports boolean fields', () => {
    const errors = validateConfig({ privateRooms: 'yes' })
    assert.deepStrictEqual(errors, [{ field: 'privateRooms', message: 'privateRooms must be a boolean' }])
  })
})

describe('config file', () => {
  let dir: string

  beforeEach(() => {
    dir = tempDir()
  })

  afterEach(() => {
    removeDir(dir)
  })

  test('missing file yields an empty config', () => {
    assert.deepStrictEqual(loadConfig(dir), {})
  })

  test('save and load round-trip', () => {
    assert.strictEqual(saveConfig({ chainId: 5, peers: { bob: PEER } }, dir), true)
    assert.deepStrictEqual(loadConfig(dir), { chainId: 5, peers: { bob: PEER } })
  })

  test('saveConfig refuses invalid config', () => {
    assert.strictEqual(saveConfig({ chainId: -1 }, dir), false)
    assert.strictEqual(fs.existsSync(getConfigPath(dir)), false)
  })

  test('invalid JSON yields an empty config', () => {
    fs.writeFileSync(getConfigPath(dir), '{ not json')
    assert.deepStrictEqual(loadConfig(dir), {})
  })

  test('invalid fields are dropped and valid ones kept', () => {
    fs.writeFileSync(getConfigPath(dir), JSON.stringify({
      chainId: 'five',
      retryInterval: 2000,
      globalRooms: ['discovery', 'NOPE'],
      peers: { bob: PEER.toUpperCase().replace('0X', '0x'), 'bad alias': PEER }
    }))
    assert.deepStrictEqual(loadConfig(dir), {
      retryInterval: 2000,
      globalRooms: ['discovery'],
      peers: { bob: PEER }
    })
  })

  test('getConfigDir honors FERRY_HOME', () => {
    const previous = process.env.FERRY_HOME
    process.env.FERRY_HOME = dir
    try {
      assert.strictEqual(getConfigDir(), dir)
      assert.strictEqual(getConfigPath(), path.join(dir, 'config.json'))
    } finally {
      if (previous === undefined) delete process.env.FERRY_HOME
      else process.env.FERRY_HOME = previous
    }
  })
})

describe('resolveTransportConfig', () => {
  test('fills every default', () => {
    assert.deepStrictEqual(resolveTransportConfig({}), DEFAULT_TRANSPORT_CONFIG)
  })

  test('keeps explicit values', () => {
    const resolved = resolveTransportConfig({ server: 'https://x.example.org', privateRooms: true })
    assert.strictEqual(resolved.server, 'https://x.example.org')
    assert.strictEqual(resolved.privateRooms, true)
    assert.strictEqual(resolved.retryInterval, 5000)
  })
})

describe('resolveServers', () => {
  test('auto returns a copy of the pool', () => {
    const pool = ['https://a.example.org', 'https://b.example.org']
    const servers = resolveServers({ server: 'auto', availableServers: pool })
    assert.deepStrictEqual(servers, pool)
    assert.notStrictEqual(servers, pool)
  })

  test('auto with an empty pool fails', () => {
    assert.throws(() => resolveServers({ server: 'auto', availableServers: [] }), TransportError)
  })

  test('an explicit URL is the only candidate', () => {
    assert.deepStrictEqual(
      resolveServers({ server: 'https://a.example.org', availableServers: [] }),
      ['https://a.example.org']
    )
  })

  test('anything else fails', () => {
    assert.throws(
      () => resolveServers({ server: 'somewhere', availableServers: [] }),
      { name: 'TransportError', message: 'Invalid server specified (valid values: "auto" or a URL)' }
    )
  })
})

describe('peer helpers', () => {
  test('addPeer lowercases and does not mutate', () => {
    const original = {}
    const updated = addPeer(original, 'bob', PEER.toUpperCase().replace('0X', '0x'))
    assert.deepStrictEqual(updated.peers, { bob: PEER })
    assert.deepStrictEqual(original, {})
  })

  test('removePeer drops the alias', () => {
    const updated = removePeer({ peers: { bob: PEER, carol: PEER } }, 'bob')
    assert.deepStrictEqual(updated.peers, { carol: PEER })
  })

  test('lookups work in both directions', () => {
    const config = { peers: { bob: PEER } }
    assert.strictEqual(getPeerAddress(config, 'bob'), PEER)
    assert.strictEqual(getPeerAddress(config, 'carol'), undefined)
    assert.strictEqual(getPeerAlias(config, PEER.toUpperCase().replace('0X', '0x')), 'bob')
    assert.strictEqual(getPeerAlias({}, PEER), undefined)
  })
})
