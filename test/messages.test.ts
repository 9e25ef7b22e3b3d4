import { test, describe } from 'node:test'
import assert from 'node:assert'
import {
  serializeMessage,
  parseMessage,
  packMessage,
  signMessage,
  recoverSender,
  isRetryableMessage,
  isOneShotMessage,
  validateAndParseMessage
} from '../src/messages/codec.js'
import type { Delivered, Ping, ProtocolMessage } from '../src/messages/types.js'
import { EMPTY_SIGNATURE } from '../src/crypto.js'
import { makeSigner } from './helpers/fixtures.js'

const alice = makeSigner(1)
const bob = makeSigner(2)

function protocolMessage(payload: ProtocolMessage['payload'] = { amount: 10 }): ProtocolMessage {
  return {
    type: 'ProtocolMessage',
    kind: 'transfer',
    messageIdentifier: 'msg-1',
    payload,
    signature: EMPTY_SIGNATURE
  }
}

describe('parseMessage', () => {
  test('parses each message type', () => {
    const delivered: Delivered = { type: 'Delivered', deliveredMessageIdentifier: 'm1', signature: 'ab' }
    const ping: Ping = { type: 'Ping', nonce: 3, currentProtocolVersion: 1, signature: 'ab' }
    assert.deepStrictEqual(parseMessage(serializeMessage(delivered)), delivered)
    assert.deepStrictEqual(parseMessage(serializeMessage(ping)), ping)
    assert.deepStrictEqual(
      parseMessage('{"type":"Processed","messageIdentifier":"m2","signature":"ab"}'),
      { type: 'Processed', messageIdentifier: 'm2', signature: 'ab' }
    )
    assert.deepStrictEqual(
      parseMessage('{"type":"ToDevice","messageIdentifier":"m3","signature":"ab"}'),
      { type: 'ToDevice', messageIdentifier: 'm3', signature: 'ab' }
    )
  })

  test('drops unknown fields', () => {
    assert.deepStrictEqual(
      parseMessage('{"type":"Pong","nonce":1,"signature":"ab","extra":true}'),
      { type: 'Pong', nonce: 1, signature: 'ab' }
    )
  })

  test('keeps protocol payloads intact', () => {
    const message = protocolMessage({ nested: [1, 'two', null, { ok: true }] })
    assert.deepStrictEqual(parseMessage(serializeMessage(message)), message)
  })

  test('rejects malformed input', () => {
    assert.throws(() => parseMessage('nope'), { name: 'TypeError', message: 'Message is not valid JSON' })
    assert.throws(() => parseMessage('[1]'), { name: 'TypeError', message: 'Message must be a JSON object' })
    assert.throws(() => parseMessage('{"type":"Bogus"}'), { message: 'Unknown message type: Bogus' })
    assert.throws(() => parseMessage('{"signature":"ab"}'), { message: 'Unknown message type: undefined' })
    assert.throws(
      () => parseMessage('{"type":"Processed","signature":"ab"}'),
      { message: 'Field "messageIdentifier" must be a non-empty string' }
    )
    assert.throws(
      () => parseMessage('{"type":"Pong","nonce":-1,"signature":"ab"}'),
      { message: 'Field "nonce" must be a non-negative integer' }
    )
    assert.throws(
      () => parseMessage('{"type":"ProtocolMessage","kind":"k","messageIdentifier":"m","signature":"ab"}'),
      { message: 'Field "payload" must be a JSON value' }
    )
  })
})

describe('signing', () => {
  test('a signed message recovers its signer', () => {
    const signed = signMessage(protocolMessage(), alice)
    assert.strictEqual(recoverSender(signed), alice.address)
  })

  test('an unsigned message recovers nothing', () => {
    assert.strictEqual(recoverSender(protocolMessage()), null)
  })

  test('packing ignores payload key order', () => {
    const a = protocolMessage({ x: 1, y: 2 })
    const b = protocolMessage({ y: 2, x: 1 })
    assert.deepStrictEqual(packMessage(a), packMessage(b))
  })

  test('tampering with the payload breaks the signature', () => {
    const signed = signMessage(protocolMessage({ amount: 10 }), alice)
    assert.strictEqual(recoverSender({ ...signed, payload: { amount: 11 } }), null)
  })

  test('the signature does not cover itself', () => {
    const signed = signMessage(protocolMessage(), alice)
    assert.deepStrictEqual(packMessage(signed), packMessage(protocolMessage()))
  })
})

describe('message classes', () => {
  test('acknowledged messages are retryable', () => {
    assert.strictEqual(isRetryableMessage(protocolMessage()), true)
    assert.strictEqual(isRetryableMessage({ type: 'Processed', messageIdentifier: 'm', signature: 'ab' }), true)
    assert.strictEqual(isOneShotMessage(protocolMessage()), false)
  })

  test('delivery receipts and pings are one-shot', () => {
    assert.strictEqual(isOneShotMessage({ type: 'Delivered', deliveredMessageIdentifier: 'm', signature: 'ab' }), true)
    assert.strictEqual(isOneShotMessage({ type: 'Pong', nonce: 1, signature: 'ab' }), true)
    assert.strictEqual(isRetryableMessage({ type: 'Ping', nonce: 1, currentProtocolVersion: 1, signature: 'ab' }), false)
  })
})

describe('validateAndParseMessage', () => {
  test('returns every valid line signed by the peer', () => {
    const first = signMessage(protocolMessage(), alice)
    const second = signMessage<Delivered>(
      { type: 'Delivered', deliveredMessageIdentifier: 'm9', signature: EMPTY_SIGNATURE },
      alice
    )
    const body = `${serializeMessage(first)}\n\n${serializeMessage(second)}\n`
    assert.deepStrictEqual(validateAndParseMessage(body, alice.address), [first, second])
  })

  test('drops lines signed by someone else', () => {
    const forged = signMessage(protocolMessage(), bob)
    const genuine = signMessage({ ...protocolMessage(), messageIdentifier: 'msg-2' }, alice)
    const body = [serializeMessage(forged), serializeMessage(genuine)].join('\n')
    assert.deepStrictEqual(validateAndParseMessage(body, alice.address), [genuine])
  })

  test('drops unsigned and malformed lines', () => {
    const body = [serializeMessage(protocolMessage()), '{broken'].join('\n')
    assert.deepStrictEqual(validateAndParseMessage(body, alice.address), [])
  })

  test('ignores empty and non-string bodies', () => {
    assert.deepStrictEqual(validateAndParseMessage('', alice.address), [])
    assert.deepStrictEqual(validateAndParseMessage(42, alice.address), [])
  })
})
