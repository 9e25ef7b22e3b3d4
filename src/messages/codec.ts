import { recoverAddress, type Signer } from '../crypto.js'
import { shortAddress, type Address } from '../address.js'
import { debugLog } from '../utils.js'
import { errorMessage } from '../errors.js'
import type {
  JsonValue,
  Message,
  OneShotMessage,
  RetryableMessage
} from './types.js'
import { MESSAGE_TYPES } from './types.js'

export function serializeMessage(message: Message): string {
  return JSON.stringify(message)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

function requireString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field]
  if (typeof value !== 'string' || value.length === 0) {
    throw new TypeError(`Field "${field}" must be a non-empty string`)
  }
  return value
}

function requireInteger(obj: Record<string, unknown>, field: string): number {
  const value = obj[field]
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new TypeError(`Field "${field}" must be a non-negative integer`)
  }
  return value
}

/**
 * Parse one serialized message. Throws `TypeError` describing the first
 * problem when the text is not JSON or does not have a message's shape.
 */
export function parseMessage(text: string): Message {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new TypeError('Message is not valid JSON')
  }
  if (!isRecord(parsed)) throw new TypeError('Message must be a JSON object')

  const type = parsed.type
  if (typeof type !== 'string' || !MESSAGE_TYPES.some(t => t === type)) {
    throw new TypeError(`Unknown message type: ${String(type)}`)
  }
  const signature = requireString(parsed, 'signature')

  switch (type) {
    case 'Delivered':
      return {
        type,
        deliveredMessageIdentifier: requireString(parsed, 'deliveredMessageIdentifier'),
        signature
      }
    case 'Processed':
      return { type, messageIdentifier: requireString(parsed, 'messageIdentifier'), signature }
    case 'Ping':
      return {
        type,
        nonce: requireInteger(parsed, 'nonce'),
        currentProtocolVersion: requireInteger(parsed, 'currentProtocolVersion'),
        signature
      }
    case 'Pong':
      return { type, nonce: requireInteger(parsed, 'nonce'), signature }
    case 'ToDevice':
      return { type, messageIdentifier: requireString(parsed, 'messageIdentifier'), signature }
    default: {
      const payload = parsed.payload
      if (payload === undefined || !isJsonValue(payload)) {
        throw new TypeError('Field "payload" must be a JSON value')
      }
      return {
        type: 'ProtocolMessage',
        kind: requireString(parsed, 'kind'),
        messageIdentifier: requireString(parsed, 'messageIdentifier'),
        payload,
        signature
      }
    }
  }
}

/** JSON with object keys sorted at every level, so equal payloads sign equally. */
function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort()
    const entries: string[] = []
    for (const key of keys) {
      const item = value[key]
      if (item !== undefined) entries.push(`${JSON.stringify(key)}:${canonicalJson(item)}`)
    }
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value)
}

function signingFields(message: Message): JsonValue[] {
  switch (message.type) {
    case 'Delivered':
      return [message.type, message.deliveredMessageIdentifier]
    case 'Processed':
    case 'ToDevice':
      return [message.type, message.messageIdentifier]
    case 'Ping':
      return [message.type, message.nonce, message.currentProtocolVersion]
    case 'Pong':
      return [message.type, message.nonce]
    case 'ProtocolMessage':
      return [message.type, message.kind, message.messageIdentifier, canonicalJson(message.payload)]
  }
}

/** The bytes covered by a message's signature. */
export function packMessage(message: Message): Buffer {
  return Buffer.from(canonicalJson(signingFields(message)), 'utf8')
}

export function signMessage<T extends Message>(message: T, signer: Signer): T {
  return { ...message, signature: signer.sign(packMessage(message)) }
}

export function recoverSender(message: Message): Address | null {
  return recoverAddress(packMessage(message), message.signature)
}

export function isRetryableMessage(message: Message): message is RetryableMessage {
  return message.type === 'Processed' || message.type === 'ToDevice' || message.type === 'ProtocolMessage'
}

export function isOneShotMessage(message: Message): message is OneShotMessage {
  return message.type === 'Delivered' || message.type === 'Ping' || message.type === 'Pong'
}

/**
 * Split a received body into messages, keeping only well-formed lines
 * signed by `peerAddress`.
 */
export function validateAndParseMessage(body: unknown, peerAddress: Address): Message[] {
  if (typeof body !== 'string' || body.length === 0) {
    debugLog(`Ignoring non-text body from ${shortAddress(peerAddress)}`)
    return []
  }

  const messages: Message[] = []
  for (const line of body.split('\n')) {
    if (!line.trim()) continue

    let message: Message
    try {
      message = parseMessage(line)
    } catch (err) {
      console.warn(`Dropping invalid message from ${shortAddress(peerAddress)}: ${errorMessage(err)}`)
      continue
    }

    const sender = recoverSender(message)
    if (sender === null) {
      console.warn(`Dropping unsigned ${message.type} from ${shortAddress(peerAddress)}`)
      continue
    }
    if (sender !== peerAddress) {
      console.warn(`Dropping ${message.type} signed by ${shortAddress(sender)}, expected ${shortAddress(peerAddress)}`)
      continue
    }
    messages.push(message)
  }
  return messages
}
