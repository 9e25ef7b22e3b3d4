export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/** Acknowledges receipt of a message carrying `deliveredMessageIdentifier`. */
export interface Delivered {
  type: 'Delivered'
  deliveredMessageIdentifier: string
  signature: string
}

export interface Processed {
  type: 'Processed'
  messageIdentifier: string
  signature: string
}

export interface Ping {
  type: 'Ping'
  nonce: number
  currentProtocolVersion: number
  signature: string
}

export interface Pong {
  type: 'Pong'
  nonce: number
  signature: string
}

/** Sent outside rooms, straight to the peer's devices; never acknowledged. */
export interface ToDevice {
  type: 'ToDevice'
  messageIdentifier: string
  signature: string
}

/** Opaque application message; the transport never looks inside `payload`. */
export interface ProtocolMessage {
  type: 'ProtocolMessage'
  kind: string
  messageIdentifier: string
  payload: JsonValue
  signature: string
}

export type Message = Delivered | Processed | Ping | Pong | ToDevice | ProtocolMessage

export type MessageType = Message['type']

/** Messages that stay queued until acknowledged. */
export type RetryableMessage = Processed | ToDevice | ProtocolMessage

/** Messages dropped from a retry queue after their first send. */
export type OneShotMessage = Delivered | Ping | Pong

export const MESSAGE_TYPES: readonly MessageType[] = [
  'Delivered',
  'Processed',
  'Ping',
  'Pong',
  'ToDevice',
  'ProtocolMessage'
]
