import { EMPTY_ADDRESS, type Address } from '../address.js'
import type { Message } from '../messages/types.js'
import type { PeerReachability } from '../transport/types.js'

/** Identifies one payment channel; the zero value is the global queue. */
export interface CanonicalIdentifier {
  chainIdentifier: number
  tokenNetworkAddress: Address
  channelIdentifier: number
}

export const CANONICAL_IDENTIFIER_GLOBAL_QUEUE: CanonicalIdentifier = {
  chainIdentifier: 0,
  tokenNetworkAddress: EMPTY_ADDRESS,
  channelIdentifier: 0
}

export interface QueueIdentifier {
  recipient: Address
  canonicalIdentifier: CanonicalIdentifier
}

export function queueKey(queue: QueueIdentifier): string {
  const { chainIdentifier, tokenNetworkAddress, channelIdentifier } = queue.canonicalIdentifier
  return `${queue.recipient}|${chainIdentifier}|${tokenNetworkAddress}|${channelIdentifier}`
}

export function globalQueueIdentifier(recipient: Address): QueueIdentifier {
  return { recipient, canonicalIdentifier: CANONICAL_IDENTIFIER_GLOBAL_QUEUE }
}

export function isGlobalQueue(queue: QueueIdentifier): boolean {
  return compareCanonicalIdentifiers(queue.canonicalIdentifier, CANONICAL_IDENTIFIER_GLOBAL_QUEUE) === 0
}

/** Lexicographic order on (chain, token network, channel). */
export function compareCanonicalIdentifiers(a: CanonicalIdentifier, b: CanonicalIdentifier): number {
  if (a.chainIdentifier !== b.chainIdentifier) return a.chainIdentifier - b.chainIdentifier
  if (a.tokenNetworkAddress !== b.tokenNetworkAddress) {
    return a.tokenNetworkAddress < b.tokenNetworkAddress ? -1 : 1
  }
  return a.channelIdentifier - b.channelIdentifier
}

export interface ActionChangeNodeNetworkState {
  type: 'ActionChangeNodeNetworkState'
  address: Address
  networkState: PeerReachability
}

export interface ActionUpdateTransportAuthData {
  type: 'ActionUpdateTransportAuthData'
  authData: string       // `<userId>/<accessToken>`
}

export type StateChange = ActionChangeNodeNetworkState | ActionUpdateTransportAuthData

/** Outbound messages the application still wants delivered on one queue. */
export interface QueueView {
  queueIdentifier: QueueIdentifier
  messages: readonly Message[]
}

/** The application layer as seen by the transport. */
export interface NodeService {
  readonly address: Address
  readonly chainId: number
  handleStateChanges(changes: StateChange[]): void
  /** A validated inbound message, acknowledgements included. */
  onMessage(message: Message, sender: Address): void
  sign<T extends Message>(message: T): T
  /** Current outbound queues keyed by `queueKey`. */
  getMessageQueues(): ReadonlyMap<string, QueueView>
}
