import fs from 'node:fs'
import path from 'node:path'
import { EventEmitter } from 'node:events'
import { EMPTY_ADDRESS, shortAddress, type Address } from '../address.js'
import { EMPTY_SIGNATURE, type Signer } from '../crypto.js'
import { ensureConfigDir } from '../config.js'
import { signMessage } from '../messages/codec.js'
import type { JsonValue, Message, ProtocolMessage } from '../messages/types.js'
import type { PeerReachability } from '../transport/types.js'
import { generateId } from '../utils.js'
import {
  queueKey,
  type NodeService,
  type QueueIdentifier,
  type QueueView,
  type StateChange
} from './service.js'

const AUTH_FILE = 'auth.json'

/** Channel used for the node's own peer-to-peer messages. */
export const DIRECT_CHANNEL_IDENTIFIER = 1

export interface LocalNodeServiceEvents {
  'message': (message: Message, sender: Address) => void
  'delivered': (messageIdentifier: string, sender: Address) => void
  'network-state': (address: Address, state: PeerReachability) => void
}

interface MutableQueue {
  queueIdentifier: QueueIdentifier
  messages: Message[]
}

function messageIdentifier(message: Message): string | null {
  return 'messageIdentifier' in message ? message.messageIdentifier : null
}

/**
 * Minimal application behind the transport: keeps outbound queues until
 * each message is acknowledged and remembers peers' network state.
 */
export class LocalNodeService extends EventEmitter implements NodeService {
  readonly address: Address
  readonly chainId: number
  private readonly signer: Signer
  private readonly dataDir: string | null
  private readonly queues = new Map<string, MutableQueue>()
  private readonly networkStates = new Map<Address, PeerReachability>()
  private currentAuthData: string | null

  constructor(signer: Signer, chainId: number, dataDir: string | null = null) {
    super()
    this.signer = signer
    this.address = signer.address
    this.chainId = chainId
    this.dataDir = dataDir
    this.currentAuthData = dataDir ? this.loadAuthData(dataDir) : null
  }

  get authData(): string | null {
    return this.currentAuthData
  }

  getNetworkState(address: Address): PeerReachability {
    return this.networkStates.get(address) ?? 'unknown'
  }

  directQueue(recipient: Address): QueueIdentifier {
    return {
      recipient,
      canonicalIdentifier: {
        chainIdentifier: this.chainId,
        tokenNetworkAddress: EMPTY_ADDRESS,
        channelIdentifier: DIRECT_CHANNEL_IDENTIFIER
      }
    }
  }

  createMessage(kind: string, payload: JsonValue): ProtocolMessage {
    return this.sign<ProtocolMessage>({
      type: 'ProtocolMessage',
      kind,
      messageIdentifier: generateId(),
      payload,
      signature: EMPTY_SIGNATURE
    })
  }

  /** Track `message` on its queue so the transport keeps retrying it. */
  enqueue(queueIdentifier: QueueIdentifier, message: Message): void {
    const key = queueKey(queueIdentifier)
    let queue = this.queues.get(key)
    if (!queue) {
      queue = { queueIdentifier, messages: [] }
      this.queues.set(key, queue)
    }
    queue.messages.push(message)
  }

  pendingCount(): number {
    let count = 0
    for (const queue of this.queues.values()) count += queue.messages.length
    return count
  }

  // ---- NodeService ----

  handleStateChanges(changes: StateChange[]): void {
    for (const change of changes) {
      switch (change.type) {
        case 'ActionChangeNodeNetworkState':
          this.networkStates.set(change.address, change.networkState)
          console.log(`Peer ${shortAddress(change.address)} is ${change.networkState}`)
          this.emit('network-state', change.address, change.networkState)
          break
        case 'ActionUpdateTransportAuthData':
          this.currentAuthData = change.authData
          if (this.dataDir) this.saveAuthData(this.dataDir, change.authData)
          break
      }
    }
  }

  onMessage(message: Message, sender: Address): void {
    if (message.type === 'Delivered') {
      this.acknowledge(sender, message.deliveredMessageIdentifier)
      this.emit('delivered', message.deliveredMessageIdentifier, sender)
      return
    }
    this.emit('message', message, sender)
  }

  sign<T extends Message>(message: T): T {
    return signMessage(message, this.signer)
  }

  getMessageQueues(): ReadonlyMap<string, QueueView> {
    return this.queues
  }

  private acknowledge(sender: Address, identifier: string): void {
    for (const [key, queue] of this.queues) {
      if (queue.queueIdentifier.recipient !== sender) continue
      queue.messages = queue.messages.filter(m => messageIdentifier(m) !== identifier)
      if (queue.messages.length === 0) this.queues.delete(key)
    }
  }

  // ---- auth data ----

  private loadAuthData(dir: string): string | null {
    const file = path.join(dir, AUTH_FILE)
    try {
      if (!fs.existsSync(file)) return null
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
      if (typeof parsed === 'object' && parsed !== null && 'authData' in parsed && typeof parsed.authData === 'string') {
        return parsed.authData
      }
    } catch (err) {
      console.error('Failed to load auth data:', err)
    }
    return null
  }

  private saveAuthData(dir: string, authData: string): void {
    const file = path.join(dir, AUTH_FILE)
    try {
      ensureConfigDir(dir)
      fs.writeFileSync(file, JSON.stringify({ authData }, null, 2))
      fs.chmodSync(file, 0o600)
    } catch (err) {
      console.error('Failed to save auth data:', err)
    }
  }
}
