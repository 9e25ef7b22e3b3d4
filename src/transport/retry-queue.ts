import { shortAddress, type Address } from '../address.js'
import { isChatRequestError, errorMessage } from '../errors.js'
import { isOneShotMessage, serializeMessage } from '../messages/codec.js'
import type { Message } from '../messages/types.js'
import { Notifier } from '../notifier.js'
import { ExpirationState, type BackoffConfig } from '../retry.js'
import { debugLog, oneLine } from '../utils.js'
import {
  compareCanonicalIdentifiers,
  globalQueueIdentifier,
  queueKey,
  type QueueIdentifier,
  type QueueView
} from '../node/service.js'
import type { PeerReachability } from './types.js'

/** What a retry queue needs from the transport that owns it. */
export interface RetryQueueHost {
  readonly isRunning: boolean
  readonly prioritizeGlobalMessages: boolean
  waitGlobalDrained(): Promise<void>
  getAddressReachability(address: Address): PeerReachability
  getMessageQueues(): ReadonlyMap<string, QueueView>
  sendRaw(receiver: Address, text: string): Promise<void>
  onWorkerFailure(err: unknown): void
}

export interface RetryQueueOptions {
  retryInterval: number          // ms
  retriesBeforeBackoff: number
  now?: () => number
}

export interface PendingMessage {
  queueIdentifier: QueueIdentifier
  message: Message
  text: string
  expiration: ExpirationState
}

export type RetryQueueState = 'created' | 'running' | 'stopped'

function sameMessage(a: Message, b: Message): boolean {
  if (a.type !== b.type) return false
  if ('messageIdentifier' in a && 'messageIdentifier' in b) {
    return a.messageIdentifier === b.messageIdentifier
  }
  return serializeMessage(a) === serializeMessage(b)
}

/**
 * Outbound messages for one recipient. A single worker batches every due
 * message into one send and resends each on its own backoff timer until the
 * application drops it from its queues.
 */
export class RetryQueue {
  readonly receiver: Address

  private status: RetryQueueState = 'created'
  private readonly pending: PendingMessage[] = []
  private readonly notifier = new Notifier()
  private readonly backoff: BackoffConfig
  private readonly retryInterval: number
  private readonly now: () => number
  private worker: Promise<void> | null = null

  constructor(
    private readonly host: RetryQueueHost,
    receiver: Address,
    options: RetryQueueOptions
  ) {
    this.receiver = receiver
    this.retryInterval = options.retryInterval
    this.backoff = {
      retriesBeforeBackoff: options.retriesBeforeBackoff,
      interval: options.retryInterval,
      maxInterval: options.retryInterval * 10
    }
    this.now = options.now ?? Date.now
  }

  get state(): RetryQueueState {
    return this.status
  }

  get pendingMessages(): readonly PendingMessage[] {
    return this.pending
  }

  /** Returns false when the same text is already pending on that queue. */
  enqueue(queueIdentifier: QueueIdentifier, message: Message): boolean {
    if (queueIdentifier.recipient !== this.receiver) {
      throw new TypeError(
        `Queue recipient ${queueIdentifier.recipient} does not match ${this.receiver}`
      )
    }

    const text = serializeMessage(message)
    const key = queueKey(queueIdentifier)
    if (this.pending.some(p => p.text === text && queueKey(p.queueIdentifier) === key)) {
      console.warn(`Message already queued for ${shortAddress(this.receiver)}: ${message.type}`)
      return false
    }

    this.pending.push({
      queueIdentifier,
      message,
      text,
      expiration: new ExpirationState(this.backoff, this.now)
    })
    this.notify()
    return true
  }

  enqueueGlobal(message: Message): boolean {
    return this.enqueue(globalQueueIdentifier(this.receiver), message)
  }

  notify(): void {
    this.notifier.set()
  }

  start(): void {
    if (this.status !== 'created') return
    this.status = 'running'
    this.worker = this.run()
  }

  stop(): void {
    this.status = 'stopped'
    this.notifier.set()
  }

  /** Resolves once the worker has exited. */
  join(): Promise<void> {
    return this.worker ?? Promise.resolve()
  }

  private async run(): Promise<void> {
    try {
      while (this.status === 'running') {
        this.notifier.clear()
        await this.checkAndSend()
        if (this.status !== 'running') break
        await this.notifier.wait(this.retryInterval)
      }
    } catch (err) {
      this.status = 'stopped'
      this.host.onWorkerFailure(err)
    }
  }

  /** Whether the application still wants `pending` delivered. */
  private isStillQueued(pending: PendingMessage, queues: ReadonlyMap<string, QueueView>): boolean {
    const view = queues.get(queueKey(pending.queueIdentifier))
    if (!view) return false
    return view.messages.some(message => sameMessage(message, pending.message))
  }

  /** One worker cycle: collect due messages, prune, send them as one batch. */
  async checkAndSend(): Promise<void> {
    if (!this.host.isRunning || this.status === 'stopped') return

    if (this.host.prioritizeGlobalMessages) {
      await this.host.waitGlobalDrained()
      if (!this.host.isRunning || this.state === 'stopped') return
    }

    if (this.host.getAddressReachability(this.receiver) !== 'reachable') {
      debugLog(`Skipping send to unreachable ${shortAddress(this.receiver)}`)
      return
    }

    // stable: equal canonical identifiers keep enqueue order
    this.pending.sort((a, b) =>
      compareCanonicalIdentifiers(a.queueIdentifier.canonicalIdentifier, b.queueIdentifier.canonicalIdentifier)
    )

    const texts = this.pending.filter(pending => pending.expiration.shouldSend()).map(pending => pending.text)

    // every queued message is sent at least once before it is pruned
    const queues = this.host.getMessageQueues()
    for (const pending of [...this.pending]) {
      if (isOneShotMessage(pending.message) || !this.isStillQueued(pending, queues)) this.remove(pending)
    }

    if (texts.length === 0) return

    const batch = texts.join('\n')
    debugLog(`Sending to ${shortAddress(this.receiver)}: ${oneLine(batch)}`)
    try {
      await this.host.sendRaw(this.receiver, batch)
    } catch (err) {
      if (!isChatRequestError(err)) throw err
      console.warn(`Send to ${shortAddress(this.receiver)} failed: ${errorMessage(err)}`)
    }
  }

  private remove(pending: PendingMessage): void {
    const index = this.pending.indexOf(pending)
    if (index !== -1) this.pending.splice(index, 1)
  }
}
