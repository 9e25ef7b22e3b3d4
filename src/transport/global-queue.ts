import { ProtocolViolationError, isChatRequestError, errorMessage } from '../errors.js'
import { serializeMessage } from '../messages/codec.js'
import type { Message } from '../messages/types.js'
import { Notifier } from '../notifier.js'
import { debugLog, oneLine } from '../utils.js'
import type { ChatRoom } from './types.js'

export interface GlobalQueueHost {
  readonly isRunning: boolean
  isGlobalRoomSuffix(suffix: string): boolean
  ensureGlobalRoom(suffix: string): Promise<ChatRoom>
  onWorkerFailure(err: unknown): void
}

interface GlobalSend {
  roomSuffix: string
  message: Message
}

/**
 * Broadcasts to the well-known global rooms. Messages are buffered (also
 * before start) and flushed with one send per room per cycle.
 */
export class GlobalBroadcastQueue {
  private buffer: GlobalSend[] = []
  private readonly notifier = new Notifier()
  private readonly drained = new Notifier()
  private prioritize = true
  private running = false
  private worker: Promise<void> | null = null

  constructor(
    private readonly host: GlobalQueueHost,
    private readonly retryInterval: number
  ) {}

  /** True until the first drain cycle has completed. */
  get prioritizeGlobalMessages(): boolean {
    return this.prioritize
  }

  get size(): number {
    return this.buffer.length
  }

  send(roomSuffix: string, message: Message): void {
    this.buffer.push({ roomSuffix, message })
    this.notifier.set()
  }

  /** Resolves after the first drain cycle, or when the queue stops. */
  async waitDrained(): Promise<void> {
    while (!this.drained.isSet) {
      await this.drained.wait(this.retryInterval)
    }
  }

  start(): void {
    if (this.running || this.worker) return
    this.running = true
    this.worker = this.run()
  }

  stop(): void {
    this.running = false
    this.notifier.set()
    this.drained.set()
  }

  join(): Promise<void> {
    return this.worker ?? Promise.resolve()
  }

  private async run(): Promise<void> {
    try {
      while (this.running && this.host.isRunning) {
        this.notifier.clear()
        await this.drain()
        if (!this.running) break
        await this.notifier.wait(this.retryInterval)
      }
    } catch (err) {
      this.running = false
      this.drained.set()
      this.host.onWorkerFailure(err)
    }
  }

  /** Flush everything buffered, grouped by room in first-seen order. */
  async drain(): Promise<void> {
    const batch = this.buffer
    this.buffer = []

    const byRoom = new Map<string, Message[]>()
    for (const { roomSuffix, message } of batch) {
      if (!this.host.isGlobalRoomSuffix(roomSuffix)) {
        throw new ProtocolViolationError(`Unknown global room "${roomSuffix}"`)
      }
      const messages = byRoom.get(roomSuffix)
      if (messages) messages.push(message)
      else byRoom.set(roomSuffix, [message])
    }

    for (const [roomSuffix, messages] of byRoom) {
      const text = messages.map(serializeMessage).join('\n')
      try {
        const room = await this.host.ensureGlobalRoom(roomSuffix)
        debugLog(`Broadcast to ${roomSuffix}: ${oneLine(text)}`)
        await room.sendText(text)
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        console.warn(`Broadcast to ${roomSuffix} failed: ${errorMessage(err)}`)
      }
    }

    if (this.prioritize) {
      this.prioritize = false
      this.drained.set()
    }
  }
}
