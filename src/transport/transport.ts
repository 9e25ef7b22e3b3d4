import { EventEmitter } from 'node:events'
import { isAddress, shortAddress, toAddress, type Address } from '../address.js'
import { EMPTY_SIGNATURE, type Signer } from '../crypto.js'
import { resolveServers, type TransportConfig } from '../config.js'
import { TransportError, ProtocolViolationError, isChatRequestError, errorMessage } from '../errors.js'
import {
  isOneShotMessage,
  isRetryableMessage,
  serializeMessage,
  validateAndParseMessage
} from '../messages/codec.js'
import type { Delivered, Message } from '../messages/types.js'
import type { NodeService, QueueIdentifier, QueueView } from '../node/service.js'
import { debugLog, waitWithTimeout } from '../utils.js'
import { AddressDirectory } from './directory.js'
import { GlobalBroadcastQueue, type GlobalQueueHost } from './global-queue.js'
import { RetryQueue, type RetryQueueHost } from './retry-queue.js'
import { RoomResolver } from './rooms.js'
import {
  serverNameFromUrl,
  type ChatClient,
  type ChatRoom,
  type ChatUser,
  type InviteState,
  type PeerReachability,
  type RoomMessageEvent,
  type ToDeviceEvent,
  type UserPresence
} from './types.js'
import { loginOrRegister, validateUserIdSignature } from './userid.js'

export const TO_DEVICE_EVENT_TYPE = 'network.ferry.to_device'
const STATUS_LOG_INTERVAL = 60_000

export type TransportState = 'created' | 'starting' | 'running' | 'stopped'

export interface TransportOptions {
  config: TransportConfig
  signer: Signer
  /** Builds a client for one server of the pool. */
  createClient: (baseUrl: string) => ChatClient
  now?: () => number
}

export interface TransportEvents {
  'fatal': (err: unknown) => void
  'started': () => void
  'stopped': () => void
}

/**
 * Reliable delivery of signed messages over a room-based chat network:
 * one retry queue per recipient, a broadcast queue for global rooms and
 * inbound validation with acknowledgements.
 */
export class Transport extends EventEmitter implements RetryQueueHost, GlobalQueueHost {
  readonly address: Address

  private readonly config: TransportConfig
  private readonly signer: Signer
  private readonly createClient: (baseUrl: string) => ChatClient
  private readonly now: () => number
  private readonly directory: AddressDirectory
  private readonly globalQueue: GlobalBroadcastQueue
  private readonly retryQueues = new Map<Address, RetryQueue>()
  private readonly tasks = new Set<Promise<void>>()

  private state: TransportState = 'created'
  private service: NodeService | null = null
  private chatClient: ChatClient | null = null
  private roomResolver: RoomResolver | null = null
  private statusTimer: ReturnType<typeof setInterval> | null = null

  constructor(options: TransportOptions) {
    super()
    this.config = options.config
    this.signer = options.signer
    this.address = options.signer.address
    this.createClient = options.createClient
    this.now = options.now ?? Date.now
    this.directory = new AddressDirectory(
      (address, reachability) => this.handleReachabilityChange(address, reachability),
      (user, presence) => this.handleUserPresenceChange(user, presence)
    )
    this.globalQueue = new GlobalBroadcastQueue(this, this.config.retryInterval)
  }

  // ---- accessors ----

  get isRunning(): boolean {
    return this.state === 'running'
  }

  get status(): TransportState {
    return this.state
  }

  get client(): ChatClient {
    if (!this.chatClient) throw new TransportError('Transport has not been started')
    return this.chatClient
  }

  get rooms(): RoomResolver {
    if (!this.roomResolver) throw new TransportError('Transport has not been started')
    return this.roomResolver
  }

  get addresses(): AddressDirectory {
    return this.directory
  }

  get prioritizeGlobalMessages(): boolean {
    return this.globalQueue.prioritizeGlobalMessages
  }

  waitGlobalDrained(): Promise<void> {
    return this.globalQueue.waitDrained()
  }

  getAddressReachability(address: Address): PeerReachability {
    return this.directory.getAddressReachability(address)
  }

  getMessageQueues(): ReadonlyMap<string, QueueView> {
    return this.service?.getMessageQueues() ?? new Map()
  }

  isGlobalRoomSuffix(suffix: string): boolean {
    return this.config.globalRooms.includes(suffix)
  }

  ensureGlobalRoom(suffix: string): Promise<ChatRoom> {
    return this.rooms.ensureGlobalRoom(suffix)
  }

  getRetryQueue(address: Address): RetryQueue | undefined {
    return this.retryQueues.get(address)
  }

  // ---- lifecycle ----

  /** First server of the pool that answers. */
  private async selectClient(): Promise<ChatClient> {
    const servers = resolveServers(this.config)
    for (const server of servers) {
      const client = this.createClient(server)
      try {
        await client.checkServer()
        return client
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        console.warn(`Server ${server} unavailable: ${errorMessage(err)}`)
        await client.stop()
      }
    }
    throw new TransportError(`No chat server reachable (tried ${servers.join(', ')})`)
  }

  async start(service: NodeService, prevAuthData: string | null): Promise<void> {
    if (this.state !== 'created') {
      throw new TransportError(`Transport cannot start from state ${this.state}`)
    }
    this.state = 'starting'
    this.service = service

    let authData: string
    try {
      const client = await this.selectClient()
      this.chatClient = client
      this.ensureStarting()
      const ownServer = serverNameFromUrl(client.baseUrl)
      this.roomResolver = new RoomResolver({
        client,
        directory: this.directory,
        ownAddress: this.address,
        chainId: this.config.chainId,
        privateRooms: this.config.privateRooms,
        globalRoomSuffixes: this.config.globalRooms,
        fallbackServers: this.config.availableServers
          .map(serverNameFromUrl)
          .filter(server => server !== ownServer),
        onRoomMessage: (room, event) => this.onRoomEvent(room, event)
      })

      client.onInvite((roomId, state) => this.handleInvite(roomId, state))
      client.onToDevice(event => this.onToDeviceEvent(event))
      this.directory.start(client)

      authData = await loginOrRegister(client, this.signer, prevAuthData)
      this.ensureStarting()
      await client.sync()
      this.ensureStarting()

      for (const suffix of this.config.globalRooms) {
        await this.rooms.ensureGlobalRoom(suffix)
        this.ensureStarting()
      }
      this.rooms.inventoryRooms()
      client.startListening()
      await client.setPresence('online')
      this.ensureStarting()
    } catch (err) {
      this.state = 'stopped'
      this.roomResolver?.stop()
      this.directory.stop()
      await this.chatClient?.stop()
      throw err
    }

    this.state = 'running'
    console.log(`Transport started as ${this.client.userId ?? shortAddress(this.address)}`)

    for (const queue of this.retryQueues.values()) queue.start()
    this.globalQueue.start()

    service.handleStateChanges([{ type: 'ActionUpdateTransportAuthData', authData }])

    for (const [roomId, state] of this.rooms.finishStartup()) {
      this.handleInvite(roomId, state)
    }

    this.statusTimer = setInterval(() => this.logStatus(), STATUS_LOG_INTERVAL)
    this.statusTimer.unref()
    this.emit('started')
  }

  /** Throws once `stop()` has run while `start()` was still awaiting. */
  private ensureStarting(): void {
    if (this.state !== 'starting') throw new TransportError('Transport stopped while starting')
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') return
    const wasStarted = this.state !== 'created'
    this.state = 'stopped'

    if (this.statusTimer) {
      clearInterval(this.statusTimer)
      this.statusTimer = null
    }
    this.roomResolver?.stop()
    for (const queue of this.retryQueues.values()) queue.stop()
    this.globalQueue.stop()

    const workers = [
      ...[...this.retryQueues.values()].map(queue => queue.join()),
      this.globalQueue.join(),
      ...this.tasks
    ]
    const finished = await waitWithTimeout(Promise.all(workers), this.config.stopTimeout)
    if (!finished) {
      console.warn(`Transport workers did not stop within ${this.config.stopTimeout}ms`)
    }

    this.directory.stop()
    const client = this.chatClient
    if (wasStarted && client) {
      try {
        await client.setPresence('offline')
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        console.warn(`Could not set presence offline: ${errorMessage(err)}`)
      }
      await client.stop()
    }

    this.retryQueues.clear()
    console.log('Transport stopped')
    this.emit('stopped')
  }

  onWorkerFailure(err: unknown): void {
    console.error('Transport failure:', errorMessage(err))
    this.emit('fatal', err)
    this.stop().catch(stopErr => {
      console.error('Error while stopping after failure:', errorMessage(stopErr))
    })
  }

  private track(task: Promise<void>, label: string): void {
    const tracked = task.catch(err => {
      console.error(`${label} failed:`, errorMessage(err))
    })
    this.tasks.add(tracked)
    void tracked.finally(() => this.tasks.delete(tracked))
  }

  private logStatus(): void {
    const { reachable, unreachable, unknown } = this.directory.statusSummary()
    console.log(`Peers: ${reachable} reachable, ${unreachable} unreachable, ${unknown} unknown; ` +
      `${this.retryQueues.size} retry queues`)
  }

  // ---- peers ----

  whitelist(address: Address): void {
    this.directory.addAddress(address)
  }

  /**
   * Whitelist `address` and start tracking its reachability from the users
   * that prove to own it.
   */
  async startHealthCheck(address: Address): Promise<void> {
    this.whitelist(address)

    const candidates = await this.client.searchUserDirectory(address)
    const userIds = candidates
      .filter(user => validateUserIdSignature(user) === address)
      .map(user => user.userId)
    this.directory.addUserIdsForAddress(address, userIds)
    await this.directory.fetchAddressPresence(address)
    this.directory.refreshAddressPresence(address)
  }

  private handleReachabilityChange(address: Address, reachability: PeerReachability): void {
    this.service?.handleStateChanges([
      { type: 'ActionChangeNodeNetworkState', address, networkState: reachability }
    ])
    if (reachability === 'reachable') {
      this.retryQueues.get(address)?.notify()
    }
  }

  private handleUserPresenceChange(user: ChatUser, presence: UserPresence): void {
    if (!this.isRunning || !this.roomResolver) return
    debugLog(`Presence of ${user.userId}: ${presence}`)
    this.track(this.roomResolver.maybeInviteUser(user), 'Invite check')
  }

  private handleInvite(roomId: string, state: InviteState): void {
    if (!this.roomResolver) return
    this.track(this.roomResolver.handleInvite(roomId, state), `Invite to ${roomId}`)
  }

  // ---- outbound ----

  private retryQueueFor(address: Address): RetryQueue {
    let queue = this.retryQueues.get(address)
    if (!queue) {
      queue = new RetryQueue(this, address, {
        retryInterval: this.config.retryInterval,
        retriesBeforeBackoff: this.config.retriesBeforeBackoff,
        now: this.now
      })
      this.retryQueues.set(address, queue)
      if (this.isRunning) queue.start()
    }
    return queue
  }

  sendAsync(queueIdentifier: QueueIdentifier, message: Message): void {
    const recipient: string = queueIdentifier.recipient
    if (!isAddress(recipient)) {
      throw new TypeError(`Invalid address ${recipient}`)
    }
    if (isOneShotMessage(message)) {
      throw new TypeError(`Do not use sendAsync for ${message.type} messages`)
    }
    if (this.state === 'stopped') {
      debugLog(`Transport stopped, dropping ${message.type} for ${recipient}`)
      return
    }
    const address = toAddress(recipient)
    this.retryQueueFor(address).enqueue({ ...queueIdentifier, recipient: address }, message)
  }

  sendGlobal(roomSuffix: string, message: Message): void {
    this.globalQueue.send(roomSuffix, message)
  }

  /** One copy per known user of `address`, all devices, no retries. */
  async sendToDevice(address: Address, message: Message): Promise<void> {
    const userIds = this.directory.getUserIdsForAddress(address)
    if (userIds.length === 0) {
      console.warn(`No known users for ${shortAddress(address)}, dropping ${message.type}`)
      return
    }
    const text = serializeMessage(message)
    const messages: Record<string, Record<string, string>> = {}
    for (const userId of userIds) {
      messages[userId] = { '*': text }
    }
    await this.client.sendToDevice(TO_DEVICE_EVENT_TYPE, messages)
  }

  async sendRaw(receiver: Address, text: string): Promise<void> {
    const room = await this.rooms.getRoomForAddress(receiver)
    if (!room) {
      console.warn(`No room for ${shortAddress(receiver)}, will retry`)
      return
    }
    await room.sendText(text)
  }

  // ---- inbound ----

  private onRoomEvent(room: ChatRoom, event: RoomMessageEvent): void {
    try {
      this.handleMessage(room, event)
    } catch (err) {
      this.onWorkerFailure(err)
    }
  }

  private onToDeviceEvent(event: ToDeviceEvent): void {
    try {
      this.handleToDeviceMessage(event)
    } catch (err) {
      this.onWorkerFailure(err)
    }
  }

  /** Resolve a whitelisted, signature-valid peer for an inbound sender. */
  private validateSender(senderId: string): { user: ChatUser; address: Address } | null {
    if (senderId === this.client.userId) return null

    const user = this.client.getUser(senderId)
    const address = validateUserIdSignature(user)
    if (!address) {
      debugLog(`Ignoring message from ${senderId}: invalid user id signature`)
      return null
    }
    if (!this.directory.isAddressKnown(address)) {
      debugLog(`Ignoring message from unknown address ${shortAddress(address)}`)
      return null
    }
    return { user, address }
  }

  /**
   * Validate and dispatch a room message. Returns whether it was accepted;
   * throws `ProtocolViolationError` for a peer message in a global room.
   */
  handleMessage(room: ChatRoom, event: RoomMessageEvent): boolean {
    if (!this.isRunning) return false
    if (event.type !== 'm.room.message' || event.content.msgtype !== 'm.text') return false

    const sender = this.validateSender(event.sender)
    if (!sender) return false
    const { user, address } = sender

    if (this.rooms.isRoomGlobal(room)) {
      throw new ProtocolViolationError(
        `Message from ${shortAddress(address)} in global room ${room.roomId}`
      )
    }

    const roomIds = this.rooms.getRoomIdsForAddress(address)
    if (!roomIds.includes(room.roomId) && this.config.privateRooms && !room.inviteOnly) {
      debugLog(`Ignoring message from ${shortAddress(address)}: expected a private room`)
      return false
    }
    if (roomIds[0] !== room.roomId) {
      this.track(this.rooms.setRoomIdForAddress(address, room.roomId), 'Room mapping update')
    }

    this.markSenderOnline(user, address)

    const messages = validateAndParseMessage(event.content.body, address)
    if (messages.length === 0) return false
    this.receiveMessages(messages, address)
    return true
  }

  /** A peer that just sent us something is online, whatever its last presence said. */
  private markSenderOnline(user: ChatUser, address: Address): void {
    if (this.directory.getAddressReachability(address) === 'reachable') return
    this.directory.addUserIdsForAddress(address, [user.userId])
    this.directory.forceUserPresence(user, 'online')
    this.directory.refreshAddressPresence(address)
  }

  private receiveMessages(messages: Message[], sender: Address): void {
    const service = this.service
    if (!service) return

    for (const message of messages) {
      if (isRetryableMessage(message)) {
        const delivered = service.sign<Delivered>({
          type: 'Delivered',
          deliveredMessageIdentifier: message.messageIdentifier,
          signature: EMPTY_SIGNATURE
        })
        this.retryQueueFor(sender).enqueueGlobal(delivered)
      }
      service.onMessage(message, sender)
    }
  }

  /** Direct messages skip rooms and acknowledgements. */
  handleToDeviceMessage(event: ToDeviceEvent): boolean {
    if (!this.isRunning || event.type !== TO_DEVICE_EVENT_TYPE) return false

    const sender = this.validateSender(event.sender)
    if (!sender) return false
    this.markSenderOnline(sender.user, sender.address)

    const messages = validateAndParseMessage(event.content.body, sender.address)
    let accepted = false
    for (const message of messages) {
      if (message.type !== 'ToDevice') {
        debugLog(`Ignoring ${message.type} received as to-device message`)
        continue
      }
      this.service?.onMessage(message, sender.address)
      accepted = true
    }
    return accepted
  }
}
