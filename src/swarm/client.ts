import Hyperswarm, { type Discovery, type JoinOptions, type Peer } from 'hyperswarm'
import crypto from 'hypercore-crypto'
import { isAddress } from '../address.js'
import { ChatRequestError, errorMessage } from '../errors.js'
import { debugLog } from '../utils.js'
import {
  serverNameFromUrl,
  type ChatClient,
  type ChatRoom,
  type ChatUser,
  type CreateRoomOptions,
  type InviteState,
  type PresenceEvent,
  type RoomListener,
  type RoomMessageEvent,
  type ToDeviceEvent,
  type UserPresence
} from '../transport/types.js'
import { addressFromUserId } from '../transport/userid.js'
import { encodeFrame, FrameDecoder, type Frame, type InviteFrame } from './frames.js'
import { SwarmStore } from './store.js'

/** The part of a hyperswarm instance the client uses. */
export interface SwarmLike {
  join(topic: Buffer, options?: JoinOptions): Discovery
  leave(topic: Buffer): Promise<void>
  destroy(): Promise<void>
  on(event: 'connection', handler: (peer: Peer) => void): unknown
  on(event: 'error', handler: (err: Error) => void): unknown
}

export interface SwarmChatClientOptions {
  /** Names the network namespace, e.g. `https://transport01.ferry.network`. */
  baseUrl: string
  store: SwarmStore
  swarm?: SwarmLike
}

interface KnownUser {
  displayName: string | null
  presence: UserPresence
}

interface Connection {
  decoder: FrameDecoder
  userId: string | null     // set by HELLO
}

export function topicFor(kind: 'room' | 'address', id: string): Buffer {
  return crypto.hash(Buffer.from(`ferry/${kind}/${id.toLowerCase()}`, 'utf8'))
}

/** Alias rooms share one id on every node, whichever server part the alias names. */
export function aliasRoomId(alias: string): string {
  const local = alias.replace(/^#/, '').split(':')[0] ?? alias
  return `!${crypto.hash(Buffer.from(`alias:${local}`, 'utf8')).subarray(0, 12).toString('hex')}:swarm`
}

class SwarmRoom implements ChatRoom {
  readonly roomId: string
  readonly members = new Set<string>()
  readonly invited = new Set<string>()
  inviteOnly: boolean
  private readonly aliasList: string[]
  private readonly listeners: RoomListener[] = []

  constructor(
    private readonly client: SwarmChatClient,
    roomId: string,
    aliases: string[],
    inviteOnly: boolean
  ) {
    this.roomId = roomId
    this.aliasList = [...aliases]
    this.inviteOnly = inviteOnly
  }

  get aliases(): readonly string[] {
    return this.aliasList
  }

  get canonicalAlias(): string | null {
    return this.aliasList[0] ?? null
  }

  get listenerCount(): number {
    return this.listeners.length
  }

  addListener(listener: RoomListener): void {
    this.listeners.push(listener)
  }

  async getJoinedMembers(): Promise<ChatUser[]> {
    return [...this.members].map(userId => this.client.getUser(userId))
  }

  async inviteUser(userId: string): Promise<void> {
    this.invited.add(userId)
    await this.client.sendInvite(this, userId)
  }

  async sendText(text: string): Promise<void> {
    this.client.broadcastText(this.roomId, text)
  }

  async addRoomAlias(alias: string): Promise<boolean> {
    if (this.aliasList.includes(alias)) return false
    this.aliasList.push(alias)
    this.client.persistRoom(this)
    return true
  }

  deliver(event: RoomMessageEvent): void {
    for (const listener of this.listeners) listener(this, event)
  }
}

/**
 * Chat client without a server: rooms and users are hyperswarm topics and
 * peers gossip newline-delimited JSON frames over every open connection.
 */
export class SwarmChatClient implements ChatClient {
  readonly baseUrl: string
  private readonly serverName: string
  private readonly store: SwarmStore
  private readonly swarmOverride: SwarmLike | undefined
  private swarmInstance: SwarmLike | null = null

  private currentUserId: string | null = null
  private currentToken: string | null = null
  private displayName: string | null = null
  private presence: UserPresence = 'offline'
  private listening = false
  private stopped = false

  private readonly joinedRooms = new Map<string, SwarmRoom>()
  private readonly pendingInvites = new Map<string, InviteFrame>()
  private readonly knownUsers = new Map<string, KnownUser>()
  private readonly connections = new Map<Peer, Connection>()

  private readonly inviteHandlers: Array<(roomId: string, state: InviteState) => void> = []
  private readonly presenceHandlers: Array<(event: PresenceEvent) => void> = []
  private readonly toDeviceHandlers: Array<(event: ToDeviceEvent) => void> = []

  constructor(options: SwarmChatClientOptions) {
    this.baseUrl = options.baseUrl
    this.serverName = serverNameFromUrl(options.baseUrl)
    this.store = options.store
    this.swarmOverride = options.swarm
  }

  get userId(): string | null {
    return this.currentUserId
  }

  get accessToken(): string | null {
    return this.currentToken
  }

  get rooms(): ReadonlyMap<string, ChatRoom> {
    return this.joinedRooms
  }

  private get swarm(): SwarmLike {
    if (!this.swarmInstance) {
      const swarm: SwarmLike = this.swarmOverride ?? new Hyperswarm()
      swarm.on('connection', (peer: Peer) => this.handleConnection(peer))
      swarm.on('error', (err: Error) => console.error('Swarm error:', err.message))
      this.swarmInstance = swarm
    }
    return this.swarmInstance
  }

  private requireUser(): string {
    if (!this.currentUserId) throw new ChatRequestError(401, 'Not logged in')
    return this.currentUserId
  }

  // ---- session ----

  async checkServer(): Promise<void> {
    if (this.stopped) throw new ChatRequestError(503, 'Client stopped')
  }

  async login(username: string, password: string): Promise<void> {
    const userId = `@${username}:${this.serverName}`
    if (!this.store.hasAccount(userId) || !this.store.checkPassword(userId, password)) {
      throw new ChatRequestError(403, 'Invalid username or password')
    }
    this.currentUserId = userId
    this.currentToken = this.store.issueAccessToken(userId)
    this.displayName = this.store.getDisplayName(userId)
  }

  async register(username: string, password: string): Promise<void> {
    const userId = `@${username}:${this.serverName}`
    if (this.store.hasAccount(userId)) {
      throw new ChatRequestError(400, 'User ID already taken')
    }
    this.store.createAccount(userId, password)
    await this.login(username, password)
  }

  useAccessToken(userId: string, accessToken: string): void {
    this.currentUserId = userId
    this.currentToken = accessToken
    this.displayName = this.store.getDisplayName(userId)
  }

  async checkSession(): Promise<void> {
    const userId = this.requireUser()
    if (!this.currentToken || !this.store.checkAccessToken(userId, this.currentToken)) {
      throw new ChatRequestError(401, 'Unknown access token')
    }
  }

  async sync(): Promise<void> {
    const userId = this.requireUser()
    for (const stored of this.store.getRooms(userId)) {
      if (this.joinedRooms.has(stored.roomId)) continue
      const room = new SwarmRoom(this, stored.roomId, stored.aliases, stored.inviteOnly)
      room.members.add(userId)
      this.joinedRooms.set(room.roomId, room)
      this.swarm.join(topicFor('room', room.roomId))
    }

    const address = addressFromUserId(userId)
    if (address) {
      await this.swarm.join(topicFor('address', address), { client: true, server: true }).flushed()
    }
  }

  async setDisplayName(displayName: string): Promise<void> {
    const userId = this.requireUser()
    this.displayName = displayName
    this.store.setDisplayName(userId, displayName)
    this.broadcastPresence()
  }

  // ---- users ----

  getUser(userId: string): ChatUser {
    if (userId === this.currentUserId) return { userId, displayName: this.displayName }
    return { userId, displayName: this.knownUsers.get(userId)?.displayName ?? null }
  }

  async searchUserDirectory(term: string): Promise<ChatUser[]> {
    const needle = term.toLowerCase()
    if (isAddress(needle)) {
      await this.swarm.join(topicFor('address', needle), { client: true, server: false }).flushed()
    }
    const users: ChatUser[] = []
    for (const [userId, known] of this.knownUsers) {
      if (userId !== this.currentUserId && userId.includes(needle)) {
        users.push({ userId, displayName: known.displayName })
      }
    }
    return users
  }

  async getPresence(userId: string): Promise<UserPresence> {
    if (userId === this.currentUserId) return this.presence
    return this.knownUsers.get(userId)?.presence ?? 'offline'
  }

  // ---- rooms ----

  async joinRoom(roomIdOrAlias: string): Promise<ChatRoom> {
    const userId = this.requireUser()
    const isAlias = roomIdOrAlias.startsWith('#')
    const roomId = isAlias ? aliasRoomId(roomIdOrAlias) : roomIdOrAlias

    const existing = this.joinedRooms.get(roomId)
    if (existing) return existing

    const invite = this.pendingInvites.get(roomId)
    this.pendingInvites.delete(roomId)
    const aliases = isAlias ? [roomIdOrAlias] : invite?.aliases ?? []
    const room = new SwarmRoom(this, roomId, aliases, invite?.inviteOnly ?? false)
    if (invite) room.members.add(invite.inviter)
    return this.enterRoom(room, userId)
  }

  async createRoom(options: CreateRoomOptions): Promise<ChatRoom> {
    const userId = this.requireUser()
    let room: SwarmRoom
    if (options.alias) {
      const fullAlias = `#${options.alias}:${this.serverName}`
      const roomId = aliasRoomId(fullAlias)
      if (this.joinedRooms.has(roomId)) throw new ChatRequestError(409, 'Room alias already taken')
      room = new SwarmRoom(this, roomId, [fullAlias], !options.isPublic)
    } else {
      const roomId = `!${crypto.randomBytes(12).toString('hex')}:swarm`
      room = new SwarmRoom(this, roomId, [], !options.isPublic)
    }
    await this.enterRoom(room, userId)
    for (const invitee of options.invitees ?? []) {
      await room.inviteUser(invitee)
    }
    return room
  }

  private async enterRoom(room: SwarmRoom, userId: string): Promise<SwarmRoom> {
    room.members.add(userId)
    this.joinedRooms.set(room.roomId, room)
    this.persistRoom(room)
    this.swarm.join(topicFor('room', room.roomId))
    this.broadcast({ type: 'JOIN', roomId: room.roomId, userId, aliases: [...room.aliases] })
    debugLog(`Joined swarm room ${room.roomId}`)
    return room
  }

  async leaveRoom(roomId: string): Promise<void> {
    const userId = this.requireUser()
    const room = this.joinedRooms.get(roomId)
    if (!room) throw new ChatRequestError(404, `Not a member of ${roomId}`)
    this.joinedRooms.delete(roomId)
    this.store.removeRoom(userId, roomId)
    this.broadcast({ type: 'LEAVE', roomId, userId })
    await this.swarm.leave(topicFor('room', roomId))
  }

  persistRoom(room: SwarmRoom): void {
    if (!this.currentUserId) return
    this.store.putRoom(this.currentUserId, {
      roomId: room.roomId,
      aliases: [...room.aliases],
      inviteOnly: room.inviteOnly
    })
  }

  async sendInvite(room: SwarmRoom, invitee: string): Promise<void> {
    const inviter = this.requireUser()
    const address = addressFromUserId(invitee)
    if (address) {
      await this.swarm.join(topicFor('address', address), { client: true, server: false }).flushed()
    }
    this.broadcast(this.inviteFrame(room, inviter, invitee))
  }

  private inviteFrame(room: SwarmRoom, inviter: string, invitee: string): InviteFrame {
    return {
      type: 'INVITE',
      roomId: room.roomId,
      inviter,
      inviterDisplayName: this.displayName,
      invitee,
      inviteOnly: room.inviteOnly,
      aliases: [...room.aliases]
    }
  }

  broadcastText(roomId: string, body: string): void {
    const sender = this.requireUser()
    this.broadcast({ type: 'TEXT', roomId, sender, body })
  }

  // ---- account data, presence, to-device ----

  getAccountData(type: string): unknown {
    return this.currentUserId ? this.store.getAccountData(this.currentUserId, type) : undefined
  }

  async setAccountData(type: string, content: Record<string, unknown>): Promise<void> {
    this.store.setAccountData(this.requireUser(), type, content)
  }

  async setPresence(presence: UserPresence): Promise<void> {
    this.requireUser()
    this.presence = presence
    this.broadcastPresence()
  }

  private broadcastPresence(): void {
    if (!this.currentUserId) return
    this.broadcast({
      type: 'PRESENCE',
      userId: this.currentUserId,
      displayName: this.displayName,
      presence: this.presence
    })
  }

  async sendToDevice(eventType: string, messages: Record<string, Record<string, string>>): Promise<void> {
    const sender = this.requireUser()
    for (const [recipient, devices] of Object.entries(messages)) {
      for (const body of Object.values(devices)) {
        this.broadcast({ type: 'TO_DEVICE', eventType, sender, recipient, body })
      }
    }
  }

  onInvite(handler: (roomId: string, state: InviteState) => void): void {
    this.inviteHandlers.push(handler)
  }

  onPresence(handler: (event: PresenceEvent) => void): void {
    this.presenceHandlers.push(handler)
  }

  onToDevice(handler: (event: ToDeviceEvent) => void): void {
    this.toDeviceHandlers.push(handler)
  }

  startListening(): void {
    this.listening = true
  }

  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true
    this.listening = false
    for (const peer of this.connections.keys()) peer.end()
    this.connections.clear()
    if (this.swarmInstance) await this.swarmInstance.destroy()
  }

  // ---- wire ----

  private broadcast(frame: Frame): void {
    const line = encodeFrame(frame)
    for (const peer of this.connections.keys()) peer.write(line)
  }

  private hello(): Frame | null {
    if (!this.currentUserId) return null
    return {
      type: 'HELLO',
      userId: this.currentUserId,
      displayName: this.displayName,
      presence: this.presence,
      rooms: [...this.joinedRooms.keys()]
    }
  }

  private handleConnection(peer: Peer): void {
    if (this.stopped) {
      peer.end()
      return
    }
    const connKey = peer.remotePublicKey.toString('hex').slice(0, 8)
    debugLog(`Swarm connection: ${connKey}...`)

    const conn: Connection = { decoder: new FrameDecoder(), userId: null }
    this.connections.set(peer, conn)

    peer.on('data', (data: Buffer) => {
      for (const frame of conn.decoder.push(data)) {
        this.handleFrame(conn, frame)
      }
    })
    peer.on('error', (err: Error) => {
      debugLog(`Connection error (${connKey}...): ${errorMessage(err)}`)
    })
    peer.on('close', () => this.handleDisconnect(peer, conn))

    const hello = this.hello()
    if (hello) peer.write(encodeFrame(hello))
  }

  private handleDisconnect(peer: Peer, conn: Connection): void {
    this.connections.delete(peer)
    const userId = conn.userId
    if (!userId) return
    for (const other of this.connections.values()) {
      if (other.userId === userId) return
    }
    this.updateUser(userId, this.knownUsers.get(userId)?.displayName ?? null, 'offline')
  }

  private updateUser(userId: string, displayName: string | null, presence: UserPresence): void {
    const previous = this.knownUsers.get(userId)
    this.knownUsers.set(userId, { displayName, presence })
    if (previous?.presence === presence && previous.displayName === displayName) return
    const event: PresenceEvent = { userId, presence }
    if (displayName) event.displayName = displayName
    for (const handler of this.presenceHandlers) handler(event)
  }

  private handleFrame(conn: Connection, frame: Frame): void {
    if (frame.type === 'HELLO') {
      conn.userId = frame.userId
      this.updateUser(frame.userId, frame.displayName, frame.presence)
      for (const roomId of frame.rooms) this.joinedRooms.get(roomId)?.members.add(frame.userId)
      this.resendInvites(frame.userId)
      return
    }

    // every other frame speaks for the user that said HELLO on this connection
    const claimed = frame.type === 'INVITE' ? frame.inviter
      : frame.type === 'TEXT' || frame.type === 'TO_DEVICE' ? frame.sender
        : frame.userId
    if (!conn.userId || claimed !== conn.userId) return

    switch (frame.type) {
      case 'JOIN': {
        const room = this.joinedRooms.get(frame.roomId)
        if (room) {
          room.members.add(frame.userId)
          room.invited.delete(frame.userId)
        }
        break
      }
      case 'LEAVE':
        this.joinedRooms.get(frame.roomId)?.members.delete(frame.userId)
        break
      case 'PRESENCE':
        this.updateUser(frame.userId, frame.displayName, frame.presence)
        break
      case 'INVITE':
        this.handleInviteFrame(frame)
        break
      case 'TEXT': {
        const room = this.joinedRooms.get(frame.roomId)
        if (!room) break
        room.members.add(frame.sender)
        if (!this.listening) break
        room.deliver({
          type: 'm.room.message',
          sender: frame.sender,
          content: { msgtype: 'm.text', body: frame.body }
        })
        break
      }
      case 'TO_DEVICE':
        if (frame.recipient !== this.currentUserId) break
        for (const handler of this.toDeviceHandlers) {
          handler({ type: frame.eventType, sender: frame.sender, content: { body: frame.body } })
        }
        break
    }
  }

  private handleInviteFrame(frame: InviteFrame): void {
    const own = this.currentUserId
    if (frame.invitee !== own) return
    if (this.joinedRooms.has(frame.roomId)) return

    if (frame.inviterDisplayName) {
      const known = this.knownUsers.get(frame.inviter)
      this.knownUsers.set(frame.inviter, {
        displayName: frame.inviterDisplayName,
        presence: known?.presence ?? 'online'
      })
    }
    this.pendingInvites.set(frame.roomId, frame)

    const state: InviteState = {
      events: [
        { type: 'm.room.member', sender: frame.inviter, stateKey: own, content: { membership: 'invite' } },
        {
          type: 'm.room.member',
          sender: frame.inviter,
          stateKey: frame.inviter,
          content: { membership: 'join', displayname: frame.inviterDisplayName }
        },
        {
          type: 'm.room.join_rules',
          sender: frame.inviter,
          stateKey: '',
          content: { join_rule: frame.inviteOnly ? 'invite' : 'public' }
        }
      ]
    }
    for (const handler of this.inviteHandlers) handler(frame.roomId, state)
  }

  /** Invites sent while the invitee was offline are repeated when it says HELLO. */
  private resendInvites(userId: string): void {
    const inviter = this.currentUserId
    if (!inviter) return
    for (const room of this.joinedRooms.values()) {
      if (room.invited.has(userId) && !room.members.has(userId)) {
        this.broadcast(this.inviteFrame(room, inviter, userId))
      }
    }
  }
}
