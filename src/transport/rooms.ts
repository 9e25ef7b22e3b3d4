import PQueue from 'p-queue'
import { shortAddress, toChecksumAddress, type Address } from '../address.js'
import { TransportError, isChatRequestError, errorMessage } from '../errors.js'
import { Notifier } from '../notifier.js'
import { retryWithBackoff } from '../retry.js'
import { debugLog } from '../utils.js'
import type { AddressDirectory } from './directory.js'
import {
  serverNameFromUrl,
  type ChatClient,
  type ChatRoom,
  type ChatUser,
  type InviteState,
  type RoomListener,
  type StateEvent
} from './types.js'
import { makePeerRoomAlias, makeRoomAlias, validateUserIdSignature } from './userid.js'

export const ROOMS_ACCOUNT_DATA_KEY = 'network.ferry.rooms'
export const JOIN_RETRIES = 5
export const ROOM_JOIN_RETRY_INTERVAL = 100       // ms
export const ROOM_JOIN_RETRY_MULTIPLIER = 1.55
export const MAX_ROOMS_PER_ADDRESS = 3

const GLOBAL_JOIN_SKIP_CODES = [403, 404, 500]
const GLOBAL_CREATE_CONFLICT_CODES = [400, 409]

export interface RoomResolverOptions {
  client: ChatClient
  directory: AddressDirectory
  ownAddress: Address
  chainId: number
  privateRooms: boolean
  globalRoomSuffixes: readonly string[]
  /** Server names (host[:port]) tried after our own for global rooms. */
  fallbackServers: readonly string[]
  onRoomMessage: RoomListener
}

class PeerNotJoinedError extends Error {
  constructor() {
    super('Peer has not joined yet')
    this.name = 'PeerNotJoinedError'
  }
}

type RoomMapping = Record<string, string[]>

function readRoomMapping(data: unknown): RoomMapping {
  const mapping: RoomMapping = {}
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return mapping
  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      mapping[key] = value.filter((id): id is string => typeof id === 'string')
    }
  }
  return mapping
}

function aliasLocalPart(alias: string): string {
  const colon = alias.indexOf(':')
  return alias.slice(alias.startsWith('#') ? 1 : 0, colon === -1 ? undefined : colon)
}

function findStateEvent(
  events: readonly StateEvent[],
  predicate: (event: StateEvent) => boolean
): StateEvent | undefined {
  return events.find(predicate)
}

/**
 * Finds or creates the room shared with each peer, persists the choice in
 * account data and keeps the set of joined global rooms.
 */
export class RoomResolver {
  readonly globalRooms = new Map<string, ChatRoom>()

  private readonly client: ChatClient
  private readonly directory: AddressDirectory
  private readonly ownAddress: Address
  private readonly chainId: number
  private readonly privateRooms: boolean
  private readonly globalRoomSuffixes: readonly string[]
  private readonly globalAliases: Set<string>
  private readonly fallbackServers: readonly string[]
  private readonly onRoomMessage: RoomListener

  private readonly roomLock = new PQueue({ concurrency: 1 })
  private readonly accountDataLock = new PQueue({ concurrency: 1 })
  private readonly globalRoomLock = new PQueue({ concurrency: 1 })
  private readonly stopped = new Notifier()
  private starting = true
  private pendingInvites: Array<[string, InviteState]> = []

  constructor(options: RoomResolverOptions) {
    this.client = options.client
    this.directory = options.directory
    this.ownAddress = options.ownAddress
    this.chainId = options.chainId
    this.privateRooms = options.privateRooms
    this.globalRoomSuffixes = options.globalRoomSuffixes
    this.globalAliases = new Set(options.globalRoomSuffixes.map(suffix => makeRoomAlias(options.chainId, suffix)))
    this.fallbackServers = options.fallbackServers
    this.onRoomMessage = options.onRoomMessage
  }

  get isStopped(): boolean {
    return this.stopped.isSet
  }

  stop(): void {
    this.stopped.set()
    this.pendingInvites = []
  }

  /** Sleep that ends early and reports `true` once the resolver stops. */
  private readonly interruptibleSleep = (ms: number): Promise<boolean> => this.stopped.wait(ms)

  private get ownServer(): string {
    return serverNameFromUrl(this.client.baseUrl)
  }

  isGlobalRoomSuffix(suffix: string): boolean {
    return this.globalRoomSuffixes.includes(suffix)
  }

  isRoomGlobal(room: ChatRoom): boolean {
    for (const globalRoom of this.globalRooms.values()) {
      if (globalRoom.roomId === room.roomId) return true
    }
    const aliases = room.canonicalAlias ? [...room.aliases, room.canonicalAlias] : room.aliases
    return aliases.some(alias => this.globalAliases.has(aliasLocalPart(alias)))
  }

  private attachListener(room: ChatRoom): void {
    if (room.listenerCount === 0) room.addListener(this.onRoomMessage)
  }

  /** Attach the message listener to every joined room that is not global. */
  inventoryRooms(): void {
    for (const room of this.client.rooms.values()) {
      if (this.isRoomGlobal(room)) continue
      this.attachListener(room)
    }
  }

  // ---- global rooms ----

  /** The joined global room for `suffix`, joining it first if needed. */
  async ensureGlobalRoom(suffix: string): Promise<ChatRoom> {
    return this.globalRoomLock.add(async () => {
      const known = this.globalRooms.get(suffix)
      if (known) return known
      const room = await this.joinGlobalRoom(suffix)
      this.globalRooms.set(suffix, room)
      return room
    }, { throwOnTimeout: true })
  }

  async joinGlobalRoom(suffix: string): Promise<ChatRoom> {
    const alias = makeRoomAlias(this.chainId, suffix)
    const ownAlias = `#${alias}:${this.ownServer}`
    const servers = [...new Set([this.ownServer, ...this.fallbackServers])]

    for (const server of servers) {
      const fullAlias = `#${alias}:${server}`
      try {
        const room = await this.client.joinRoom(fullAlias)
        if (server !== this.ownServer && !room.aliases.includes(ownAlias)) {
          await room.addRoomAlias(ownAlias)
        }
        console.log(`Joined global room ${fullAlias}`)
        return room
      } catch (err) {
        if (!isChatRequestError(err, GLOBAL_JOIN_SKIP_CODES)) throw err
        debugLog(`Global room ${fullAlias} not available: ${errorMessage(err)}`)
      }
    }

    try {
      const room = await this.client.createRoom({ alias, isPublic: true })
      console.log(`Created global room ${ownAlias}`)
      return room
    } catch (err) {
      if (!isChatRequestError(err, GLOBAL_CREATE_CONFLICT_CODES)) throw err
      debugLog(`Global room ${ownAlias} created concurrently, joining it`)
    }

    const joined = await retryWithBackoff(() => this.client.joinRoom(ownAlias), {
      attempts: JOIN_RETRIES,
      interval: ROOM_JOIN_RETRY_INTERVAL,
      isRetryable: err => isChatRequestError(err, GLOBAL_JOIN_SKIP_CODES),
      sleep: this.interruptibleSleep
    })
    if (joined.ok) return joined.value
    throw new TransportError(`Could not join or create global room ${ownAlias}`)
  }

  // ---- room mapping ----

  getRoomIdsForAddress(address: Address, filterPrivate: boolean = this.privateRooms): string[] {
    const mapping = readRoomMapping(this.client.getAccountData(ROOMS_ACCOUNT_DATA_KEY))
    const roomIds = mapping[toChecksumAddress(address)] ?? []
    if (!filterPrivate) return roomIds
    return roomIds.filter(roomId => this.client.rooms.get(roomId)?.inviteOnly === true)
  }

  /**
   * Move `roomId` to the front of the address's rooms, or forget them all
   * with `null`. Rooms pushed past the retention cap are left.
   */
  async setRoomIdForAddress(address: Address, roomId: string | null): Promise<void> {
    await this.accountDataLock.add(async () => {
      const mapping = readRoomMapping(this.client.getAccountData(ROOMS_ACCOUNT_DATA_KEY))
      const key = toChecksumAddress(address)
      const existing = mapping[key] ?? []

      let evicted: string[] = []
      if (roomId === null) {
        if (!(key in mapping)) return
        delete mapping[key]
      } else {
        if (existing[0] === roomId) return
        const roomIds = [roomId, ...existing.filter(id => id !== roomId)]
        mapping[key] = roomIds.slice(0, MAX_ROOMS_PER_ADDRESS)
        evicted = roomIds.slice(MAX_ROOMS_PER_ADDRESS)
      }

      await this.client.setAccountData(ROOMS_ACCOUNT_DATA_KEY, mapping)
      await this.leaveUnusedRooms(evicted, mapping)
    }, { throwOnTimeout: true })
  }

  private async leaveUnusedRooms(roomIds: string[], mapping: RoomMapping): Promise<void> {
    const inUse = new Set(Object.values(mapping).flat())
    for (const roomId of roomIds) {
      const room = this.client.rooms.get(roomId)
      if (!room || inUse.has(roomId) || this.isRoomGlobal(room)) continue
      try {
        await this.client.leaveRoom(roomId)
        debugLog(`Left unused room ${roomId}`)
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        console.warn(`Could not leave room ${roomId}: ${errorMessage(err)}`)
      }
    }
  }

  // ---- peer rooms ----

  async getRoomForAddress(address: Address): Promise<ChatRoom | null> {
    if (this.isStopped) return null
    return this.roomLock.add(() => this.resolveRoom(address), { throwOnTimeout: true })
  }

  private async resolveRoom(address: Address): Promise<ChatRoom | null> {
    if (this.isStopped) return null

    for (const roomId of this.getRoomIdsForAddress(address)) {
      const room = this.client.rooms.get(roomId)
      if (!room) continue
      if (this.isRoomGlobal(room)) {
        console.warn(`Global room ${roomId} stored for ${shortAddress(address)}, skipping it`)
        continue
      }
      this.attachListener(room)
      return room
    }

    const candidates = await this.findPeerUsers(address)
    if (candidates.length === 0) {
      console.warn(`No valid chat user found for ${shortAddress(address)}`)
      return null
    }
    const peerIds = candidates.map(user => user.userId)
    this.directory.addUserIdsForAddress(address, peerIds)

    const room = this.privateRooms
      ? await this.createPrivateRoom(peerIds)
      : await this.getPublicRoom(makePeerRoomAlias(this.chainId, this.ownAddress, address), peerIds)
    if (!room) return null

    await this.waitForPeerJoin(room, address, new Set(peerIds))
    await this.setRoomIdForAddress(address, room.roomId)
    this.attachListener(room)
    debugLog(`Resolved room ${room.roomId} for ${shortAddress(address)}`)
    return room
  }

  private async findPeerUsers(address: Address): Promise<ChatUser[]> {
    const results = await this.client.searchUserDirectory(address)
    return results.filter(user => validateUserIdSignature(user) === address)
  }

  private async createPrivateRoom(invitees: string[]): Promise<ChatRoom> {
    const room = await this.client.createRoom({ invitees, isPublic: false })
    room.inviteOnly = true
    debugLog(`Created private room ${room.roomId}`)
    return room
  }

  private async getPublicRoom(alias: string, invitees: string[]): Promise<ChatRoom | null> {
    const fullAlias = `#${alias}:${this.ownServer}`

    for (let attempt = 0; attempt < JOIN_RETRIES; attempt++) {
      if (this.isStopped) return null
      try {
        const room = await this.client.joinRoom(fullAlias)
        await this.inviteMissing(room, invitees)
        return room
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        debugLog(err.code === 404
          ? `No room ${fullAlias} yet, creating it`
          : `Could not join ${fullAlias}: ${errorMessage(err)}`)
      }
      try {
        const room = await this.client.createRoom({ alias, invitees, isPublic: true })
        debugLog(`Created public room ${fullAlias}`)
        return room
      } catch (err) {
        if (!isChatRequestError(err)) throw err
        debugLog(err.code === 409
          ? `Room ${fullAlias} was created by the peer, joining it`
          : `Could not create ${fullAlias}: ${errorMessage(err)}`)
      }
    }

    console.warn(`Could not join or create ${fullAlias}, creating an unnamed public room`)
    return this.client.createRoom({ invitees, isPublic: true })
  }

  private async inviteMissing(room: ChatRoom, invitees: string[]): Promise<void> {
    const members = new Set((await room.getJoinedMembers()).map(user => user.userId))
    for (const userId of invitees) {
      if (!members.has(userId)) await room.inviteUser(userId)
    }
  }

  /**
   * Poll the member list until one of `peerIds` has joined. Gives up with a
   * warning; a request error on the last poll is raised.
   */
  private async waitForPeerJoin(room: ChatRoom, address: Address, peerIds: Set<string>): Promise<void> {
    const result = await retryWithBackoff(async () => {
      const members = await room.getJoinedMembers(true)
      if (!members.some(user => peerIds.has(user.userId))) {
        throw new PeerNotJoinedError()
      }
    }, {
      attempts: JOIN_RETRIES,
      interval: ROOM_JOIN_RETRY_INTERVAL,
      multiplier: ROOM_JOIN_RETRY_MULTIPLIER,
      isRetryable: err => err instanceof PeerNotJoinedError || isChatRequestError(err),
      sleep: this.interruptibleSleep
    })
    if (result.ok) return
    if (isChatRequestError(result.error)) throw result.error
    console.warn(`Peer ${shortAddress(address)} has not joined room ${room.roomId}, sending anyway`)
  }

  // ---- invites ----

  /** Invites seen while starting wait here until `finishStartup`. */
  finishStartup(): Array<[string, InviteState]> {
    this.starting = false
    const queued = this.pendingInvites
    this.pendingInvites = []
    return queued
  }

  async handleInvite(roomId: string, state: InviteState): Promise<void> {
    if (this.isStopped) return
    if (this.starting) {
      this.pendingInvites.push([roomId, state])
      return
    }

    const ownUserId = this.client.userId
    const invite = findStateEvent(state.events, event =>
      event.type === 'm.room.member' &&
      event.stateKey === ownUserId &&
      event.content.membership === 'invite'
    )
    if (!invite) {
      debugLog(`Invite to ${roomId} without a membership event for us`)
      return
    }

    const inviter = this.client.getUser(invite.sender)
    const peerAddress = validateUserIdSignature(inviter)
    if (!peerAddress) {
      debugLog(`Ignoring invite to ${roomId} from ${invite.sender}: invalid signature`)
      return
    }
    if (!this.directory.isAddressKnown(peerAddress)) {
      debugLog(`Ignoring invite to ${roomId} from unknown address ${shortAddress(peerAddress)}`)
      return
    }

    const inviterJoined = findStateEvent(state.events, event =>
      event.type === 'm.room.member' &&
      event.stateKey === inviter.userId &&
      event.content.membership === 'join'
    )
    if (!inviterJoined) {
      debugLog(`Ignoring invite to ${roomId}: inviter is not a member`)
      return
    }

    const joinRules = findStateEvent(state.events, event => event.type === 'm.room.join_rules')
    const inviteOnly = joinRules?.content.join_rule === 'invite'

    const joined = await retryWithBackoff(() => this.client.joinRoom(roomId), {
      attempts: JOIN_RETRIES,
      interval: ROOM_JOIN_RETRY_INTERVAL,
      isRetryable: err => isChatRequestError(err),
      sleep: this.interruptibleSleep
    })
    if (!joined.ok) throw joined.error

    const room = joined.value
    room.inviteOnly = inviteOnly
    this.directory.addUserIdsForAddress(peerAddress, [inviter.userId])
    this.attachListener(room)
    await this.setRoomIdForAddress(peerAddress, room.roomId)
    console.log(`Joined room ${roomId} on invite from ${shortAddress(peerAddress)}`)
  }

  /**
   * Re-invite `user` when it is missing from the front room of its address,
   * e.g. after it came back online on a fresh account.
   */
  async maybeInviteUser(user: ChatUser): Promise<void> {
    if (this.isStopped) return
    const address = validateUserIdSignature(user)
    if (!address) return

    const [roomId] = this.getRoomIdsForAddress(address)
    const room = roomId ? this.client.rooms.get(roomId) : undefined
    if (!room) return

    try {
      const members = await room.getJoinedMembers()
      if (members.some(member => member.userId === user.userId)) return
      await room.inviteUser(user.userId)
      debugLog(`Re-invited ${user.userId} to ${room.roomId}`)
    } catch (err) {
      if (!isChatRequestError(err)) throw err
      console.warn(`Could not invite ${user.userId} to ${room.roomId}: ${errorMessage(err)}`)
    }
  }
}
