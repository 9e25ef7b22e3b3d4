export type UserPresence = 'online' | 'unavailable' | 'offline' | 'unknown'

export type PeerReachability = 'unknown' | 'reachable' | 'unreachable'

export interface ChatUser {
  userId: string
  displayName: string | null
}

export interface RoomMessageEvent {
  type: string                 // 'm.room.message' for text
  sender: string               // user id
  content: {
    msgtype?: string           // 'm.text'
    body?: unknown
  }
}

export interface StateEvent {
  type: string                 // 'm.room.member', 'm.room.join_rules', ...
  sender: string
  stateKey?: string
  content: Record<string, unknown>
}

/** Stripped room state delivered with an invite. */
export interface InviteState {
  events: StateEvent[]
}

export interface PresenceEvent {
  userId: string
  presence: UserPresence
  displayName?: string
}

export interface ToDeviceEvent {
  type: string
  sender: string
  content: {
    body?: unknown
  }
}

export type RoomListener = (room: ChatRoom, event: RoomMessageEvent) => void

export interface ChatRoom {
  readonly roomId: string
  readonly aliases: readonly string[]
  readonly canonicalAlias: string | null
  inviteOnly: boolean
  readonly listenerCount: number
  addListener(listener: RoomListener): void
  /** Members currently joined; `force` bypasses any cached member list. */
  getJoinedMembers(force?: boolean): Promise<ChatUser[]>
  inviteUser(userId: string): Promise<void>
  sendText(text: string): Promise<void>
  /** Publish `alias` (full `#local:server` form) for this room. */
  addRoomAlias(alias: string): Promise<boolean>
}

export interface CreateRoomOptions {
  alias?: string               // local part only
  invitees?: string[]
  isPublic: boolean
}

/**
 * Room-based pub/sub network client. Request failures reject with
 * `ChatRequestError` carrying a status code.
 */
export interface ChatClient {
  readonly baseUrl: string
  readonly userId: string | null
  readonly accessToken: string | null
  readonly rooms: ReadonlyMap<string, ChatRoom>

  /** Resolves when the server answers; used to pick a server from the pool. */
  checkServer(): Promise<void>
  login(username: string, password: string): Promise<void>
  register(username: string, password: string): Promise<void>
  useAccessToken(userId: string, accessToken: string): void
  /** Rejects when the current access token is not (or no longer) valid. */
  checkSession(): Promise<void>
  /** Initial sync: joined rooms, account data, pending invites. */
  sync(): Promise<void>
  setDisplayName(displayName: string): Promise<void>

  getUser(userId: string): ChatUser
  searchUserDirectory(term: string): Promise<ChatUser[]>
  getPresence(userId: string): Promise<UserPresence>

  joinRoom(roomIdOrAlias: string): Promise<ChatRoom>
  createRoom(options: CreateRoomOptions): Promise<ChatRoom>
  leaveRoom(roomId: string): Promise<void>

  getAccountData(type: string): unknown
  setAccountData(type: string, content: Record<string, unknown>): Promise<void>

  setPresence(presence: UserPresence): Promise<void>
  /** `messages` maps user id -> device id ('*' for all) -> content. */
  sendToDevice(eventType: string, messages: Record<string, Record<string, string>>): Promise<void>

  onInvite(handler: (roomId: string, state: InviteState) => void): void
  onPresence(handler: (event: PresenceEvent) => void): void
  onToDevice(handler: (event: ToDeviceEvent) => void): void

  startListening(): void
  stop(): Promise<void>
}

export function serverNameFromUrl(baseUrl: string): string {
  return new URL(baseUrl).host
}
