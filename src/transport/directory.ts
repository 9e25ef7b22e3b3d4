import { shortAddress, type Address } from '../address.js'
import { debugLog } from '../utils.js'
import { validateUserIdSignature } from './userid.js'
import type {
  ChatClient,
  ChatUser,
  PeerReachability,
  PresenceEvent,
  UserPresence
} from './types.js'

export type ReachabilityChangeHandler = (address: Address, reachability: PeerReachability) => void
export type UserPresenceChangeHandler = (user: ChatUser, presence: UserPresence) => void

export type ReachabilitySummary = Record<PeerReachability, number>

/** Reachability of an address from the presences of all its users. */
export function reachabilityFromPresences(presences: Iterable<UserPresence>): PeerReachability {
  let sawOffline = false
  for (const presence of presences) {
    if (presence === 'online' || presence === 'unavailable') return 'reachable'
    if (presence === 'offline') sawOffline = true
  }
  return sawOffline ? 'unreachable' : 'unknown'
}

/**
 * Whitelisted addresses, the chat users that proved to own them and the
 * reachability derived from those users' presence.
 */
export class AddressDirectory {
  private readonly addresses = new Set<Address>()
  private readonly userIdsByAddress = new Map<Address, Set<string>>()
  private readonly presenceByUserId = new Map<string, UserPresence>()
  private readonly reachabilityByAddress = new Map<Address, PeerReachability>()
  private client: ChatClient | null = null
  private listening = false

  constructor(
    private readonly onReachabilityChange: ReachabilityChangeHandler,
    private readonly onUserPresenceChange?: UserPresenceChangeHandler
  ) {}

  start(client: ChatClient): void {
    if (this.client !== client) {
      this.client = client
      client.onPresence(event => this.handlePresence(event))
    }
    this.listening = true
  }

  stop(): void {
    this.listening = false
  }

  get knownAddresses(): Address[] {
    return [...this.addresses]
  }

  addAddress(address: Address): void {
    this.addresses.add(address)
  }

  isAddressKnown(address: Address): boolean {
    return this.addresses.has(address)
  }

  addUserIdsForAddress(address: Address, userIds: Iterable<string>): void {
    let known = this.userIdsByAddress.get(address)
    if (!known) {
      known = new Set()
      this.userIdsByAddress.set(address, known)
    }
    for (const userId of userIds) known.add(userId)
  }

  getUserIdsForAddress(address: Address): string[] {
    return [...(this.userIdsByAddress.get(address) ?? [])]
  }

  getUserPresence(userId: string): UserPresence {
    return this.presenceByUserId.get(userId) ?? 'unknown'
  }

  getAddressReachability(address: Address): PeerReachability {
    return this.reachabilityByAddress.get(address) ?? 'unknown'
  }

  /** Override the cached presence of one user without asking the network. */
  forceUserPresence(user: ChatUser, presence: UserPresence): void {
    this.presenceByUserId.set(user.userId, presence)
  }

  /** Ask the network for the presence of every user of `address` not seen yet. */
  async fetchAddressPresence(address: Address): Promise<void> {
    const client = this.client
    if (!client) return
    for (const userId of this.getUserIdsForAddress(address)) {
      if (this.presenceByUserId.has(userId)) continue
      this.presenceByUserId.set(userId, await client.getPresence(userId))
    }
  }

  refreshAddressPresence(address: Address): void {
    const presences = this.getUserIdsForAddress(address).map(userId => this.getUserPresence(userId))
    this.setReachability(address, reachabilityFromPresences(presences))
  }

  setReachability(address: Address, reachability: PeerReachability): void {
    const previous = this.getAddressReachability(address)
    if (previous === reachability) return

    this.reachabilityByAddress.set(address, reachability)
    debugLog(`Reachability of ${shortAddress(address)}: ${previous} -> ${reachability}`)
    this.onReachabilityChange(address, reachability)
  }

  statusSummary(): ReachabilitySummary {
    const summary: ReachabilitySummary = { reachable: 0, unreachable: 0, unknown: 0 }
    for (const address of this.addresses) {
      summary[this.getAddressReachability(address)]++
    }
    return summary
  }

  private handlePresence(event: PresenceEvent): void {
    if (!this.listening || !this.client) return

    const cached = this.client.getUser(event.userId)
    const user: ChatUser = {
      userId: event.userId,
      displayName: event.displayName ?? cached.displayName
    }
    const address = validateUserIdSignature(user)
    if (!address || !this.isAddressKnown(address)) return

    this.addUserIdsForAddress(address, [user.userId])

    const previous = this.presenceByUserId.get(user.userId)
    this.presenceByUserId.set(user.userId, event.presence)
    if (previous !== event.presence) {
      this.onUserPresenceChange?.(user, event.presence)
    }

    this.refreshAddressPresence(address)
  }
}
