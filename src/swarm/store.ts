import fs from 'node:fs'
import path from 'node:path'
import crypto from 'hypercore-crypto'
import { ensureConfigDir } from '../config.js'

export interface StoredRoom {
  roomId: string
  aliases: string[]
  inviteOnly: boolean
}

interface StoredAccount {
  passwordHash: string
  accessToken: string | null
  displayName: string | null
}

interface StoreData {
  accounts: Record<string, StoredAccount>                       // userId -> account
  accountData: Record<string, Record<string, unknown>>          // userId -> type -> content
  rooms: Record<string, StoredRoom[]>                           // userId -> joined rooms
}

function emptyData(): StoreData {
  return { accounts: {}, accountData: {}, rooms: {} }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function hashPassword(password: string): string {
  return crypto.hash(Buffer.from(password, 'utf8')).toString('hex')
}

/** Accounts, account data and joined rooms of the swarm client, kept as one JSON file. */
export class SwarmStore {
  private data: StoreData

  constructor(private readonly file: string | null) {
    this.data = file ? this.load(file) : emptyData()
  }

  static forServer(dataDir: string, serverName: string): SwarmStore {
    const safe = serverName.replace(/[^a-zA-Z0-9.-]/g, '_')
    return new SwarmStore(path.join(dataDir, `swarm-${safe}.json`))
  }

  static inMemory(): SwarmStore {
    return new SwarmStore(null)
  }

  private load(file: string): StoreData {
    try {
      if (!fs.existsSync(file)) return emptyData()
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
      if (!isRecord(parsed)) return emptyData()
      const data = emptyData()
      if (isRecord(parsed.accounts)) data.accounts = parsed.accounts as Record<string, StoredAccount>
      if (isRecord(parsed.accountData)) data.accountData = parsed.accountData as Record<string, Record<string, unknown>>
      if (isRecord(parsed.rooms)) data.rooms = parsed.rooms as Record<string, StoredRoom[]>
      return data
    } catch (err) {
      console.error(`Failed to load swarm store ${file}:`, err)
      return emptyData()
    }
  }

  private save(): void {
    if (!this.file) return
    try {
      ensureConfigDir(path.dirname(this.file))
      fs.writeFileSync(this.file, JSON.stringify(this.data, null, 2))
    } catch (err) {
      console.error(`Failed to save swarm store ${this.file}:`, err)
    }
  }

  hasAccount(userId: string): boolean {
    return userId in this.data.accounts
  }

  createAccount(userId: string, password: string): void {
    this.data.accounts[userId] = { passwordHash: hashPassword(password), accessToken: null, displayName: null }
    this.save()
  }

  checkPassword(userId: string, password: string): boolean {
    return this.data.accounts[userId]?.passwordHash === hashPassword(password)
  }

  issueAccessToken(userId: string): string {
    const account = this.data.accounts[userId]
    if (!account) throw new Error(`No account ${userId}`)
    account.accessToken = crypto.randomBytes(16).toString('hex')
    this.save()
    return account.accessToken
  }

  checkAccessToken(userId: string, accessToken: string): boolean {
    const stored = this.data.accounts[userId]?.accessToken
    return stored !== undefined && stored !== null && stored === accessToken
  }

  getDisplayName(userId: string): string | null {
    return this.data.accounts[userId]?.displayName ?? null
  }

  setDisplayName(userId: string, displayName: string): void {
    const account = this.data.accounts[userId]
    if (!account) return
    account.displayName = displayName
    this.save()
  }

  getAccountData(userId: string, type: string): unknown {
    return this.data.accountData[userId]?.[type]
  }

  setAccountData(userId: string, type: string, content: Record<string, unknown>): void {
    const forUser = this.data.accountData[userId] ?? {}
    forUser[type] = content
    this.data.accountData[userId] = forUser
    this.save()
  }

  getRooms(userId: string): StoredRoom[] {
    return this.data.rooms[userId] ?? []
  }

  putRoom(userId: string, room: StoredRoom): void {
    const rooms = this.getRooms(userId).filter(r => r.roomId !== room.roomId)
    rooms.push(room)
    this.data.rooms[userId] = rooms
    this.save()
  }

  removeRoom(userId: string, roomId: string): void {
    this.data.rooms[userId] = this.getRooms(userId).filter(r => r.roomId !== roomId)
    this.save()
  }
}
