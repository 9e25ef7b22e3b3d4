import { StringDecoder } from 'node:string_decoder'
import type { UserPresence } from '../transport/types.js'

export interface HelloFrame {
  type: 'HELLO'
  userId: string
  displayName: string | null
  presence: UserPresence
  rooms: string[]             // joined room ids
}

export interface JoinFrame {
  type: 'JOIN'
  roomId: string
  userId: string
  aliases: string[]
}

export interface LeaveFrame {
  type: 'LEAVE'
  roomId: string
  userId: string
}

export interface InviteFrame {
  type: 'INVITE'
  roomId: string
  inviter: string
  inviterDisplayName: string | null
  invitee: string
  inviteOnly: boolean
  aliases: string[]
}

export interface TextFrame {
  type: 'TEXT'
  roomId: string
  sender: string
  body: string
}

export interface PresenceFrame {
  type: 'PRESENCE'
  userId: string
  displayName: string | null
  presence: UserPresence
}

export interface ToDeviceFrame {
  type: 'TO_DEVICE'
  eventType: string
  sender: string
  recipient: string
  body: string
}

export type Frame =
  | HelloFrame
  | JoinFrame
  | LeaveFrame
  | InviteFrame
  | TextFrame
  | PresenceFrame
  | ToDeviceFrame

const PRESENCES: readonly UserPresence[] = ['online', 'unavailable', 'offline', 'unknown']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function str(obj: Record<string, unknown>, field: string): string | null {
  const value = obj[field]
  return typeof value === 'string' ? value : null
}

function strOrNull(obj: Record<string, unknown>, field: string): string | null | undefined {
  const value = obj[field]
  if (value === null) return null
  return typeof value === 'string' ? value : undefined
}

function strList(obj: Record<string, unknown>, field: string): string[] | null {
  const value = obj[field]
  if (!Array.isArray(value)) return null
  return value.every((item): item is string => typeof item === 'string') ? value : null
}

function presence(obj: Record<string, unknown>): UserPresence | null {
  const value = obj.presence
  return PRESENCES.find(p => p === value) ?? null
}

export function encodeFrame(frame: Frame): string {
  return JSON.stringify(frame) + '\n'
}

/** Decode one line; null for anything that is not a well-formed frame. */
export function decodeFrame(line: string): Frame | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null

  switch (parsed.type) {
    case 'HELLO': {
      const userId = str(parsed, 'userId')
      const displayName = strOrNull(parsed, 'displayName')
      const state = presence(parsed)
      const rooms = strList(parsed, 'rooms')
      if (!userId || displayName === undefined || !state || !rooms) return null
      return { type: 'HELLO', userId, displayName, presence: state, rooms }
    }
    case 'JOIN': {
      const roomId = str(parsed, 'roomId')
      const userId = str(parsed, 'userId')
      const aliases = strList(parsed, 'aliases')
      if (!roomId || !userId || !aliases) return null
      return { type: 'JOIN', roomId, userId, aliases }
    }
    case 'LEAVE': {
      const roomId = str(parsed, 'roomId')
      const userId = str(parsed, 'userId')
      if (!roomId || !userId) return null
      return { type: 'LEAVE', roomId, userId }
    }
    case 'INVITE': {
      const roomId = str(parsed, 'roomId')
      const inviter = str(parsed, 'inviter')
      const inviterDisplayName = strOrNull(parsed, 'inviterDisplayName')
      const invitee = str(parsed, 'invitee')
      const aliases = strList(parsed, 'aliases')
      const inviteOnly = parsed.inviteOnly
      if (!roomId || !inviter || inviterDisplayName === undefined || !invitee || !aliases) return null
      if (typeof inviteOnly !== 'boolean') return null
      return { type: 'INVITE', roomId, inviter, inviterDisplayName, invitee, inviteOnly, aliases }
    }
    case 'TEXT': {
      const roomId = str(parsed, 'roomId')
      const sender = str(parsed, 'sender')
      const body = str(parsed, 'body')
      if (!roomId || !sender || body === null) return null
      return { type: 'TEXT', roomId, sender, body }
    }
    case 'PRESENCE': {
      const userId = str(parsed, 'userId')
      const displayName = strOrNull(parsed, 'displayName')
      const state = presence(parsed)
      if (!userId || displayName === undefined || !state) return null
      return { type: 'PRESENCE', userId, displayName, presence: state }
    }
    case 'TO_DEVICE': {
      const eventType = str(parsed, 'eventType')
      const sender = str(parsed, 'sender')
      const recipient = str(parsed, 'recipient')
      const body = str(parsed, 'body')
      if (!eventType || !sender || !recipient || body === null) return null
      return { type: 'TO_DEVICE', eventType, sender, recipient, body }
    }
    default:
      return null
  }
}

/**
 * Splits a byte stream into frames. Keeps the trailing partial line, and any
 * partial UTF-8 character, until the rest arrives.
 */
export class FrameDecoder {
  private buffer = ''
  private readonly utf8 = new StringDecoder('utf8')

  push(data: Buffer | string): Frame[] {
    this.buffer += typeof data === 'string' ? data : this.utf8.write(data)
    const lines = this.buffer.split('\n')
    this.buffer = lines.pop() ?? ''

    const frames: Frame[] = []
    for (const line of lines) {
      if (!line.trim()) continue
      const frame = decodeFrame(line)
      if (frame) frames.push(frame)
    }
    return frames
  }
}
