import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { Signer } from '../../src/crypto.js'
import { generateIdentity } from '../../src/identity.js'
import { DEFAULT_TRANSPORT_CONFIG, type TransportConfig } from '../../src/config.js'
import type { MemoryChatNetwork } from './memory-network.js'

export const SERVER_URL = 'https://alpha.test'
export const SERVER_NAME = 'alpha.test'
export const FALLBACK_URL = 'https://beta.test'

/** Deterministic signer: every byte of the key seed is `n`. */
export function makeSigner(n: number): Signer {
  return new Signer(generateIdentity(Buffer.alloc(32, n)))
}

export function userIdFor(signer: Signer, server: string = SERVER_NAME): string {
  return `@${signer.address}:${server}`
}

/** Register `signer` as a chat user proving its address. */
export function addPeerUser(
  network: MemoryChatNetwork,
  signer: Signer,
  presence: 'online' | 'offline' = 'online',
  server: string = SERVER_NAME
): string {
  const userId = userIdFor(signer, server)
  network.addUser(userId, signer.sign(userId), presence)
  return userId
}

export function testConfig(overrides: Partial<TransportConfig> = {}): TransportConfig {
  return {
    ...DEFAULT_TRANSPORT_CONFIG,
    server: SERVER_URL,
    availableServers: [SERVER_URL, FALLBACK_URL],
    retryInterval: 1000,
    stopTimeout: 2000,
    ...overrides
  }
}

export function tempDir(prefix: string = 'ferry-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

/** Poll `predicate` until it holds or `timeoutMs` passes. */
export async function waitFor(predicate: () => boolean, timeoutMs: number = 2000, label: string = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`Timed out waiting for ${label}`)
    await new Promise(resolve => setTimeout(resolve, 5))
  }
}

/** Clock the tests move by hand. */
export class ManualClock {
  constructor(public current: number = 1_000_000) {}

  now = (): number => this.current

  advance(ms: number): void {
    this.current += ms
  }
}
