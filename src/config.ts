import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { validateAddress, toAddress, type Address } from './address.js'
import { TransportError } from './errors.js'

export interface Config {
  server?: string                   // 'auto' or http(s) URL
  availableServers?: string[]
  chainId?: number
  retryInterval?: number            // ms
  retriesBeforeBackoff?: number
  globalRooms?: string[]
  privateRooms?: boolean
  stopTimeout?: number              // ms
  peers?: Record<string, string>    // alias -> address
  debug?: boolean
}

/** Config with every default applied, as consumed by the transport. */
export interface TransportConfig {
  server: string
  availableServers: string[]
  chainId: number
  retryInterval: number
  retriesBeforeBackoff: number
  globalRooms: string[]
  privateRooms: boolean
  stopTimeout: number
}

export interface ConfigValidationError {
  field: string
  message: string
}

export const DISCOVERY_DEFAULT_ROOM = 'discovery'
export const MONITORING_BROADCASTING_ROOM = 'monitoring'
export const PATH_FINDING_BROADCASTING_ROOM = 'path_finding'

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  server: 'auto',
  availableServers: [
    'https://transport01.ferry.network',
    'https://transport02.ferry.network'
  ],
  chainId: 1,
  retryInterval: 5000,
  retriesBeforeBackoff: 5,
  globalRooms: [DISCOVERY_DEFAULT_ROOM, MONITORING_BROADCASTING_ROOM, PATH_FINDING_BROADCASTING_ROOM],
  privateRooms: false,
  stopTimeout: 10_000
}

const CONFIG_FILE = 'config.json'
const ROOM_SUFFIX_PATTERN = /^[a-z0-9_]+$/

export function getConfigDir(): string {
  return process.env.FERRY_HOME ?? path.join(os.homedir(), '.ferry')
}

export function getConfigPath(dir: string = getConfigDir()): string {
  return path.join(dir, CONFIG_FILE)
}

export function ensureConfigDir(dir: string = getConfigDir()): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
}

export function validateAlias(alias: string): string | null {
  if (!alias) return 'Alias is required'
  if (/^0x[a-f0-9]{40}$/i.test(alias)) {
    return 'Alias cannot look like an address'
  }
  if (alias.length > 32) return 'Alias must be 32 characters or less'
  if (!/^[a-zA-Z0-9._-]+$/.test(alias)) {
    return 'Alias can only contain letters, numbers, dots, underscores, and hyphens'
  }
  return null
}

export function validateServerUrl(server: string): string | null {
  if (server === 'auto') return null
  try {
    const url = new URL(server)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return 'Server must be "auto" or an http(s) URL'
    }
    return null
  } catch {
    return 'Server must be "auto" or an http(s) URL'
  }
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config as Record<string, unknown>

  if (c.server !== undefined) {
    if (typeof c.server !== 'string') {
      errors.push({ field: 'server', message: 'Server must be a string' })
    } else {
      const serverError = validateServerUrl(c.server)
      if (serverError) errors.push({ field: 'server', message: serverError })
    }
  }

  if (c.availableServers !== undefined) {
    if (!Array.isArray(c.availableServers)) {
      errors.push({ field: 'availableServers', message: 'availableServers must be an array' })
    } else {
      c.availableServers.forEach((server: unknown, i) => {
        if (typeof server !== 'string' || server === 'auto' || validateServerUrl(server)) {
          errors.push({ field: `availableServers.${i}`, message: 'Server must be an http(s) URL' })
        }
      })
    }
  }

  if (c.chainId !== undefined && !isPositiveInteger(c.chainId)) {
    errors.push({ field: 'chainId', message: 'chainId must be a positive integer' })
  }

  for (const field of ['retryInterval', 'stopTimeout'] as const) {
    if (c[field] !== undefined && !isPositiveInteger(c[field])) {
      errors.push({ field, message: `${field} must be a positive integer (ms)` })
    }
  }

  if (c.retriesBeforeBackoff !== undefined) {
    const value = c.retriesBeforeBackoff
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      errors.push({ field: 'retriesBeforeBackoff', message: 'retriesBeforeBackoff must be a non-negative integer' })
    }
  }

  if (c.globalRooms !== undefined) {
    if (!Array.isArray(c.globalRooms)) {
      errors.push({ field: 'globalRooms', message: 'globalRooms must be an array' })
    } else {
      c.globalRooms.forEach((room: unknown, i) => {
        if (typeof room !== 'string' || !ROOM_SUFFIX_PATTERN.test(room)) {
          errors.push({ field: `globalRooms.${i}`, message: 'Room names can only contain lowercase letters, digits and underscores' })
        }
      })
    }
  }

  for (const field of ['privateRooms', 'debug'] as const) {
    if (c[field] !== undefined && typeof c[field] !== 'boolean') {
      errors.push({ field, message: `${field} must be a boolean` })
    }
  }

  if (c.peers !== undefined) {
    if (typeof c.peers !== 'object' || c.peers === null || Array.isArray(c.peers)) {
      errors.push({ field: 'peers', message: 'Peers must be an object' })
    } else {
      for (const [alias, address] of Object.entries(c.peers as Record<string, unknown>)) {
        const aliasError = validateAlias(alias)
        if (aliasError) {
          errors.push({ field: `peers.${alias}`, message: aliasError })
        }
        if (typeof address !== 'string') {
          errors.push({ field: `peers.${alias}`, message: 'Address must be a string' })
        } else {
          const addressError = validateAddress(address)
          if (addressError) errors.push({ field: `peers.${alias}`, message: addressError })
        }
      }
    }
  }

  return errors
}

/**
 * Keep only the fields that passed validation. Array and map fields drop
 * their invalid entries; an invalid container is dropped entirely.
 */
function pickValidFields(parsed: Record<string, unknown>, errors: ConfigValidationError[]): Config {
  const bad = new Set(errors.map(e => e.field))
  const badPrefix = (field: string): boolean => errors.some(e => e.field.startsWith(`${field}.`))
  const config: Record<string, unknown> = {}

  for (const [field, value] of Object.entries(parsed)) {
    if (bad.has(field)) continue
    if (badPrefix(field) && Array.isArray(value)) {
      config[field] = value.filter((_, i) => !bad.has(`${field}.${i}`))
    } else if (badPrefix(field) && typeof value === 'object' && value !== null) {
      config[field] = Object.fromEntries(
        Object.entries(value as Record<string, unknown>).filter(([key]) => !bad.has(`${field}.${key}`))
      )
    } else {
      config[field] = value
    }
  }
  return config as Config
}

function normalizePeers(config: Config): Config {
  if (!config.peers) return config
  const peers: Record<string, string> = {}
  for (const [alias, address] of Object.entries(config.peers)) {
    peers[alias] = address.toLowerCase()
  }
  return { ...config, peers }
}

export function loadConfig(dir: string = getConfigDir()): Config {
  const file = getConfigPath(dir)
  try {
    if (fs.existsSync(file)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))

      const errors = validateConfig(parsed)
      if (errors.length === 0) return normalizePeers(parsed as Config)

      console.error(`Config validation errors in ${file}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')

      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {}
      return normalizePeers(pickValidFields(parsed as Record<string, unknown>, errors))
    }
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${file}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, dir: string = getConfigDir()): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    ensureConfigDir(dir)
    fs.writeFileSync(getConfigPath(dir), JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

export function resolveTransportConfig(config: Config): TransportConfig {
  return {
    server: config.server ?? DEFAULT_TRANSPORT_CONFIG.server,
    availableServers: config.availableServers ?? DEFAULT_TRANSPORT_CONFIG.availableServers,
    chainId: config.chainId ?? DEFAULT_TRANSPORT_CONFIG.chainId,
    retryInterval: config.retryInterval ?? DEFAULT_TRANSPORT_CONFIG.retryInterval,
    retriesBeforeBackoff: config.retriesBeforeBackoff ?? DEFAULT_TRANSPORT_CONFIG.retriesBeforeBackoff,
    globalRooms: config.globalRooms ?? DEFAULT_TRANSPORT_CONFIG.globalRooms,
    privateRooms: config.privateRooms ?? DEFAULT_TRANSPORT_CONFIG.privateRooms,
    stopTimeout: config.stopTimeout ?? DEFAULT_TRANSPORT_CONFIG.stopTimeout
  }
}

/** Candidate home servers: the configured one, or the whole pool for 'auto'. */
export function resolveServers(config: Pick<TransportConfig, 'server' | 'availableServers'>): string[] {
  if (config.server === 'auto') {
    if (config.availableServers.length === 0) {
      throw new TransportError('Server is "auto" but no available servers are configured')
    }
    return [...config.availableServers]
  }
  if (validateServerUrl(config.server)) {
    throw new TransportError('Invalid server specified (valid values: "auto" or a URL)')
  }
  return [config.server]
}

// Peer management helpers
export function addPeer(config: Config, alias: string, address: string): Config {
  const peers = { ...config.peers }
  peers[alias] = address.toLowerCase()
  return { ...config, peers }
}

export function removePeer(config: Config, alias: string): Config {
  const peers = { ...config.peers }
  delete peers[alias]
  return { ...config, peers }
}

export function getPeerAddress(config: Config, alias: string): Address | undefined {
  const address = config.peers?.[alias]
  return address ? toAddress(address) : undefined
}

export function getPeerAlias(config: Config, address: string): string | undefined {
  if (!config.peers) return undefined
  const normalized = address.toLowerCase()
  for (const [alias, peer] of Object.entries(config.peers)) {
    if (peer === normalized) return alias
  }
  return undefined
}
