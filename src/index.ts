#!/usr/bin/env node
import process from 'node:process'
import readline from 'node:readline'
import { toChecksumAddress, tryToAddress, shortAddress, type Address } from './address.js'
import {
  loadConfig,
  saveConfig,
  getConfigDir,
  getConfigPath,
  resolveTransportConfig,
  validateAlias,
  addPeer,
  removePeer,
  getPeerAddress,
  getPeerAlias
} from './config.js'
import { Signer } from './crypto.js'
import { errorMessage } from './errors.js'
import { loadOrCreateIdentity, checkIdentityPermissions } from './identity.js'
import type { Message } from './messages/types.js'
import { LocalNodeService } from './node/local-service.js'
import { SwarmChatClient } from './swarm/client.js'
import { SwarmStore } from './swarm/store.js'
import { Transport } from './transport/transport.js'
import { serverNameFromUrl } from './transport/types.js'
import { ROOMS_ACCOUNT_DATA_KEY } from './transport/rooms.js'
import { parseAuthData, serverFromUserId } from './transport/userid.js'
import { setDebug } from './utils.js'

const config = loadConfig()

function printUsage(): void {
  console.log(`
ferry - reliable signed message delivery between network nodes

Usage:
  ferry <command> [options]

Commands:
  start [--debug]                 Start the node daemon
  address                         Print this node's address
  config                          Show current configuration
  rooms                           Show the rooms stored for each peer
  add-peer <alias> <address>      Save a peer under an alias
  remove-peer <alias>             Forget a peer alias
  help                            Show this help message

Daemon commands (stdin):
  send <address|alias> <text>     Send a message to a peer
  broadcast <room> <text>         Broadcast to a global room
  status                          Show peer reachability and pending messages
  quit                            Stop the daemon

Environment Variables:
  FERRY_HOME    Data directory (default: ~/.ferry)
  FERRY_DEBUG   Set to 1 for verbose logging

Config: ${getConfigPath()}
`)
}

function resolvePeer(target: string): Address | null {
  return tryToAddress(target) ?? getPeerAddress(config, target) ?? null
}

function peerLabel(address: Address): string {
  const alias = getPeerAlias(config, address)
  return alias ? `${alias} (${shortAddress(address)})` : shortAddress(address)
}

async function showAddress(): Promise<void> {
  const signer = new Signer(loadOrCreateIdentity())
  console.log(toChecksumAddress(signer.address))
}

async function showConfig(): Promise<void> {
  const effective = resolveTransportConfig(config)
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Server: ${effective.server}`)
  console.log(`  Available servers: ${effective.availableServers.join(', ')}`)
  console.log(`  Chain id: ${effective.chainId}`)
  console.log(`  Retry interval: ${effective.retryInterval}ms (backoff after ${effective.retriesBeforeBackoff} retries)`)
  console.log(`  Global rooms: ${effective.globalRooms.join(', ')}`)
  console.log(`  Private rooms: ${effective.privateRooms ? 'yes' : 'no'}`)
  console.log(`  Stop timeout: ${effective.stopTimeout}ms`)

  const peers = Object.entries(config.peers ?? {})
  if (peers.length === 0) {
    console.log('  Peers: (none)')
  } else {
    console.log('  Peers:')
    for (const [alias, address] of peers) {
      console.log(`    ${alias}: ${address}`)
    }
  }
}

async function showRooms(): Promise<void> {
  const dir = getConfigDir()
  const signer = new Signer(loadOrCreateIdentity(dir))
  const service = new LocalNodeService(signer, resolveTransportConfig(config).chainId, dir)
  const auth = parseAuthData(service.authData)
  const server = auth ? serverFromUserId(auth.userId) : null
  if (!auth || !server) {
    console.log('No session yet. Run "ferry start" first.')
    return
  }

  const store = SwarmStore.forServer(dir, server)
  const mapping = store.getAccountData(auth.userId, ROOMS_ACCOUNT_DATA_KEY)
  const entries = typeof mapping === 'object' && mapping !== null ? Object.entries(mapping) : []
  if (entries.length === 0) {
    console.log('No peer rooms stored.')
    return
  }

  console.log(`Peer rooms for ${auth.userId}:`)
  for (const [address, roomIds] of entries) {
    console.log(`  ${address}`)
    if (Array.isArray(roomIds)) {
      for (const roomId of roomIds) console.log(`    ${String(roomId)}`)
    }
  }
}

async function addPeerCommand(alias: string, target: string): Promise<void> {
  const aliasError = validateAlias(alias)
  const address = tryToAddress(target)
  if (aliasError || !address) {
    console.error(`Error: ${aliasError ?? `Invalid address: ${target}`}`)
    process.exit(1)
    return
  }
  if (!saveConfig(addPeer(config, alias, address))) process.exit(1)
  console.log(`Added peer ${alias}: ${toChecksumAddress(address)}`)
}

async function removePeerCommand(alias: string): Promise<void> {
  if (!config.peers?.[alias]) {
    console.error(`Error: Unknown peer alias: ${alias}`)
    process.exit(1)
  }
  if (!saveConfig(removePeer(config, alias))) process.exit(1)
  console.log(`Removed peer ${alias}`)
}

async function startDaemon(debug: boolean): Promise<void> {
  setDebug(debug || config.debug === true || process.env.FERRY_DEBUG === '1')

  const dir = getConfigDir()
  const identity = loadOrCreateIdentity(dir)
  const permWarning = checkIdentityPermissions(dir)
  if (permWarning) console.warn(`Warning: ${permWarning}`)

  const signer = new Signer(identity)
  const transportConfig = resolveTransportConfig(config)
  const service = new LocalNodeService(signer, transportConfig.chainId, dir)
  const transport = new Transport({
    config: transportConfig,
    signer,
    createClient: baseUrl => new SwarmChatClient({
      baseUrl,
      store: SwarmStore.forServer(dir, serverNameFromUrl(baseUrl))
    })
  })

  console.log('Starting ferry daemon...')
  console.log(`  Address: ${toChecksumAddress(signer.address)}`)
  console.log(`  Data: ${dir}`)

  service.on('message', (message: Message, sender: Address) => {
    if (message.type === 'ProtocolMessage') {
      console.log(`[${peerLabel(sender)}] ${message.kind}: ${JSON.stringify(message.payload)}`)
    } else {
      console.log(`[${peerLabel(sender)}] ${message.type}`)
    }
  })
  service.on('delivered', (identifier: string, sender: Address) => {
    console.log(`Delivered ${identifier.slice(0, 8)}... to ${peerLabel(sender)}`)
  })

  let isShuttingDown = false
  async function shutdown(code: number): Promise<void> {
    if (isShuttingDown) return
    isShuttingDown = true
    console.log('\nShutting down...')
    await transport.stop()
    process.exit(code)
  }

  transport.on('fatal', (err: unknown) => {
    console.error('Fatal transport error:', errorMessage(err))
    shutdown(1).catch(stopErr => console.error('Shutdown failed:', stopErr))
  })

  try {
    await transport.start(service, service.authData)
  } catch (err) {
    console.error('Failed to start transport:', errorMessage(err))
    process.exit(1)
  }

  const peers = Object.values(config.peers ?? {})
    .map(address => tryToAddress(address))
    .filter((address): address is Address => address !== null)
  for (const address of peers) {
    await transport.startHealthCheck(address)
  }

  async function handleCommand(line: string): Promise<void> {
    const [command, target, ...rest] = line.trim().split(/\s+/)
    switch (command) {
      case undefined:
      case '':
        return
      case 'send': {
        const recipient = target ? resolvePeer(target) : null
        if (!recipient || rest.length === 0) {
          console.log('Usage: send <address|alias> <text>')
          return
        }
        await transport.startHealthCheck(recipient)
        const message = service.createMessage('text', { text: rest.join(' ') })
        const queue = service.directQueue(recipient)
        service.enqueue(queue, message)
        transport.sendAsync(queue, message)
        console.log(`Queued ${message.messageIdentifier.slice(0, 8)}... for ${peerLabel(recipient)}`)
        return
      }
      case 'broadcast': {
        if (!target || rest.length === 0 || !transportConfig.globalRooms.includes(target)) {
          console.log(`Usage: broadcast <${transportConfig.globalRooms.join('|')}> <text>`)
          return
        }
        transport.sendGlobal(target, service.createMessage('broadcast', { text: rest.join(' ') }))
        return
      }
      case 'status': {
        for (const address of transport.addresses.knownAddresses) {
          console.log(`  ${peerLabel(address)}: ${transport.getAddressReachability(address)}`)
        }
        console.log(`  Pending messages: ${service.pendingCount()}`)
        return
      }
      case 'quit':
        await shutdown(0)
        return
      default:
        console.log(`Unknown command: ${command}`)
    }
  }

  const rl = readline.createInterface({ input: process.stdin })
  rl.on('line', line => {
    handleCommand(line).catch(err => console.error('Command failed:', errorMessage(err)))
  })

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(0).catch(err => console.error('Shutdown failed:', errorMessage(err)))
    })
  }

  console.log('Daemon running. Type "status" or "quit".')
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'start':
      await startDaemon(args.includes('--debug'))
      break

    case 'address':
      await showAddress()
      break

    case 'config':
      await showConfig()
      break

    case 'rooms':
      await showRooms()
      break

    case 'add-peer':
      if (!args[1] || !args[2]) {
        console.error('Usage: ferry add-peer <alias> <address>')
        process.exit(1)
      }
      await addPeerCommand(args[1], args[2])
      break

    case 'remove-peer':
      if (!args[1]) {
        console.error('Usage: ferry remove-peer <alias>')
        process.exit(1)
      }
      await removePeerCommand(args[1])
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "ferry help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
