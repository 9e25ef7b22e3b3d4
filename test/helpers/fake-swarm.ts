import { EventEmitter } from 'node:events'
import type { Discovery, JoinOptions, Peer } from 'hyperswarm'
import type { SwarmLike } from '../../src/swarm/client.js'

/** One end of an in-process duplex connection. Writes arrive on the other end a tick later. */
export class FakePeer extends EventEmitter implements Peer {
  other: FakePeer | null = null
  closed = false

  constructor(readonly remotePublicKey: Buffer) {
    super()
  }

  write(data: Buffer | string): boolean {
    const target = this.other
    if (this.closed || !target) return false
    const chunk = typeof data === 'string' ? Buffer.from(data, 'utf8') : data
    setImmediate(() => {
      if (!target.closed) target.emit('data', chunk)
    })
    return true
  }

  end(): void {
    if (this.closed) return
    this.closed = true
    const target = this.other
    setImmediate(() => {
      this.emit('close')
      if (target && !target.closed) {
        target.closed = true
        target.emit('close')
      }
    })
  }
}

interface TopicMember {
  swarm: FakeSwarm
  client: boolean
  server: boolean
}

/** Topics shared by every FakeSwarm made from it. */
export class FakeSwarmNetwork {
  private readonly topics = new Map<string, TopicMember[]>()
  private readonly links = new Map<string, [FakePeer, FakePeer]>()
  private counter = 0

  swarm(): FakeSwarm {
    this.counter++
    return new FakeSwarm(this, Buffer.alloc(32, this.counter))
  }

  join(swarm: FakeSwarm, topic: Buffer, options: JoinOptions): void {
    const key = topic.toString('hex')
    const member: TopicMember = { swarm, client: options.client ?? true, server: options.server ?? true }
    const members = (this.topics.get(key) ?? []).filter(m => m.swarm !== swarm)
    for (const other of members) {
      if ((member.client && other.server) || (member.server && other.client)) this.connect(swarm, other.swarm)
    }
    members.push(member)
    this.topics.set(key, members)
  }

  leave(swarm: FakeSwarm, topic: Buffer): void {
    const key = topic.toString('hex')
    const members = this.topics.get(key)
    if (members) this.topics.set(key, members.filter(m => m.swarm !== swarm))
  }

  destroy(swarm: FakeSwarm): void {
    for (const [key, members] of this.topics) {
      this.topics.set(key, members.filter(m => m.swarm !== swarm))
    }
    for (const [key, [a, b]] of this.links) {
      if (a.remotePublicKey.equals(swarm.publicKey) || b.remotePublicKey.equals(swarm.publicKey)) {
        this.links.delete(key)
        a.end()
      }
    }
  }

  /** Whether two swarms share an open connection. */
  connected(a: FakeSwarm, b: FakeSwarm): boolean {
    const link = this.links.get(this.linkKey(a, b))
    return link !== undefined && !link[0].closed
  }

  private linkKey(a: FakeSwarm, b: FakeSwarm): string {
    return [a.publicKey.toString('hex'), b.publicKey.toString('hex')].sort().join(':')
  }

  private connect(a: FakeSwarm, b: FakeSwarm): void {
    const key = this.linkKey(a, b)
    const existing = this.links.get(key)
    if (existing && !existing[0].closed) return

    const atA = new FakePeer(b.publicKey)
    const atB = new FakePeer(a.publicKey)
    atA.other = atB
    atB.other = atA
    this.links.set(key, [atA, atB])
    a.emit('connection', atA)
    b.emit('connection', atB)
  }
}

export class FakeSwarm extends EventEmitter implements SwarmLike {
  readonly joined: Buffer[] = []
  destroyed = false

  constructor(private readonly network: FakeSwarmNetwork, readonly publicKey: Buffer) {
    super()
  }

  join(topic: Buffer, options: JoinOptions = {}): Discovery {
    this.joined.push(topic)
    this.network.join(this, topic, options)
    return {
      flushed: () => new Promise<void>(resolve => setImmediate(resolve)),
      destroy: async () => this.network.leave(this, topic)
    }
  }

  async leave(topic: Buffer): Promise<void> {
    this.network.leave(this, topic)
  }

  async destroy(): Promise<void> {
    this.destroyed = true
    this.network.destroy(this)
  }
}
