declare module 'hypercore-crypto' {
  export function randomBytes(n: number): Buffer
  export function discoveryKey(publicKey: Buffer): Buffer
  export function keyPair(seed?: Buffer): { publicKey: Buffer; secretKey: Buffer }
  export function sign(message: Buffer, secretKey: Buffer): Buffer
  export function verify(message: Buffer, signature: Buffer, publicKey: Buffer): boolean
  export function hash(data: Buffer | Buffer[], out?: Buffer): Buffer
}

declare module 'hyperswarm' {
  import { EventEmitter } from 'node:events'

  export interface SwarmOptions {
    keyPair?: { publicKey: Buffer; secretKey: Buffer }
  }

  export interface JoinOptions {
    client?: boolean
    server?: boolean
  }

  export interface PeerInfo {
    publicKey: Buffer
    topics: Buffer[]
  }

  export interface Peer extends EventEmitter {
    write(data: Buffer | string): boolean
    end(): void
    remotePublicKey: Buffer
    on(event: 'data', handler: (data: Buffer) => void): this
    on(event: 'error', handler: (err: Error) => void): this
    on(event: 'close', handler: () => void): this
  }

  export interface Discovery {
    flushed(): Promise<void>
    destroy(): Promise<void>
  }

  class Hyperswarm extends EventEmitter {
    constructor(options?: SwarmOptions)
    join(topic: Buffer, options?: JoinOptions): Discovery
    leave(topic: Buffer): Promise<void>
    destroy(): Promise<void>
    flush(): Promise<void>
    on(event: 'connection', handler: (peer: Peer, info: PeerInfo) => void): this
    on(event: 'error', handler: (err: Error) => void): this
  }

  export default Hyperswarm
}
