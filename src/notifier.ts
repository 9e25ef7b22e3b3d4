import { EventEmitter } from 'node:events'

/**
 * Level-triggered wake-up flag. A worker clears it, does its work, then
 * waits on it with a timeout; `set()` from any caller ends the wait early.
 */
export class Notifier extends EventEmitter {
  private flag = false

  constructor() {
    super()
    this.setMaxListeners(0)
  }

  get isSet(): boolean {
    return this.flag
  }

  set(): void {
    this.flag = true
    this.emit('set')
  }

  clear(): void {
    this.flag = false
  }

  /** Resolves `true` if the flag is (or becomes) set, `false` on timeout. */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.flag) return Promise.resolve(true)

    return new Promise(resolve => {
      const onSet = (): void => {
        clearTimeout(timer)
        resolve(true)
      }
      const timer = setTimeout(() => {
        this.off('set', onSet)
        resolve(false)
      }, timeoutMs)
      this.once('set', onSet)
    })
  }
}
