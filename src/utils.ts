import crypto from 'hypercore-crypto'

let debugEnabled = false

export function generateId(): string {
  return crypto.randomBytes(16).toString('hex')
}

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

export function debugLog(...args: unknown[]): void {
  if (debugEnabled) console.log(...args)
}

/** Escape newlines so a batch of messages stays on one log line. */
export function oneLine(text: string): string {
  return text.replace(/\n/g, '\\n')
}

/** Resolves `true` when `promise` settles within `ms`, `false` otherwise. */
export async function waitWithTimeout(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(false), ms)
  })
  try {
    return await Promise.race([promise.then(() => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}
