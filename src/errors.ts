/** Configuration or connectivity failure that keeps the transport from running. */
export class TransportError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TransportError'
  }
}

/** A request to the chat network failed with a status code. */
export class ChatRequestError extends Error {
  readonly code: number
  readonly content: string

  constructor(code: number, content: string = '') {
    super(`Chat request failed: ${code}${content ? ` ${content}` : ''}`)
    this.name = 'ChatRequestError'
    this.code = code
    this.content = content
  }
}

/** Logic or configuration defect detected on the wire. Never retried. */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolViolationError'
  }
}

export function isChatRequestError(err: unknown, codes?: readonly number[]): err is ChatRequestError {
  if (!(err instanceof ChatRequestError)) return false
  return codes === undefined || codes.includes(err.code)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
