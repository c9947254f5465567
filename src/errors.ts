/**
 * Failure to establish the connection. `code` is the errno string reported
 * by the system, e.g. `ENOENT` or `EINVAL`.
 */
export class TransportError extends Error {
  constructor(public readonly code: string, message?: string) {
    super(message || `transport error ${code}`)
    this.name = 'TransportError'
  }

  public static from(err: NodeJS.ErrnoException, message?: string): TransportError {
    return new TransportError(err.code || 'EIO', message ? `${message}: ${err.message}` : err.message)
  }
}

/**
 * Error response of a request, as reported by the peer.
 */
export class RpcError extends Error {
  constructor(public readonly method: string, public readonly payload: unknown) {
    super(`request "${method}" failed: ${RpcError.describe(payload)}`)
    this.name = 'RpcError'
  }

  // nvim reports errors as [type, message]
  private static describe(payload: unknown): string {
    if (Array.isArray(payload) && payload.length == 2 && typeof payload[1] == 'string') {
      return payload[1]
    }
    if (typeof payload == 'string') return payload
    return String(payload)
  }
}
