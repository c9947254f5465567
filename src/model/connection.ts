import Emitter from 'events'
import net from 'net'
import { spawn as spawnProcess, type ChildProcess } from 'child_process'
import type { Readable, Writable } from 'stream'
import { TransportError } from '../errors'
import { normalizeAddress } from '../config'
import { createLogger } from '../logger'
const logger = createLogger('connection')

/**
 * Size limit of `sockaddr_un.sun_path`, terminating NUL included.
 */
export function maxSocketPath(platform: NodeJS.Platform = process.platform): number {
  switch (platform) {
    case 'darwin':
    case 'freebsd':
    case 'openbsd':
      return 104
    case 'win32':
      return Infinity
    default:
      return 108
  }
}

/**
 * Duplex byte channel to the peer: the child's stdout and stdin, or a socket
 * used for both directions.
 */
export default class Connection extends Emitter {
  private closed = false

  constructor(
    public readonly reader: Readable,
    public readonly writer: Writable,
    public readonly child: ChildProcess | null = null) {
    super()
    const onError = (err: Error): void => {
      this.emit('error', err)
    }
    reader.on('error', onError)
    if (writer !== reader) writer.on('error', onError)
  }

  public get isClosed(): boolean {
    return this.closed
  }

  /**
   * Bytes buffered by the reader, `null` when there are none yet and an
   * empty buffer once the stream has ended.
   */
  public read(): Buffer | null {
    const chunk: unknown = this.reader.read()
    if (Buffer.isBuffer(chunk)) return chunk
    if (typeof chunk == 'string') return Buffer.from(chunk)
    return this.reader.readableEnded ? Buffer.alloc(0) : null
  }

  /**
   * Number of bytes the writer takes before it has to drain.
   */
  public writable(): number {
    const { writer } = this
    if (writer.destroyed || writer.writableEnded || writer.writableNeedDrain) return 0
    return Math.max(0, writer.writableHighWaterMark - writer.writableLength)
  }

  public write(bytes: Buffer): void {
    this.writer.write(bytes)
  }

  public close(): void {
    if (this.closed) return
    this.closed = true
    this.reader.destroy()
    if (this.writer !== this.reader) this.writer.destroy()
    logger.debug('connection closed')
  }
}

/**
 * Launch `path` with stdin and stdout connected to pipes.
 */
export function spawn(path: string, args: string[] = [], env: Record<string, string> = {}): Promise<Connection> {
  return new Promise((resolve, reject) => {
    const child = spawnProcess(path, args, {
      env: { ...process.env, ...env },
      stdio: ['pipe', 'pipe', 'inherit']
    })
    const onFailure = (err: NodeJS.ErrnoException): void => {
      child.stdin.destroy()
      child.stdout.destroy()
      logger.error({ err, path }, 'spawn failed')
      reject(TransportError.from(err, `spawn ${path}`))
    }
    child.once('error', onFailure)
    child.once('spawn', () => {
      child.removeListener('error', onFailure)
      // e.g. a failed kill, the pipes stay with the session
      child.on('error', (err: Error) => {
        logger.warn({ err, pid: child.pid }, 'child process error')
      })
      logger.debug({ path, args, pid: child.pid }, 'process spawned')
      resolve(new Connection(child.stdout, child.stdin, child))
    })
  })
}

/**
 * Connect to a local socket, or a named pipe on windows.
 */
export function connect(address: string): Promise<Connection> {
  const path = normalizeAddress(address)
  if (Buffer.byteLength(path) >= maxSocketPath()) {
    return Promise.reject(new TransportError('EINVAL', `socket path too long: ${path}`))
  }
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ path })
    const onError = (err: NodeJS.ErrnoException): void => {
      socket.destroy()
      logger.error({ err, path }, 'connect failed')
      reject(TransportError.from(err, `connect ${path}`))
    }
    socket.once('error', onError)
    socket.once('connect', () => {
      socket.removeListener('error', onError)
      logger.debug({ path }, 'socket connected')
      resolve(new Connection(socket, socket))
    })
  })
}
