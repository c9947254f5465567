import Emitter from 'events'
import type { Codec } from 'msgpack-lite'
import type { Logger } from 'pino'
import { loadConfig } from '../config'
import { RpcError, TransportError } from '../errors'
import {
  NULL_MSGID,
  type NotificationEnvelope,
  type ResponseEnvelope,
  type ResponseHandler,
  type RpcMap,
  type RpcValue,
  type UiSink
} from '../types'
import { describe, typeName } from '../util'
import { createCodec, encodeRequest, FrameDecoder, WriteBuffer } from './codec'
import Connection, { connect, spawn } from './connection'
import HandlerTable from './handlers'
import { classify } from './message'
import SerialQueue from './queue'
import { ReadSource, WriteSource, type IoHandler, type SourceKind } from './source'
import { createLogger } from '../logger'
const logger = createLogger('session')

export type SessionState = 'disconnected' | 'connected' | 'shutting-down' | 'closed'

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  'disconnected': ['connected'],
  'connected': ['shutting-down'],
  'shutting-down': ['closed'],
  'closed': []
}

export type FatalPolicy = (err: Error) => void

/**
 * Once the stream is desynchronized or the peer is gone there is nothing to
 * recover, the process is restarted as a whole.
 */
export const abortProcess: FatalPolicy = () => {
  process.abort()
}

export interface SessionOptions {
  /**
   * Called on an I/O error of an established connection. Aborts the process
   * by default.
   */
  fatal?: FatalPolicy
  logger?: Logger
  /**
   * Initial size of the response handler table.
   */
  capacity?: number
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

/**
 * msgpack-rpc session with one embedded nvim.
 *
 * Everything that touches the stream runs on the session's serial queue:
 * read events, write events and cancellation. Requests may be issued at any
 * time, they are encoded into the write buffer right away and flushed by the
 * write source.
 */
export default class Session extends Emitter implements IoHandler {
  private _state: SessionState = 'disconnected'
  private connection: Connection | null = null
  private readSource: ReadSource | null = null
  private writeSource: WriteSource | null = null
  private sink: UiSink | null = null
  private readonly queue = new SerialQueue()
  private readonly codec: Codec = createCodec()
  private readonly decoder: FrameDecoder
  private readonly handlers: HandlerTable
  private readonly output = new WriteBuffer()
  private readonly cancelled = new Set<SourceKind>()
  // rejects the outstanding `call()` promise of an id
  private readonly calls = new Map<number, () => void>()
  private draining = false
  private readonly fatal: FatalPolicy
  private readonly logger: Logger

  constructor(options: SessionOptions = {}) {
    super()
    this.decoder = new FrameDecoder(this.codec)
    this.handlers = new HandlerTable(options.capacity || loadConfig().handlerCapacity)
    this.fatal = options.fatal || abortProcess
    this.logger = options.logger || logger
  }

  public get state(): SessionState {
    return this._state
  }

  // number of requests waiting for a response
  public get pending(): number {
    return this.handlers.size
  }

  public setSink(sink: UiSink): void {
    this.sink = sink
  }

  public async spawn(path: string, args: string[] = [], env: Record<string, string> = {}): Promise<void> {
    this.assertState('disconnected')
    this.open(await spawn(path, args, env))
  }

  /**
   * Connect to a listening nvim, `NVIM_LISTEN_ADDRESS` when no address is
   * given.
   */
  public async connect(address?: string): Promise<void> {
    this.assertState('disconnected')
    const path = address || loadConfig().listenAddress
    if (!path) {
      throw new TransportError('EINVAL', 'no socket address given and NVIM_LISTEN_ADDRESS is not set')
    }
    this.open(await connect(path))
  }

  /**
   * Start the event sources on an established connection.
   */
  public open(connection: Connection): void {
    this.assertState('disconnected')
    this.connection = connection
    connection.on('error', (err: Error) => {
      this.queue.dispatch(() => {
        this.ioError(err)
      })
    })
    this.readSource = new ReadSource(this.queue, this, connection.reader)
    this.writeSource = new WriteSource(this.queue, this, connection.writer)
    this.transition('connected')
    this.readSource.resume()
    // requests issued before the connection existed
    if (this.output.size) this.writeSource.resume()
  }

  /**
   * Shut the connection down, the sink gets `shutdown()` once both sources
   * are cancelled. Requests already queued are written first.
   */
  public close(): void {
    const { writeSource } = this
    if (this._state == 'connected') {
      this.transition('shutting-down')
      if (this.output.size && writeSource && !writeSource.isCancelled()) {
        // onWritable cancels once the buffer is empty
        this.draining = true
        writeSource.resume()
        return
      }
    }
    if (this._state == 'shutting-down' && !this.draining) {
      this.cancelIo()
    }
  }

  public getApiInfo(handler: ResponseHandler): void {
    this.assertOpen('nvim_get_api_info')
    this.request(this.handlers.store(handler), 'nvim_get_api_info', [])
  }

  public quit(confirm: boolean): void {
    const command = confirm ? 'qa' : 'qa!'
    this.request(NULL_MSGID, 'nvim_command', [command])
  }

  public attachUI(width: number, height: number, options: RpcMap = { ext_linegrid: true }): void {
    this.request(NULL_MSGID, 'nvim_ui_attach', [width, height, options])
  }

  /**
   * Request with a promised result, rejected with `RpcError` when nvim
   * responds with an error.
   */
  public call(method: string, args: RpcValue[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.assertOpen(method)
      const id = this.handlers.store((error, result) => {
        this.calls.delete(id)
        if (error != null) return reject(new RpcError(method, error))
        resolve(result)
      })
      this.calls.set(id, () => reject(new RpcError(method, 'session closed')))
      this.request(id, method, args)
    })
  }

  /**
   * Encode `[0, id, method, args]` into the write buffer. The write source is
   * resumed when the buffer was empty, it suspends itself once everything is
   * written.
   */
  public request(id: number, method: string, args: RpcValue[] = []): void {
    this.assertOpen(method)
    const idle = this.output.size == 0
    this.output.append(encodeRequest(this.codec, id, method, args))
    this.logger.debug({ id, method }, 'request')
    if (idle && this.writeSource) {
      this.writeSource.resume()
    }
  }

  public onReadable(): void {
    const { connection } = this
    if (!connection) return
    const bytes = connection.read()
    if (bytes == null) return
    if (bytes.length == 0) {
      this.logger.info('stream closed by nvim')
      const { sink } = this
      if (sink) this.invoke('sink close', () => sink.close())
      this.cancelIo()
      return
    }
    try {
      this.decoder.feed(bytes)
    } catch (e) {
      this.ioError(toError(e))
      return
    }
    for (const value of this.decoder) {
      this.route(value)
    }
  }

  public onWritable(): void {
    const { connection, writeSource, output } = this
    if (!connection || !writeSource) return
    const bytes = output.peek(connection.writable())
    if (bytes.length) {
      connection.write(bytes)
      output.consume(bytes.length)
    }
    if (output.size == 0) {
      writeSource.suspend()
      if (this.draining) this.cancelIo()
    }
  }

  public onCancelled(kind: SourceKind): void {
    this.cancelled.add(kind)
    this.logger.debug({ source: kind }, 'source cancelled')
    const { readSource, sink } = this
    if (kind == 'write') {
      if (readSource) readSource.cancel()
    } else if (sink) {
      this.invoke('sink shutdown', () => sink.shutdown())
    }
    if (this.cancelled.size == 2) {
      this.release()
    }
  }

  private cancelIo(): void {
    if (this._state == 'connected') this.transition('shutting-down')
    this.draining = false
    const { writeSource } = this
    // a suspended source only completes its cancellation once resumed
    if (writeSource && !writeSource.isCancelled()) {
      writeSource.resume()
      writeSource.cancel()
    }
  }

  private ioError(err: Error): void {
    if (this._state != 'connected') {
      this.logger.warn({ err }, `I/O error while ${this._state}`)
      // the rest of the buffer won't go out
      if (this.draining) this.cancelIo()
      return
    }
    this.logger.fatal({ err }, 'I/O error')
    this.transition('shutting-down')
    this.fatal(err)
  }

  private release(): void {
    const { readSource, writeSource, connection } = this
    if (!readSource || !writeSource || !connection) return
    if (!readSource.isCancelled() || !writeSource.isCancelled()) {
      throw new Error('connection released with an active event source')
    }
    connection.close()
    this.transition('closed')
    this.dropHandlers()
    this.emit('close')
  }

  // handlers left without a response are logged, never invoked
  private dropHandlers(): void {
    for (const id of this.handlers.takeAll()) {
      this.logger.warn({ id }, 'no response before close')
      const abandon = this.calls.get(id)
      if (abandon) abandon()
    }
    this.calls.clear()
  }

  private route(value: unknown): void {
    const envelope = classify(value)
    if (!envelope) {
      this.logger.error({ type: typeName(value), value: describe(value) }, 'message type error')
      return
    }
    if (envelope.kind == 'response') {
      this.onResponse(envelope)
    } else {
      this.onNotification(envelope)
    }
  }

  private onResponse({ id, error, result }: ResponseEnvelope): void {
    if (id == NULL_MSGID) return
    const handler = this.handlers.take(id)
    if (!handler) {
      this.logger.error({ id, response: describe([1, id, error, result]) }, 'no response handler')
      return
    }
    this.invoke(`response ${id}`, () => handler(error, result))
  }

  private onNotification({ name, args }: NotificationEnvelope): void {
    if (name == 'redraw') {
      const { sink } = this
      if (sink) {
        this.invoke('redraw', () => sink.redraw(args))
      } else {
        this.logger.warn('redraw without sink')
      }
      return
    }
    this.logger.info({ name: name.slice(0, 128), args: describe(args) }, 'unhandled notification')
  }

  // a throwing handler must not stop the messages after it
  private invoke(what: string, fn: () => void): void {
    try {
      fn()
    } catch (e) {
      this.logger.error({ err: e }, `${what} failed`)
    }
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`invalid session transition ${this._state} -> ${next}`)
    }
    this.logger.debug({ from: this._state, to: next }, 'session state')
    this._state = next
    this.emit('state', next)
  }

  private assertState(state: SessionState): void {
    if (this._state != state) {
      throw new Error(`session is ${this._state}, expected ${state}`)
    }
  }

  private assertOpen(method: string): void {
    if (this._state == 'shutting-down' || this._state == 'closed') {
      throw new Error(`session is ${this._state}, can't send "${method}"`)
    }
  }
}
