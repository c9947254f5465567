import type { Readable, Writable } from 'stream'
import SerialQueue from './queue'

export type SourceKind = 'read' | 'write'

export type SourceState = 'suspended' | 'active' | 'cancelled'

/**
 * Callbacks of the two event sources of a connection. They are always
 * invoked on the connection's serial queue.
 */
export interface IoHandler {
  onReadable(): void
  onWritable(): void
  onCancelled(kind: SourceKind): void
}

/**
 * Readiness source bound to one stream.
 *
 * A source is created suspended. Events are delivered only while it is
 * active. Cancelling completes, that is the cancel handler runs, only once
 * the source is no longer suspended.
 */
export abstract class EventSource {
  private suspended = true
  private cancelled = false
  private cancelDelivered = false
  private scheduled = false

  constructor(
    public readonly kind: SourceKind,
    protected readonly queue: SerialQueue,
    protected readonly handler: IoHandler) {
  }

  public get state(): SourceState {
    if (this.cancelled) return 'cancelled'
    return this.suspended ? 'suspended' : 'active'
  }

  public isCancelled(): boolean {
    return this.cancelled
  }

  public resume(): void {
    if (!this.suspended) return
    this.suspended = false
    if (this.cancelled) {
      this.completeCancel()
      return
    }
    this.arm()
  }

  public suspend(): void {
    this.suspended = true
  }

  public cancel(): void {
    if (this.cancelled) return
    this.cancelled = true
    this.detach()
    if (!this.suspended) this.completeCancel()
  }

  private completeCancel(): void {
    if (this.cancelDelivered) return
    this.cancelDelivered = true
    this.queue.dispatch(() => {
      this.handler.onCancelled(this.kind)
    })
  }

  /**
   * Schedule one event when the source is active and its stream is ready.
   * Called again after every delivered event, so readiness is level
   * triggered.
   */
  protected arm(): void {
    if (this.state != 'active' || this.scheduled || !this.ready()) return
    this.scheduled = true
    this.queue.dispatch(() => {
      this.scheduled = false
      if (this.state != 'active') return
      this.fire()
      this.arm()
    })
  }

  protected abstract ready(): boolean

  protected abstract fire(): void

  // stop listening to the stream
  protected abstract detach(): void
}

export class ReadSource extends EventSource {
  private signalled = false
  private readonly onSignal = (): void => {
    this.signalled = true
    this.arm()
  }

  constructor(queue: SerialQueue, handler: IoHandler, private reader: Readable) {
    super('read', queue, handler)
    reader.on('readable', this.onSignal)
    reader.on('end', this.onSignal)
  }

  protected ready(): boolean {
    return this.signalled
  }

  protected fire(): void {
    this.signalled = false
    this.handler.onReadable()
  }

  protected detach(): void {
    this.reader.removeListener('readable', this.onSignal)
    this.reader.removeListener('end', this.onSignal)
  }
}

export class WriteSource extends EventSource {
  private readonly onDrain = (): void => {
    this.arm()
  }

  constructor(queue: SerialQueue, handler: IoHandler, private writer: Writable) {
    super('write', queue, handler)
    writer.on('drain', this.onDrain)
  }

  protected ready(): boolean {
    const { writer } = this
    return !writer.writableNeedDrain && !writer.writableEnded && !writer.destroyed
  }

  protected fire(): void {
    this.handler.onWritable()
  }

  protected detach(): void {
    this.writer.removeListener('drain', this.onDrain)
  }
}
