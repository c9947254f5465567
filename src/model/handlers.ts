import { DEFAULT_HANDLER_CAPACITY } from '../config'
import { NULL_MSGID, type ResponseHandler } from '../types'

/**
 * Response handlers of outstanding requests, indexed by request id.
 *
 * Ids are handed out round-robin starting after the last assigned slot, so a
 * slot that was just freed is the last one to be reused. The table doubles
 * when every slot is taken.
 */
export default class HandlerTable {
  private handlers: (ResponseHandler | undefined)[]
  private lastIndex = 0
  private count = 0

  constructor(capacity = DEFAULT_HANDLER_CAPACITY) {
    this.handlers = new Array<ResponseHandler | undefined>(Math.max(1, capacity)).fill(undefined)
  }

  public get capacity(): number {
    return this.handlers.length
  }

  // number of outstanding handlers
  public get size(): number {
    return this.count
  }

  public hasHandler(id: number): boolean {
    return id >= 0 && id < this.handlers.length && this.handlers[id] != null
  }

  public get(id: number): ResponseHandler | undefined {
    return this.hasHandler(id) ? this.handlers[id] : undefined
  }

  /**
   * Remove the handler of `id` and return it.
   */
  public take(id: number): ResponseHandler | undefined {
    let handler = this.get(id)
    if (handler) {
      this.handlers[id] = undefined
      this.count = this.count - 1
    }
    return handler
  }

  /**
   * Empty the table, returning the ids that still had a handler.
   */
  public takeAll(): number[] {
    let ids: number[] = []
    this.handlers.forEach((handler, id) => {
      if (handler) ids.push(id)
    })
    this.handlers = this.handlers.map(() => undefined)
    this.count = 0
    return ids
  }

  public store(handler: ResponseHandler): number {
    let index = this.findEmpty()
    if (index >= NULL_MSGID) {
      throw new RangeError(`no request id left, ${this.count} requests outstanding`)
    }
    if (index == this.handlers.length) {
      let size = this.handlers.length
      this.handlers = this.handlers.concat(new Array<ResponseHandler | undefined>(size).fill(undefined))
    }
    this.handlers[index] = handler
    this.lastIndex = index
    this.count = this.count + 1
    return index
  }

  private findEmpty(): number {
    let { handlers, lastIndex } = this
    let size = handlers.length
    for (let i = lastIndex + 1; i < size; i++) {
      if (!handlers[i]) return i
    }
    for (let i = 0; i <= lastIndex; i++) {
      if (!handlers[i]) return i
    }
    return size
  }
}
