import msgpack, { type Codec, type Decoder } from 'msgpack-lite'
import { Metadata } from '../meta'
import type { Handle, RequestMessage, RpcValue } from '../types'

/**
 * Codec with the Buffer, Window and Tabpage handles registered as ext types.
 */
export function createCodec(): Codec {
  const codec = msgpack.createCodec()

  Metadata.forEach(
    ({ constructor }, id: number): void => {
      codec.addExtPacker(id, constructor, (obj: Handle) =>
        msgpack.encode(obj.id)
      )
      codec.addExtUnpacker(
        id,
        data => new constructor(Number(msgpack.decode(data)))
      )
    }
  )

  return codec
}

export function encodeRequest(codec: Codec, id: number, method: string, args: RpcValue[]): Buffer {
  const msg: RequestMessage = [0, id, method, args]
  return msgpack.encode(msg, { codec })
}

/**
 * Encoded bytes waiting for the writer.
 */
export class WriteBuffer {
  private data: Buffer = Buffer.alloc(0)

  public get size(): number {
    return this.data.length
  }

  public append(bytes: Buffer): void {
    this.data = this.data.length ? Buffer.concat([this.data, bytes]) : bytes
  }

  // at most `max` bytes from the front, without consuming them
  public peek(max: number): Buffer {
    return this.data.subarray(0, Math.max(0, max))
  }

  public consume(count: number): void {
    this.data = this.data.subarray(Math.min(count, this.data.length))
  }
}

export interface Unpacked {
  value: unknown
}

/**
 * Incremental decoder: raw bytes go in through `feed`, complete values come
 * out of `unpack`. Bytes of a value that is not complete yet are kept until
 * the rest arrives.
 */
export class FrameDecoder implements Iterable<unknown> {
  private readonly decoder: Decoder
  private readonly values: unknown[] = []
  private failure: Error | null = null

  constructor(codec: Codec) {
    this.decoder = msgpack.Decoder({ codec })
    // top-level nil included
    this.decoder.on('data', (value: unknown) => {
      this.values.push(value)
    })
  }

  public get failed(): boolean {
    return this.failure != null
  }

  /**
   * Throws when the bytes are not msgpack, the decoder can't resync after
   * that and every later call throws the same error.
   */
  public feed(bytes: Buffer): void {
    if (this.failure) throw this.failure
    try {
      this.decoder.decode(bytes)
    } catch (e) {
      this.failure = e instanceof Error ? e : new Error(String(e))
      throw this.failure
    }
  }

  public unpack(): Unpacked | undefined {
    if (this.values.length == 0) return undefined
    return { value: this.values.shift() }
  }

  public *[Symbol.iterator](): Iterator<unknown> {
    let next = this.unpack()
    while (next) {
      yield next.value
      next = this.unpack()
    }
  }
}
