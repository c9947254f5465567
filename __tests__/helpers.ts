import { PassThrough } from 'stream'
import msgpack from 'msgpack-lite'
import pino, { type Logger } from 'pino'
import { vi, type Mock } from 'vitest'
import Connection from '../src/model/connection'
import { createCodec, FrameDecoder } from '../src/model/codec'
import type { UiSink } from '../src/types'

/**
 * Let streams and the serial queue run until nothing is left to do.
 */
export async function settle(turns = 20): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>(resolve => setImmediate(resolve))
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export interface MockSink extends UiSink {
  redraw: Mock
  close: Mock
  shutdown: Mock
}

export function createSink(): MockSink {
  return {
    redraw: vi.fn(),
    close: vi.fn(),
    shutdown: vi.fn()
  }
}

/**
 * The nvim end of a pair of in-memory pipes.
 */
export class FakeNvim {
  // session -> nvim
  public readonly input = new PassThrough()
  // nvim -> session
  public readonly output = new PassThrough()
  public readonly connection = new Connection(this.output, this.input)
  public readonly received: unknown[] = []
  private decoder = new FrameDecoder(createCodec())

  constructor() {
    this.input.on('data', (chunk: Buffer) => {
      this.decoder.feed(chunk)
      for (const msg of this.decoder) {
        this.received.push(msg)
      }
    })
  }

  public send(...messages: unknown[]): void {
    this.output.write(Buffer.concat(messages.map(msg => msgpack.encode(msg))))
  }

  public sendRaw(bytes: Buffer): void {
    this.output.write(bytes)
  }

  public end(): void {
    this.output.end()
  }
}
