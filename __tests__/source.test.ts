import { PassThrough } from 'stream'
import { describe, expect, it, vi, type Mock } from 'vitest'
import SerialQueue from '../src/model/queue'
import { ReadSource, WriteSource, type IoHandler } from '../src/model/source'
import { settle } from './helpers'

interface MockHandler extends IoHandler {
  onReadable: Mock
  onWritable: Mock
  onCancelled: Mock
}

function createHandler(): MockHandler {
  return {
    onReadable: vi.fn(),
    onWritable: vi.fn(),
    onCancelled: vi.fn()
  }
}

describe('WriteSource', () => {
  it('starts suspended', async () => {
    const handler = createHandler()
    const source = new WriteSource(new SerialQueue(), handler, new PassThrough())
    expect(source.state).toBe('suspended')
    await settle()
    expect(handler.onWritable).not.toHaveBeenCalled()
  })

  it('fires while active until suspended', async () => {
    const handler = createHandler()
    const source = new WriteSource(new SerialQueue(), handler, new PassThrough())
    let calls = 0
    handler.onWritable.mockImplementation(() => {
      calls++
      if (calls == 3) source.suspend()
    })
    source.resume()
    expect(source.state).toBe('active')
    await settle()
    expect(handler.onWritable).toHaveBeenCalledTimes(3)
    expect(source.state).toBe('suspended')
  })

  it('completes a cancellation only once resumed', async () => {
    const handler = createHandler()
    const source = new WriteSource(new SerialQueue(), handler, new PassThrough())
    source.cancel()
    expect(source.isCancelled()).toBe(true)
    expect(source.state).toBe('cancelled')
    await settle()
    expect(handler.onCancelled).not.toHaveBeenCalled()
    source.resume()
    await settle()
    expect(handler.onCancelled).toHaveBeenCalledTimes(1)
    expect(handler.onCancelled).toHaveBeenCalledWith('write')
    expect(handler.onWritable).not.toHaveBeenCalled()
  })

  it('stays quiet once the writer has ended', async () => {
    const handler = createHandler()
    const writer = new PassThrough()
    const source = new WriteSource(new SerialQueue(), handler, writer)
    writer.end()
    source.resume()
    await settle()
    expect(handler.onWritable).not.toHaveBeenCalled()
    expect(source.state).toBe('active')
  })

  it('delivers no event after cancel', async () => {
    const handler = createHandler()
    const source = new WriteSource(new SerialQueue(), handler, new PassThrough())
    source.resume()
    source.cancel()
    source.cancel()
    await settle()
    expect(handler.onWritable).not.toHaveBeenCalled()
    expect(handler.onCancelled).toHaveBeenCalledTimes(1)
  })
})

describe('ReadSource', () => {
  it('fires when data arrives', async () => {
    const handler = createHandler()
    const reader = new PassThrough()
    const source = new ReadSource(new SerialQueue(), handler, reader)
    source.resume()
    await settle()
    expect(handler.onReadable).not.toHaveBeenCalled()
    reader.write('abc')
    await settle()
    expect(handler.onReadable).toHaveBeenCalledTimes(1)
  })

  it('holds events while suspended', async () => {
    const handler = createHandler()
    const reader = new PassThrough()
    const source = new ReadSource(new SerialQueue(), handler, reader)
    reader.write('abc')
    await settle()
    expect(handler.onReadable).not.toHaveBeenCalled()
    source.resume()
    await settle()
    expect(handler.onReadable).toHaveBeenCalledTimes(1)
  })

  it('stops listening to the stream once cancelled', async () => {
    const handler = createHandler()
    const reader = new PassThrough()
    const source = new ReadSource(new SerialQueue(), handler, reader)
    source.resume()
    source.cancel()
    reader.write('abc')
    await settle()
    expect(handler.onReadable).not.toHaveBeenCalled()
    expect(handler.onCancelled).toHaveBeenCalledWith('read')
    expect(reader.listenerCount('readable')).toBe(0)
    expect(reader.listenerCount('end')).toBe(0)
  })
})
