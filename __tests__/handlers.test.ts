import { describe, expect, it, vi } from 'vitest'
import HandlerTable from '../src/model/handlers'

describe('HandlerTable', () => {
  it('reports a stored handler until it is taken', () => {
    const table = new HandlerTable(4)
    const handler = vi.fn()
    const id = table.store(handler)
    expect(table.hasHandler(id)).toBe(true)
    expect(table.get(id)).toBe(handler)
    expect(table.size).toBe(1)
    expect(table.take(id)).toBe(handler)
    expect(table.hasHandler(id)).toBe(false)
    expect(table.take(id)).toBeUndefined()
    expect(table.size).toBe(0)
  })

  it('empties the table on takeAll', () => {
    const table = new HandlerTable(4)
    table.store(vi.fn())
    table.store(vi.fn())
    table.store(vi.fn())
    table.take(2)
    expect(table.takeAll()).toEqual([1, 3])
    expect(table.size).toBe(0)
    expect(table.hasHandler(1)).toBe(false)
    expect(table.capacity).toBe(4)
    expect(table.takeAll()).toEqual([])
  })

  it('hands out ids round-robin after the last one', () => {
    const table = new HandlerTable(4)
    const ids = [table.store(vi.fn()), table.store(vi.fn()), table.store(vi.fn())]
    expect(ids).toEqual([1, 2, 3])
    table.take(2)
    // wraps to the start before reusing 2
    expect(table.store(vi.fn())).toBe(0)
    expect(table.store(vi.fn())).toBe(2)
  })

  it('doubles its capacity when every slot is taken', () => {
    const table = new HandlerTable(4)
    const ids: number[] = []
    for (let i = 0; i < 5; i++) {
      ids.push(table.store(vi.fn()))
    }
    expect(ids).toEqual([1, 2, 3, 0, 4])
    expect(new Set(ids).size).toBe(5)
    expect(table.capacity).toBe(8)
    expect(ids.every(id => table.hasHandler(id))).toBe(true)
  })

  it('does not reuse a freed slot while later slots are free', () => {
    const table = new HandlerTable(8)
    const first = table.store(vi.fn())
    table.take(first)
    expect(table.store(vi.fn())).toBe(first + 1)
  })

  it('rejects ids out of bounds', () => {
    const table = new HandlerTable(2)
    expect(table.hasHandler(-1)).toBe(false)
    expect(table.hasHandler(2)).toBe(false)
    expect(table.hasHandler(0xffffffff)).toBe(false)
    expect(table.get(7)).toBeUndefined()
  })

  it('keeps at least one slot', () => {
    const table = new HandlerTable(0)
    expect(table.capacity).toBe(1)
    expect(table.store(vi.fn())).toBe(0)
    expect(table.store(vi.fn())).toBe(1)
    expect(table.capacity).toBe(2)
  })
})
