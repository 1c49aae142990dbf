import { describe, expect, it, vi } from 'vitest'
import { computed, REMOVED, select, shallowEqual, StateSource, useState, valueEvent } from '../src/Source'

describe('StateSource', () => {
  it('exposes the current value without replaying it to listeners', () => {
    const source = new StateSource(1)
    const listener = vi.fn()
    source.listen(listener)

    expect(source.current()).toBe(1)
    expect(listener).not.toHaveBeenCalled()
  })

  it('pushes new values and removal', () => {
    const source = new StateSource<number>()
    const listener = vi.fn()
    source.listen(listener)

    source.set(2)
    source.update((n) => (n ?? 0) + 1)
    source.remove()

    expect(listener.mock.calls).toEqual([[valueEvent(2)], [valueEvent(3)], [REMOVED]])
  })

  it('stops delivering after unlisten', () => {
    const source = new StateSource(0)
    const listener = vi.fn()
    const unlisten = source.listen(listener)

    unlisten()
    source.set(1)

    expect(listener).not.toHaveBeenCalled()
    expect(source.listenerCount).toBe(0)
  })

  it('ignores writes after close', () => {
    const source = new StateSource(0)
    const listener = vi.fn()
    source.listen(listener)

    source.close()
    source.set(5)
    source.listen(listener)

    expect(source.isClosed).toBe(true)
    expect(source.current()).toBe(0)
    expect(listener).not.toHaveBeenCalled()
    expect(source.listenerCount).toBe(0)
  })

  it('useState returns the source and a setter', () => {
    const [source, set] = useState('a')
    set('b')
    expect(source.current()).toBe('b')
  })
})

describe('computed', () => {
  it('derives from several inputs and skips unchanged results', () => {
    const price = new StateSource(2)
    const quantity = new StateSource(3)
    const total = computed([price, quantity], () => (price.current() ?? 0) * (quantity.current() ?? 0))
    const listener = vi.fn()
    total.listen(listener)

    expect(total.current()).toBe(6)

    quantity.set(4)
    price.set(2)
    price.set(1)

    expect(listener.mock.calls).toEqual([[valueEvent(8)], [valueEvent(4)]])
  })

  it('propagates removal of an input', () => {
    const input = new StateSource(1)
    const doubled = computed([input], () => (input.current() ?? 0) * 2)
    const listener = vi.fn()
    doubled.listen(listener)

    input.remove()

    expect(listener).toHaveBeenCalledWith(REMOVED)
  })

  it('detaches from its inputs when closed', () => {
    const input = new StateSource(1)
    const derived = computed([input], () => input.current())
    derived.listen(() => {})
    expect(input.listenerCount).toBe(1)

    derived.close()

    expect(input.listenerCount).toBe(0)
    expect(input.isClosed).toBe(false)
  })

  it('only listens to inputs while it has listeners', () => {
    const input = new StateSource(1)
    const derived = computed([input], () => input.current())
    expect(input.listenerCount).toBe(0)

    const unlisten = derived.listen(() => {})
    expect(input.listenerCount).toBe(1)

    unlisten()
    expect(input.listenerCount).toBe(0)
  })
})

describe('select', () => {
  it('emits only when the projection changes', () => {
    const game = new StateSource({ turn: 'x', board: [0, 0], players: 2 })
    const turnInfo = select(game, ({ turn, players }) => ({ turn, players }))
    const listener = vi.fn()
    turnInfo.listen(listener)

    game.set({ turn: 'x', board: [1, 0], players: 2 })
    game.set({ turn: 'o', board: [1, 0], players: 2 })

    expect(listener.mock.calls).toEqual([[valueEvent({ turn: 'o', players: 2 })]])
  })
})

describe('shallowEqual', () => {
  it('compares one level deep', () => {
    const shared = { a: 1 }
    expect(shallowEqual({ x: shared, y: 2 }, { x: shared, y: 2 })).toBe(true)
    expect(shallowEqual({ x: { a: 1 } }, { x: { a: 1 } })).toBe(false)
    expect(shallowEqual({ x: 1 }, { x: 1, y: 2 })).toBe(false)
    expect(shallowEqual([1, 2], [1, 2])).toBe(true)
    expect(shallowEqual([1], { 0: 1 })).toBe(false)
    expect(shallowEqual(null, {})).toBe(false)
  })
})
