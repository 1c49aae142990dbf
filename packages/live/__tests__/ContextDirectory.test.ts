import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ContextDirectory } from '../src/ContextDirectory'
import { LiveContext } from '../src/LiveContext'
import { silentLogger } from '../src/Logger'
import type { PageRender } from '../src/RenderScope'
import { createMockLogger, createMockTransport, createSink, ManualSource } from './helpers'

describe('ContextDirectory', () => {
  let directory: ContextDirectory
  let source: ManualSource<number>
  let livePage: PageRender

  beforeEach(() => {
    vi.useFakeTimers()
    directory = new ContextDirectory({ connectTimeout: 1000, logger: silentLogger })
    source = new ManualSource(0)
    livePage = (scope) => scope.live(source, String)
  })

  afterEach(() => {
    directory.shutdown()
    vi.useRealTimers()
  })

  describe('render', () => {
    it('publishes a context for a page with live components', () => {
      const context = directory.render(livePage, createSink())

      expect(context).toBeInstanceOf(LiveContext)
      expect(directory.size).toBe(1)
      expect(context && directory.lookup(context.id)).toBe(context)
    })

    it('drops a static page immediately', () => {
      const sink = createSink()

      expect(directory.render(() => '<p>static</p>', sink)).toBeNull()
      expect(directory.size).toBe(0)
      expect(sink.chunks).toEqual(['<p>static</p>'])
    })

    it('drops a page that fails to render and releases its sources', () => {
      const context = directory.render((scope) => {
        scope.live(source, String)
        throw new Error('boom')
      }, createSink())

      expect(context).toBeNull()
      expect(directory.size).toBe(0)
      expect(source.close).toHaveBeenCalledTimes(1)
    })

    it('gives every context its own id', () => {
      const first = directory.render(livePage, createSink())
      const second = directory.render((scope) => scope.live(new ManualSource(1), String), createSink())

      expect(first?.id).not.toBe(second?.id)
      expect(directory.ids()).toHaveLength(2)
    })
  })

  describe('connect timeout', () => {
    it('closes a context whose client never connects', () => {
      const logger = createMockLogger()
      directory = new ContextDirectory({ connectTimeout: 1000, logger })
      const context = directory.render(livePage, createSink())

      vi.advanceTimersByTime(999)
      expect(directory.size).toBe(1)

      vi.advanceTimersByTime(1)
      expect(directory.size).toBe(0)
      expect(context?.status).toBe('closed')
      expect(source.close).toHaveBeenCalledTimes(1)
      expect(logger.info).toHaveBeenCalledWith(`Removing context ${context?.id} that wasn't connected within 1000ms`)
    })

    it('keeps a connected context past the timeout', () => {
      const context = directory.render(livePage, createSink())
      context?.connect(createMockTransport())

      vi.advanceTimersByTime(5000)

      expect(directory.size).toBe(1)
      expect(context?.status).toBe('connected')
    })

    it('defaults to thirty seconds', () => {
      directory = new ContextDirectory({ logger: silentLogger })
      directory.render(livePage, createSink())

      vi.advanceTimersByTime(29_999)
      expect(directory.size).toBe(1)
      vi.advanceTimersByTime(1)
      expect(directory.size).toBe(0)
    })
  })

  describe('sweep', () => {
    it('closes only contexts past their deadline', () => {
      const waiting = directory.render(livePage, createSink())
      const connected = directory.render((scope) => scope.live(new ManualSource(1), String), createSink())
      connected?.connect(createMockTransport())

      expect(directory.sweep(Date.now() + 500)).toBe(0)
      expect(directory.sweep(Date.now() + 1000)).toBe(1)

      expect(waiting?.status).toBe('closed')
      expect(directory.ids()).toEqual(connected ? [connected.id] : [])
    })
  })

  describe('removal', () => {
    it('forgets a context once its transport closes', () => {
      const context = directory.render(livePage, createSink())
      context?.connect(createMockTransport())

      context?.close('transport-closed')

      expect(directory.size).toBe(0)
      expect(source.close).toHaveBeenCalledTimes(1)
    })

    it('remove reports whether the id was known', () => {
      const context = directory.render(livePage, createSink())

      expect(directory.remove(context?.id ?? '')).toBe(true)
      expect(directory.remove('missing')).toBe(false)
    })

    it('refuses to publish the same context twice', () => {
      const context = new LiveContext({ id: 'fixed', logger: silentLogger })
      directory.publish(context)

      expect(() => directory.publish(context)).toThrow('Live context fixed is already published.')
    })
  })

  describe('shutdown', () => {
    it('closes every context and refuses new ones', () => {
      const context = directory.render(livePage, createSink())
      const transport = createMockTransport()
      context?.connect(transport)

      directory.shutdown()

      expect(directory.size).toBe(0)
      expect(transport.close).toHaveBeenCalledTimes(1)
      expect(source.close).toHaveBeenCalledTimes(1)
      expect(() => directory.create()).toThrow('Context directory has been shut down.')
    })

    it('skips rendering after shutdown instead of throwing', () => {
      directory.shutdown()
      const page = vi.fn(livePage)
      const sink = createSink()

      expect(directory.render(page, sink)).toBeNull()
      expect(directory.isShutdown).toBe(true)
      expect(page).not.toHaveBeenCalled()
      expect(sink.end).toHaveBeenCalledTimes(1)
      expect(source.listeners.size).toBe(0)
    })
  })
})
