import { vi } from 'vitest'
import type { Logger } from '../src/Logger'
import type { Source, SourceEvent, SourceListener } from '../src/Source'
import type { OutputSink, Patch, Transport } from '../src/types'

/**
 * Source driven by hand. Unlike StateSource it keeps emitting after
 * close(), which lets tests check the engine ignores stale events.
 */
export class ManualSource<T> implements Source<T> {
  listeners = new Set<SourceListener<T>>()
  close = vi.fn()

  constructor(private value?: T) {}

  current(): T | undefined {
    return this.value
  }

  listen(listener: SourceListener<T>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  emit(value: T): void {
    this.value = value
    this.dispatch({ type: 'value', value })
  }

  remove(): void {
    this.dispatch({ type: 'removed' })
  }

  private dispatch(event: SourceEvent<T>): void {
    for (const listener of [...this.listeners]) listener(event)
  }
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

export function createSink() {
  const sink = {
    chunks: [] as string[],
    write: vi.fn((chunk: string) => {
      sink.chunks.push(chunk)
    }),
    end: vi.fn(),
  } satisfies OutputSink & { chunks: string[] }
  return sink
}

export function createMockTransport() {
  const transport = {
    kind: 'websocket' as const,
    messages: [] as string[],
    send: vi.fn((data: string) => {
      transport.messages.push(data)
    }),
    close: vi.fn(),
  } satisfies Transport & { messages: string[] }
  return transport
}

export function collectBatches() {
  const batches: Patch[][] = []
  const send = vi.fn((patches: Patch[]) => {
    batches.push(patches)
  })
  return { batches, send }
}
