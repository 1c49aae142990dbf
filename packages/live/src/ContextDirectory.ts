import { ContextStatus, DEFAULT_CONNECT_TIMEOUT } from './constants'
import { LiveContext } from './LiveContext'
import { defaultLogger, type Logger } from './Logger'
import type { PageRender } from './RenderScope'
import type { OutputSink } from './types'

export interface ContextDirectoryOptions {
  /** Close contexts whose client has not connected after this many ms. Default: 30000 (30s). */
  connectTimeout?: number
  logger?: Logger
}

/**
 * Process-wide index of live contexts that are waiting for, or holding,
 * a client connection. Create one per server and shut it down with it.
 */
export class ContextDirectory {
  private contexts = new Map<string, LiveContext>()
  private deadlines = new Map<string, number>()
  private timers = new Map<string, ReturnType<typeof setTimeout>>()
  private connectTimeout: number
  private logger: Logger
  private closed = false

  constructor(options: ContextDirectoryOptions = {}) {
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT
    this.logger = options.logger ?? defaultLogger
  }

  /** True once shutdown() has run; no further contexts are accepted. */
  get isShutdown(): boolean {
    return this.closed
  }

  get size(): number {
    return this.contexts.size
  }

  ids(): string[] {
    return Array.from(this.contexts.keys())
  }

  /**
   * Render a page into `sink` under a new context.
   *
   * Returns the context when the page left live components behind; it then
   * waits for its client until the connect timeout. Static and failed
   * renders are torn down immediately and return null. After shutdown the
   * page is not rendered at all: the sink is ended and null returned.
   */
  render(page: PageRender, sink: OutputSink): LiveContext | null {
    if (this.closed) {
      this.logger.warn('Refusing to render a page after shutdown')
      sink.end()
      return null
    }

    const context = this.create()
    const outcome = context.render(page, sink)

    if (outcome === 'live') {
      this.armDeadline(context)
      return context
    }

    if (outcome === 'static') {
      this.logger.debug(`No live components, removing context ${context.id}`)
    }
    context.close(outcome === 'static' ? 'static' : 'render-failed')
    return null
  }

  /** Create and publish a context that removes itself from this directory when closed. */
  create(): LiveContext {
    const context = new LiveContext({
      logger: this.logger,
      onConnect: (ctx) => this.clearDeadline(ctx.id),
      onClose: (ctx) => this.remove(ctx.id),
    })
    this.publish(context)
    return context
  }

  publish(context: LiveContext): void {
    if (this.closed) {
      throw new Error('Context directory has been shut down.')
    }
    if (this.contexts.has(context.id)) {
      throw new Error(`Live context ${context.id} is already published.`)
    }
    this.contexts.set(context.id, context)
  }

  lookup(id: string): LiveContext | undefined {
    return this.contexts.get(id)
  }

  /** Remove a context from the index. Does not close it. */
  remove(id: string): boolean {
    this.clearDeadline(id)
    return this.contexts.delete(id)
  }

  /**
   * Close every context still waiting for its client after its deadline.
   * Returns how many were closed.
   */
  sweep(now: number = Date.now()): number {
    let swept = 0
    for (const [id, deadline] of [...this.deadlines]) {
      if (deadline > now) continue
      if (this.expire(id)) swept++
    }
    return swept
  }

  /** Close every context and refuse new ones. */
  shutdown(): void {
    this.closed = true
    for (const context of [...this.contexts.values()]) {
      context.close('shutdown')
    }
    for (const timer of this.timers.values()) clearTimeout(timer)
    this.timers.clear()
    this.deadlines.clear()
    this.contexts.clear()
  }

  // ---------------------------------------------------------------
  // Connect deadline
  // ---------------------------------------------------------------

  private armDeadline(context: LiveContext): void {
    if (context.status !== ContextStatus.NotConnected) return
    this.clearDeadline(context.id)
    this.deadlines.set(context.id, Date.now() + this.connectTimeout)
    const timer = setTimeout(() => {
      this.timers.delete(context.id)
      this.expire(context.id)
    }, this.connectTimeout)
    this.timers.set(context.id, timer)
  }

  private expire(id: string): boolean {
    this.deadlines.delete(id)
    const context = this.contexts.get(id)
    if (!context || context.status !== ContextStatus.NotConnected) return false
    this.logger.info(`Removing context ${id} that wasn't connected within ${this.connectTimeout}ms`)
    context.close('timeout')
    return true
  }

  private clearDeadline(id: string): void {
    this.deadlines.delete(id)
    const timer = this.timers.get(id)
    if (timer) {
      clearTimeout(timer)
      this.timers.delete(id)
    }
  }
}
