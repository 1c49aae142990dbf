import { randomUUID } from 'node:crypto'
import { ComponentRegistry } from './ComponentRegistry'
import { ContextStatus } from './constants'
import { ProtocolError } from './errors'
import { defaultLogger, type Logger } from './Logger'
import { encodeBatch, parseCallbackFrame } from './protocol'
import { type PageRender, RenderScope } from './RenderScope'
import type { CallbackInvocation, DispatchResult, JsonValue, OutputSink, Patch, Transport } from './types'

/** What the page render left behind. */
export type RenderOutcome =
  | 'live' // at least one component is bound to a source
  | 'static' // nothing to keep alive
  | 'failed' // the page render threw

export type CloseReason = 'timeout' | 'transport-closed' | 'static' | 'render-failed' | 'shutdown'

export interface LiveContextOptions {
  /** Opaque context id. Defaults to a random UUID. */
  id?: string
  logger?: Logger
  /** Called once, when the first transport connects. */
  onConnect?: (context: LiveContext) => void
  /** Called once, after the context has been torn down. */
  onClose?: (context: LiveContext, reason: CloseReason) => void
}

/**
 * One browser tab's live session: the component registry built by the
 * page render plus the transport patches are delivered over.
 *
 * Patches produced before the client connects are buffered and flushed,
 * in order, when the transport connects. All sends go through `send`, so
 * the client sees batches in the order the registry produced them.
 */
export class LiveContext {
  readonly id: string
  readonly registry: ComponentRegistry

  private _status: ContextStatus = ContextStatus.NotConnected
  private transport: Transport | null = null
  private pending: string[] = []
  private rendered = false
  private logger: Logger
  private onConnect?: (context: LiveContext) => void
  private onClose?: (context: LiveContext, reason: CloseReason) => void

  constructor(options: LiveContextOptions = {}) {
    this.id = options.id ?? randomUUID()
    this.logger = options.logger ?? defaultLogger
    this.onConnect = options.onConnect
    this.onClose = options.onClose
    this.registry = new ComponentRegistry({
      send: (patches) => this.send(patches),
      logger: this.logger,
    })
  }

  get status(): ContextStatus {
    return this._status
  }

  /** Number of batches waiting for the client to connect. */
  get pendingCount(): number {
    return this.pending.length
  }

  // ---------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------

  /**
   * Run the page render with a root scope bound to this context, writing
   * its output to `sink`. The sink is always ended, even when the page throws.
   */
  render(page: PageRender, sink: OutputSink): RenderOutcome {
    if (this.rendered) throw new Error(`Live context ${this.id} has already been rendered.`)
    this.rendered = true

    let outcome: RenderOutcome
    try {
      const output = page(new RenderScope(this.id, null, this.registry))
      if (typeof output === 'string') {
        sink.write(output)
      } else {
        for (const chunk of output) sink.write(chunk)
      }
      outcome = this.registry.sourcedComponentCount > 0 ? 'live' : 'static'
    } catch (err) {
      this.logger.error('Exception while rendering page:', err)
      outcome = 'failed'
    }

    try {
      sink.end()
    } catch (err) {
      this.logger.warn('Failed to end render output:', err)
    }
    return outcome
  }

  // ---------------------------------------------------------------
  // Connection
  // ---------------------------------------------------------------

  /**
   * Attach the client's transport. Only the first connection of a
   * not-yet-connected context is accepted.
   */
  connect(transport: Transport): boolean {
    if (this._status !== ContextStatus.NotConnected) return false

    this.transport = transport
    this._status = ContextStatus.Connected
    this.logger.debug(`Context ${this.id} connected over ${transport.kind}`)

    const pending = this.pending
    this.pending = []
    for (const data of pending) this.write(data)

    this.onConnect?.(this)
    return true
  }

  /** Deliver one batch of patches, or buffer it until the client connects. */
  send(patches: Patch[]): void {
    if (this._status === ContextStatus.Closed || patches.length === 0) return
    const data = encodeBatch(patches)
    if (this.transport) {
      this.write(data)
    } else {
      this.pending.push(data)
    }
  }

  // ---------------------------------------------------------------
  // Callbacks
  // ---------------------------------------------------------------

  /** Invoke a registered callback with positional arguments. */
  async dispatchCallback(callbackId: number, args: JsonValue[] = []): Promise<DispatchResult> {
    const callback = this._status === ContextStatus.Closed ? undefined : this.registry.getCallback(callbackId)
    if (!callback) {
      this.logger.warn(`Got callback with unrecognized id: ${callbackId}`)
      return { status: 'not-found' }
    }

    try {
      await callback(...args)
      return { status: 'ok' }
    } catch (error) {
      this.logger.error(`Callback ${callbackId} threw:`, error)
      return { status: 'error', error }
    }
  }

  /**
   * Handle an inbound persistent-connection frame. Malformed frames are
   * logged and ignored; they never close the connection.
   */
  async handleFrame(frame: string): Promise<DispatchResult | null> {
    let invocation: CallbackInvocation
    try {
      invocation = parseCallbackFrame(frame)
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err
      this.logger.warn(`Ignoring malformed frame: ${err.message}`, frame)
      return null
    }
    return this.dispatchCallback(invocation.callbackId, invocation.args)
  }

  // ---------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------

  /**
   * Close every source, drop every callback and release the transport.
   * Safe to call more than once; only the first call has any effect.
   */
  close(reason: CloseReason): void {
    if (this._status === ContextStatus.Closed) return
    this._status = ContextStatus.Closed
    this.pending = []
    this.registry.teardown()

    const transport = this.transport
    this.transport = null
    if (transport && reason !== 'transport-closed') {
      try {
        transport.close()
      } catch (err) {
        this.logger.warn(`Closing transport of context ${this.id} failed:`, err)
      }
    }

    this.logger.debug(`Context ${this.id} closed (${reason})`)
    this.onClose?.(this, reason)
  }

  private write(data: string): void {
    if (!this.transport) return
    try {
      this.transport.send(data)
    } catch (err) {
      this.logger.warn(`Sending to context ${this.id} failed:`, err)
    }
  }
}
