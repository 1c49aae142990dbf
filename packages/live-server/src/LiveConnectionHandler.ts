import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import type { Duplex } from 'node:stream'
import {
  type CallbackInvocation,
  type ContextDirectory,
  ContextStatus,
  DEFAULT_LIVE_PATH,
  defaultLogger,
  type LiveContext,
  type Logger,
  ProtocolError,
  PROTOCOL_VERSION,
  parseCallbackBody,
} from '@patchline/live'
import { WebSocketServer } from 'ws'
import { type EventStreamResponse, EventStreamTransport, WebSocketTransport } from './transports'
import type { WebSocketLike } from './WebSocketLike'

export interface LiveConnectionHandlerOptions {
  /** Where rendered contexts are looked up. */
  directory: ContextDirectory
  /** Path of the connection endpoint. Defaults to '/__live'. */
  path?: string
  /** Largest accepted POST body, in bytes. Defaults to 65536. */
  maxBodySize?: number
  logger?: Logger
}

/** Plain-text HTTP reply produced by the callback endpoint. */
export interface HttpResult {
  status: number
  body: string
}

export type ConnectResult = 'connected' | 'not-found' | 'already-connected'

type Refusal = Exclude<ConnectResult, 'connected'> | 'unsupported-version'

/** What the endpoint URL names: the target context and the client's protocol version. */
interface EndpointRequest {
  contextId: string | null
  /** Null when the client did not say. */
  version: string | null
}

/**
 * Serves the connection endpoint of a live-view server.
 *
 * - GET with a WebSocket upgrade: persistent duplex connection.
 * - GET without upgrade: Server-Sent-Events stream.
 * - POST: one-shot callback invocation, body `[callbackId, ...args]`.
 *
 * The target context is named by the `id` query parameter. Clients may
 * send their protocol version as `v`; a persistent connection from a
 * client speaking another version is refused with 400.
 */
export class LiveConnectionHandler {
  readonly path: string
  private directory: ContextDirectory
  private maxBodySize: number
  private logger: Logger
  private wss = new WebSocketServer({ noServer: true })

  constructor(options: LiveConnectionHandlerOptions) {
    this.directory = options.directory
    this.path = options.path ?? DEFAULT_LIVE_PATH
    this.maxBodySize = options.maxBodySize ?? 65_536
    this.logger = options.logger ?? defaultLogger
  }

  // ---------------------------------------------------------------
  // node:http integration
  // ---------------------------------------------------------------

  /** Route WebSocket upgrades on `server` to this handler. */
  attach(server: Server): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      if (!this.handleUpgrade(req, socket, head)) socket.destroy()
    })
  }

  /**
   * Handle a plain HTTP request. Returns false when the request is not
   * for the connection endpoint, leaving `res` untouched.
   */
  handleRequest(req: IncomingMessage, res: ServerResponse): boolean {
    const endpoint = this.matchPath(req)
    if (endpoint === undefined) return false
    const { contextId } = endpoint

    if (req.method === 'POST') {
      this.respondToCallback(req, res, contextId).catch((err) => {
        this.logger.error('Failed to handle callback request:', err)
        if (!res.headersSent) reply(res, { status: 500, body: 'Internal error' })
      })
      return true
    }

    if (req.method !== 'GET') {
      reply(res, { status: 405, body: 'Method not allowed' })
      return true
    }

    if (!supportsVersion(endpoint)) {
      reply(res, refusal('unsupported-version'))
      return true
    }

    const result = this.handleEventStreamOpen(contextId, res)
    if (result !== 'connected') {
      reply(res, refusal(result))
      return true
    }
    req.on('close', () => this.handleDisconnect(contextId))
    return true
  }

  /**
   * Handle an HTTP upgrade. Returns false when the request is not for the
   * connection endpoint.
   */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const endpoint = this.matchPath(req)
    if (endpoint === undefined) return false
    const { contextId } = endpoint

    const context = this.lookup(contextId)
    if (!supportsVersion(endpoint)) {
      refuseUpgrade(socket, 'unsupported-version')
      return true
    }
    if (!context || context.status !== ContextStatus.NotConnected) {
      refuseUpgrade(socket, context ? 'already-connected' : 'not-found')
      return true
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      if (this.handleSocketConnect(contextId, ws) !== 'connected') {
        ws.close()
        return
      }
      ws.on('message', (data) => this.handleSocketMessage(contextId, String(data)))
      ws.on('close', () => this.handleDisconnect(contextId))
      ws.on('error', (err) => {
        this.logger.warn(`WebSocket error on context ${contextId}:`, err)
        this.handleDisconnect(contextId)
      })
    })
    return true
  }

  /** Stop accepting WebSocket connections. */
  close(): void {
    this.wss.close()
  }

  // ---------------------------------------------------------------
  // Transport-agnostic entry points
  // ---------------------------------------------------------------

  handleSocketConnect(contextId: string | null, socket: WebSocketLike): ConnectResult {
    const context = this.lookup(contextId)
    if (!context) return 'not-found'
    return context.connect(new WebSocketTransport(socket)) ? 'connected' : 'already-connected'
  }

  handleSocketMessage(contextId: string | null, data: string): void {
    const context = this.lookup(contextId)
    if (!context) return
    context.handleFrame(data).catch((err) => {
      this.logger.error(`Failed to handle frame on context ${context.id}:`, err)
    })
  }

  handleEventStreamOpen(contextId: string | null, res: EventStreamResponse): ConnectResult {
    const context = this.lookup(contextId)
    if (!context) return 'not-found'
    if (context.status !== ContextStatus.NotConnected) return 'already-connected'

    const transport = new EventStreamTransport(res)
    transport.open()
    context.connect(transport)
    return 'connected'
  }

  /** The client went away: tear the context down. */
  handleDisconnect(contextId: string | null): void {
    this.lookup(contextId)?.close('transport-closed')
  }

  /** Dispatch a POST callback body and describe the HTTP reply. */
  async handleCallbackPost(contextId: string | null, body: string): Promise<HttpResult> {
    const context = this.lookup(contextId)
    if (!context) return refusal('not-found')

    let invocation: CallbackInvocation
    try {
      invocation = parseCallbackBody(body)
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err
      this.logger.warn(`Ignoring malformed callback body: ${err.message}`, body)
      return { status: 400, body: 'Malformed callback' }
    }

    const result = await context.dispatchCallback(invocation.callbackId, invocation.args)
    switch (result.status) {
      case 'ok':
        return { status: 200, body: '' }
      case 'not-found':
        return { status: 404, body: 'Unknown callback' }
      case 'error':
        return { status: 500, body: 'Callback failed' }
    }
  }

  // ---------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------

  private lookup(contextId: string | null): LiveContext | undefined {
    return contextId === null ? undefined : this.directory.lookup(contextId)
  }

  /** Undefined when the request is not for the connection endpoint. */
  private matchPath(req: IncomingMessage): EndpointRequest | undefined {
    const url = new URL(req.url ?? '/', 'http://localhost')
    if (url.pathname !== this.path) return undefined
    return { contextId: url.searchParams.get('id'), version: url.searchParams.get('v') }
  }

  private async respondToCallback(req: IncomingMessage, res: ServerResponse, contextId: string | null): Promise<void> {
    const body = await this.readBody(req)
    const result = body === null ? { status: 413, body: 'Callback body too large' } : await this.handleCallbackPost(contextId, body)
    reply(res, result)
  }

  /** Resolves to the body text, or null once it exceeds the size limit. */
  private async readBody(req: IncomingMessage): Promise<string | null> {
    const chunks: Buffer[] = []
    let size = 0
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
      size += buffer.length
      if (size > this.maxBodySize) return null
      chunks.push(buffer)
    }
    return Buffer.concat(chunks).toString('utf8')
  }
}

function supportsVersion(endpoint: EndpointRequest): boolean {
  return endpoint.version === null || endpoint.version === String(PROTOCOL_VERSION)
}

function refusal(reason: Refusal): HttpResult {
  switch (reason) {
    case 'not-found':
      return { status: 404, body: 'No such live context' }
    case 'already-connected':
      return { status: 409, body: 'Live context already connected' }
    case 'unsupported-version':
      return { status: 400, body: `Unsupported protocol version, expected ${PROTOCOL_VERSION}` }
  }
}

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
}

/** Answer an upgrade request on the raw socket. */
function refuseUpgrade(socket: Duplex, reason: Refusal): void {
  const { status, body } = refusal(reason)
  socket.end(`HTTP/1.1 ${status} ${STATUS_TEXT[status]}\r\nContent-Type: text/plain\r\n\r\n${body}`)
}

function reply(res: ServerResponse, result: HttpResult): void {
  res.writeHead(result.status, { 'Content-Type': 'text/plain; charset=utf-8' })
  res.end(result.body)
}
