import { encodeEvent, type Transport } from '@patchline/live'
import type { WebSocketLike } from './WebSocketLike'

/** Full-duplex transport: each batch is one raw text frame. */
export class WebSocketTransport implements Transport {
  readonly kind = 'websocket'

  constructor(private socket: WebSocketLike) {}

  send(data: string): void {
    this.socket.send(data)
  }

  close(): void {
    this.socket.close()
  }
}

/** The parts of a node `ServerResponse` an event stream writes to. */
export interface EventStreamResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown
  /** Send the head now instead of with the first write. */
  flushHeaders(): void
  write(chunk: string): unknown
  end(): unknown
}

/**
 * Server-Sent-Events transport. Half-duplex: batches are pushed as
 * `data:` events and callbacks arrive through separate POST requests.
 */
export class EventStreamTransport implements Transport {
  readonly kind = 'event-stream'
  private opened = false
  private ended = false

  constructor(private res: EventStreamResponse) {}

  /**
   * Write and flush the stream headers, so the client's EventSource opens
   * even when no patch is pending yet.
   */
  open(): void {
    if (this.opened) return
    this.opened = true
    this.res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    })
    this.res.flushHeaders()
  }

  send(data: string): void {
    if (this.ended) return
    this.open()
    this.res.write(encodeEvent(data))
  }

  close(): void {
    if (this.ended) return
    this.ended = true
    this.res.end()
  }
}
