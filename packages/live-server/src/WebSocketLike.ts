/**
 * Minimal WebSocket interface so the handler isn't tied to one socket type.
 * The `ws` package's WebSocket satisfies it, as do simple test doubles.
 */
export interface WebSocketLike {
  send(data: string): void
  close(): void
}
