import type { PatchMode } from './constants'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/**
 * Rendered payload of an update patch.
 * Markup is inserted as HTML by the client, structured data is handed
 * to client-side bindings as-is.
 */
export type PatchPayload = { encoding: 'markup'; markup: string } | { encoding: 'structured'; data: JsonValue }

/**
 * A single UI delta. Deletions carry only the target id: the client
 * removes the element and nothing else needs to be described.
 */
export type Patch =
  | { kind: 'update'; target: number; mode: PatchMode; payload: PatchPayload }
  | { kind: 'delete'; target: number }

// --- Server -> Client ---

export interface UpdateRecord {
  targetId: number
  mode: PatchMode
  encoding: PatchPayload['encoding']
  payload: JsonValue
}

export interface DeleteRecord {
  targetId: number
  mode: 'delete'
}

/** One element of an outbound batch. */
export type PatchRecord = UpdateRecord | DeleteRecord

// --- Client -> Server ---

export interface CallbackInvocation {
  callbackId: number
  args: JsonValue[]
}

export type Callback = (...args: JsonValue[]) => void | Promise<void>

export type DispatchResult = { status: 'ok' } | { status: 'not-found' } | { status: 'error'; error: unknown }

/** Where the initial page render is written. A node `ServerResponse` satisfies this. */
export interface OutputSink {
  write(chunk: string): unknown
  end(): unknown
}

/**
 * Outbound half of a client connection. Implementations frame the
 * encoded batch for their channel (raw WebSocket frame, SSE event).
 */
export interface Transport {
  readonly kind: 'websocket' | 'event-stream'
  send(data: string): void
  close(): void
}
