import { PatchMode } from './constants'
import { ProtocolError } from './errors'
import { toRecord } from './patch'
import type { CallbackInvocation, JsonValue, Patch, PatchRecord } from './types'

const PATCH_MODES: ReadonlySet<string> = new Set(Object.values(PatchMode))

/** Serialize one batch of patches as a single outbound message. */
export function encodeBatch(patches: readonly Patch[]): string {
  return JSON.stringify(patches.map(toRecord))
}

/** Frame a message as a Server-Sent-Events event. */
export function encodeEvent(data: string): string {
  return `data: ${data}\n\n`
}

/**
 * Decode an outbound batch. Used by clients and tests; the server never
 * receives patch records.
 */
export function decodeBatch(data: string): PatchRecord[] {
  const parsed = parseJson(data)
  if (!Array.isArray(parsed)) {
    throw new ProtocolError('Patch batch must be an array', data)
  }
  return parsed.map((entry) => toPatchRecord(entry, data))
}

/**
 * Parse a persistent-connection callback frame.
 *
 * Frames are `<id>:<json array of args>`, or a bare `<id>` for a call
 * without arguments.
 */
export function parseCallbackFrame(frame: string): CallbackInvocation {
  const idx = frame.indexOf(':')
  const callbackId = parseId(idx === -1 ? frame : frame.slice(0, idx), frame)
  if (idx === -1) return { callbackId, args: [] }

  const args = parseJson(frame.slice(idx + 1), frame)
  if (!Array.isArray(args)) {
    throw new ProtocolError('Callback arguments must be a JSON array', frame)
  }
  return { callbackId, args }
}

/** Parse a POST callback body: `[callbackId, ...args]`. */
export function parseCallbackBody(body: string): CallbackInvocation {
  const parsed = parseJson(body)
  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new ProtocolError('Callback body must be a non-empty JSON array', body)
  }
  const [id, ...args] = parsed
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id < 0) {
    throw new ProtocolError('Callback id must be a non-negative integer', body)
  }
  return { callbackId: id, args }
}

// ---------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------

function parseId(text: string, input: string): number {
  const trimmed = text.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ProtocolError(`Invalid callback id "${text}"`, input)
  }
  return Number(trimmed)
}

function parseJson(text: string, input: string = text): JsonValue {
  try {
    return JSON.parse(text)
  } catch {
    throw new ProtocolError('Malformed JSON', input)
  }
}

function toPatchRecord(entry: JsonValue, input: string): PatchRecord {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    throw new ProtocolError('Patch record must be an object', input)
  }
  const { targetId, mode, encoding, payload } = entry
  if (typeof targetId !== 'number') {
    throw new ProtocolError('Patch record is missing targetId', input)
  }
  if (mode === 'delete') {
    return { targetId, mode }
  }
  if (typeof mode !== 'string' || !isPatchMode(mode)) {
    throw new ProtocolError(`Unknown patch mode ${String(mode)}`, input)
  }
  if (encoding !== 'markup' && encoding !== 'structured') {
    throw new ProtocolError(`Unknown payload encoding ${String(encoding)}`, input)
  }
  if (payload === undefined) {
    throw new ProtocolError('Patch record is missing payload', input)
  }
  return { targetId, mode, encoding, payload }
}

function isPatchMode(mode: string): mode is PatchMode {
  return PATCH_MODES.has(mode)
}
