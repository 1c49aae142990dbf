export const PatchMode = {
  Replace: 'replace',
  Append: 'append',
  Prepend: 'prepend',
  /** Patches an attribute of the parent element instead of replacing content. */
  Attribute: 'attribute',
} as const

export type PatchMode = (typeof PatchMode)[keyof typeof PatchMode]

export const ContextStatus = {
  NotConnected: 'not-connected',
  Connected: 'connected',
  Closed: 'closed',
} as const

export type ContextStatus = (typeof ContextStatus)[keyof typeof ContextStatus]

/** How long a rendered context waits for its client to connect. */
export const DEFAULT_CONNECT_TIMEOUT = 30_000

/** Default path of the connection endpoint. */
export const DEFAULT_LIVE_PATH = '/__live'

/**
 * Wire protocol version. Bump this when the patch record format
 * changes in a backwards-incompatible way.
 */
export const PROTOCOL_VERSION = 1
