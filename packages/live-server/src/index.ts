export type { ClientScriptOptions } from './clientScript'
export { clientScript } from './clientScript'
export type { ConnectResult, HttpResult, LiveConnectionHandlerOptions } from './LiveConnectionHandler'
export { LiveConnectionHandler } from './LiveConnectionHandler'
export { renderPage } from './renderPage'
export type { EventStreamResponse } from './transports'
export { EventStreamTransport, WebSocketTransport } from './transports'
export type { WebSocketLike } from './WebSocketLike'
