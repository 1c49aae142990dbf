export type {
  ComponentEntry,
  ComponentOptions,
  ComponentRegistryOptions,
  ComponentRender,
  DidUpdatePatch,
} from './ComponentRegistry'
export { ComponentRegistry } from './ComponentRegistry'
export type { ContextDirectoryOptions } from './ContextDirectory'
export { ContextDirectory } from './ContextDirectory'
export { ContextStatus, DEFAULT_CONNECT_TIMEOUT, DEFAULT_LIVE_PATH, PatchMode, PROTOCOL_VERSION } from './constants'
export { ProtocolError } from './errors'
export type { CloseReason, LiveContextOptions, RenderOutcome } from './LiveContext'
export { LiveContext } from './LiveContext'
export type { Logger, LoggerOptions, LogLevel } from './Logger'
export { createLogger, defaultLogger, isLogLevel, silentLogger } from './Logger'
export { deletePatch, markup, structured, targetsParent, toRecord, updatePatch } from './patch'
export {
  decodeBatch,
  encodeBatch,
  encodeEvent,
  parseCallbackBody,
  parseCallbackFrame,
} from './protocol'
export type { AttributeValue, LiveOptions, MarkupRender, PageRender } from './RenderScope'
export { escapeHtml, LIVE_ATTRIBUTE, RenderScope } from './RenderScope'
export type { Source, SourceEvent, SourceListener } from './Source'
export { computed, REMOVED, select, shallowEqual, StateSource, useState, valueEvent } from './Source'
export type {
  Callback,
  CallbackInvocation,
  DeleteRecord,
  DispatchResult,
  JsonValue,
  OutputSink,
  Patch,
  PatchPayload,
  PatchRecord,
  Transport,
  UpdateRecord,
} from './types'
