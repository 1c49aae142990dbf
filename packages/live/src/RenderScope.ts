import { PatchMode } from './constants'
import type { ComponentOptions, ComponentRegistry } from './ComponentRegistry'
import { markup, structured } from './patch'
import type { Source } from './Source'
import type { Callback, JsonValue } from './types'

/** Renders a markup component. Nested registrations go through `scope`. */
export type MarkupRender<T> = (value: T, scope: RenderScope) => string

/** A page render may return its markup whole or yield it in chunks. */
export type PageRender = (scope: RenderScope) => string | Iterable<string>

export type AttributeValue = string | number | boolean | null

export interface LiveOptions<T> {
  /** 'replace' (default), 'append' or 'prepend'. */
  mode?: Exclude<PatchMode, 'attribute'>
  didUpdate?: ComponentOptions<T>['didUpdate']
}

/** Attribute marking the element that wraps a live component. */
export const LIVE_ATTRIBUTE = 'data-live'

/**
 * Handle on "the component currently rendering". Every page and component
 * render receives one; registrations made through it become children of
 * `parentId`, which is how the component tree is built without any
 * ambient state.
 */
export class RenderScope {
  constructor(
    readonly contextId: string,
    readonly parentId: number | null,
    private registry: ComponentRegistry,
  ) {}

  /**
   * Register a markup component bound to `source` and return its initial
   * markup, wrapped in an element the client can target.
   */
  live<T>(source: Source<T>, render: MarkupRender<T>, options: LiveOptions<T> = {}): string {
    const id = this.registry.register(
      this.parentId,
      source,
      (value: T, componentId) => markup(render(value, this.child(componentId))),
      { mode: options.mode ?? PatchMode.Replace, didUpdate: options.didUpdate },
    )
    const value = source.current()
    const inner = value === undefined || value === null ? '' : render(value, this.child(id))
    return wrap(id, inner)
  }

  /**
   * Register a component whose updates are sent as structured data for a
   * client-side binding. Returns the component id the binding listens on.
   */
  data<T>(source: Source<T>, select: (value: T) => JsonValue): number {
    return this.registry.register(this.parentId, source, (value: T) => structured(select(value)), {
      mode: PatchMode.Replace,
    })
  }

  /**
   * Bind attributes of an element to `source`. Returns the text to place
   * inside the element's opening tag: an anchor marker plus the initial
   * attribute values. Updates patch the anchor, never replace it.
   */
  attributes<T>(source: Source<T>, render: (value: T) => Record<string, AttributeValue>): string {
    const anchorId = this.registry.register(this.parentId, null, null)
    this.registry.register(anchorId, source, (value: T) => structured(render(value)), {
      mode: PatchMode.Attribute,
    })
    const value = source.current()
    const initial = value === undefined || value === null ? {} : render(value)
    return `${LIVE_ATTRIBUTE}="${anchorId}"${formatAttributes(initial)}`
  }

  /** Group static markup under its own component so its callbacks share an owner. */
  group(render: (scope: RenderScope) => string): string {
    const id = this.registry.register(this.parentId, null, null)
    return wrap(id, render(this.child(id)))
  }

  /** Register a server-side handler reachable from the client. Returns its id. */
  callback(fn: Callback): number {
    return this.registry.registerCallback(this.parentId, fn)
  }

  private child(componentId: number): RenderScope {
    return new RenderScope(this.contextId, componentId, this.registry)
  }
}

// ---------------------------------------------------------------
// Markup helpers
// ---------------------------------------------------------------

function wrap(id: number, inner: string): string {
  return `<span ${LIVE_ATTRIBUTE}="${id}">${inner}</span>`
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

function formatAttributes(attributes: Record<string, AttributeValue>): string {
  let out = ''
  for (const [name, value] of Object.entries(attributes)) {
    if (value === null || value === false) continue
    out += value === true ? ` ${name}` : ` ${name}="${escapeHtml(String(value))}"`
  }
  return out
}
