import { PatchMode } from './constants'
import { defaultLogger, type Logger } from './Logger'
import { deletePatch, targetsParent, updatePatch } from './patch'
import type { Source, SourceEvent } from './Source'
import type { Callback, Patch, PatchPayload } from './types'

/**
 * Renders a component's value. `componentId` is the id nested
 * registrations made during the call must use as their parent.
 */
export type ComponentRender<T> = (value: T, componentId: number) => PatchPayload

/** Secondary patch computed after a successful update. */
export interface DidUpdatePatch {
  mode: PatchMode
  payload: PatchPayload
}

export interface ComponentOptions<T> {
  /** How the client applies updates. Defaults to 'replace'. */
  mode?: PatchMode
  /** Extra patch sent in the same batch as every update. */
  didUpdate?: (value: T) => DidUpdatePatch | undefined
}

export interface ComponentEntry {
  id: number
  parentId: number | null
  mode: PatchMode
  hasSource: boolean
  children: Set<number>
  callbacks: Set<number>
}

/**
 * Rendering half of an entry. Declared with method signatures so that a
 * handler for any value type can be stored in the shared table.
 */
interface ComponentHandler<T> {
  render(value: T, componentId: number): PatchPayload
  didUpdate?(value: T): DidUpdatePatch | undefined
}

interface Entry extends ComponentEntry {
  source: Source<unknown> | null
  handler: ComponentHandler<unknown> | null
  unlisten: (() => void) | null
}

export interface ComponentRegistryOptions {
  /** Receives every batch of patches produced by a source update. */
  send: (patches: Patch[]) => void
  logger?: Logger
}

/**
 * Per-context table of live components and callbacks.
 *
 * Components form a tree: anything registered while a component renders
 * becomes its child and is torn down before that component renders again.
 * Ids come from a single counter shared with callbacks, so they are unique
 * and strictly increasing for the lifetime of the registry.
 */
export class ComponentRegistry {
  private nextId = 0
  private components = new Map<number, Entry>()
  private callbacks = new Map<number, Callback>()
  private send: (patches: Patch[]) => void
  private logger: Logger

  constructor(options: ComponentRegistryOptions) {
    this.send = options.send
    this.logger = options.logger ?? defaultLogger
  }

  get componentCount(): number {
    return this.components.size
  }

  get sourcedComponentCount(): number {
    let count = 0
    for (const entry of this.components.values()) {
      if (entry.hasSource) count++
    }
    return count
  }

  get callbackCount(): number {
    return this.callbacks.size
  }

  getComponent(id: number): ComponentEntry | undefined {
    return this.components.get(id)
  }

  getCallback(id: number): Callback | undefined {
    return this.callbacks.get(id)
  }

  // ---------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------

  /**
   * Register a component under `parentId` (null for a root component) and
   * subscribe to its source, if any. Returns the new component id.
   */
  register<T>(
    parentId: number | null,
    source: Source<T> | null,
    render: ComponentRender<T> | null,
    options: ComponentOptions<T> = {},
  ): number {
    const id = this.nextId++
    const handler: ComponentHandler<T> | null = render && { render, didUpdate: options.didUpdate }
    const entry: Entry = {
      id,
      parentId,
      mode: options.mode ?? PatchMode.Replace,
      hasSource: source !== null,
      children: new Set(),
      callbacks: new Set(),
      source,
      handler,
      unlisten: null,
    }
    this.components.set(id, entry)
    if (parentId !== null) this.components.get(parentId)?.children.add(id)

    if (source) {
      entry.unlisten = source.listen((event) => this.handleSourceValue(id, event))
    }
    return id
  }

  /** Register a callback owned by `parentId`. Returns the callback id. */
  registerCallback(parentId: number | null, fn: Callback): number {
    const id = this.nextId++
    this.callbacks.set(id, fn)
    if (parentId !== null) this.components.get(parentId)?.callbacks.add(id)
    return id
  }

  // ---------------------------------------------------------------
  // Source updates
  // ---------------------------------------------------------------

  /** Turn a source event for component `id` into patches. */
  handleSourceValue(id: number, event: SourceEvent<unknown>): void {
    const entry = this.components.get(id)
    // Already removed: a stale listener or a source that ignored close()
    if (!entry) return

    if (event.type === 'removed') {
      this.remove(entry)
      return
    }

    const { value } = event
    const { handler } = entry
    if (value === null || value === undefined || !handler) return

    this.logger.debug(`component ${id} has new value`, value)
    if (entry.mode === PatchMode.Replace) this.cleanupSubtree(id)

    let payload: PatchPayload
    try {
      payload = handler.render(value, id)
    } catch (err) {
      this.logger.error(`Component ${id} render threw, update skipped:`, err)
      return
    }

    const target = this.targetOf(entry)
    const patches = [updatePatch(target, entry.mode, payload)]
    if (handler.didUpdate) {
      try {
        const extra = handler.didUpdate(value)
        if (extra) patches.push(updatePatch(target, extra.mode, extra.payload))
      } catch (err) {
        this.logger.error(`Component ${id} didUpdate threw:`, err)
      }
    }
    this.send(patches)
  }

  // ---------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------

  /** Unsubscribe and close the component's source and drop its entry. */
  deregister(id: number): void {
    const entry = this.components.get(id)
    if (!entry) return
    this.components.delete(id)
    if (entry.parentId !== null) this.components.get(entry.parentId)?.children.delete(id)
    for (const callbackId of entry.callbacks) this.callbacks.delete(callbackId)
    this.release(entry)
  }

  /**
   * Recursively deregister every child and owned callback of `id`,
   * leaving the component itself registered with an empty subtree.
   */
  cleanupSubtree(id: number): void {
    const entry = this.components.get(id)
    if (!entry) return
    for (const childId of [...entry.children]) {
      this.cleanupSubtree(childId)
      this.deregister(childId)
    }
    for (const callbackId of entry.callbacks) this.callbacks.delete(callbackId)
    entry.children.clear()
    entry.callbacks.clear()
  }

  /** Drop everything. Used when the owning context closes. */
  teardown(): void {
    for (const entry of [...this.components.values()]) {
      if (entry.parentId === null || !this.components.has(entry.parentId)) {
        this.cleanupSubtree(entry.id)
        this.deregister(entry.id)
      }
    }
    this.components.clear()
    this.callbacks.clear()
  }

  // ---------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------

  private remove(entry: Entry): void {
    const patches = targetsParent(entry.mode) ? [] : [deletePatch(entry.id)]
    this.cleanupSubtree(entry.id)
    this.deregister(entry.id)
    if (patches.length > 0) this.send(patches)
  }

  private release(entry: Entry): void {
    const { unlisten, source } = entry
    entry.unlisten = null
    entry.source = null
    try {
      unlisten?.()
      source?.close()
    } catch (err) {
      this.logger.error(`Closing source of component ${entry.id} failed:`, err)
    }
  }

  private targetOf(entry: ComponentEntry): number {
    if (targetsParent(entry.mode) && entry.parentId !== null) return entry.parentId
    return entry.id
  }
}
