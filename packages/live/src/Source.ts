/**
 * What a source pushes to its listeners: a new value, or the signal
 * that the UI bound to the source should be deleted.
 */
export type SourceEvent<T> = { type: 'value'; value: T } | { type: 'removed' }

export type SourceListener<T> = (event: SourceEvent<T>) => void

/**
 * Push-based value producer consumed by the engine.
 *
 * `listen` does not replay the current value; the initial render reads
 * it through `current()` and listeners only see later changes.
 */
export interface Source<T> {
  /** The latest value, or undefined if none has been produced yet. */
  current(): T | undefined
  /** Subscribe to future events. Returns the unlisten function. */
  listen(listener: SourceListener<T>): () => void
  /** Release the source. No events are delivered after this. */
  close(): void
}

export function valueEvent<T>(value: T): SourceEvent<T> {
  return { type: 'value', value }
}

export const REMOVED: SourceEvent<never> = { type: 'removed' }

/**
 * Writable source holding a single value.
 */
export class StateSource<T> implements Source<T> {
  private value: T | undefined
  private listeners = new Set<SourceListener<T>>()
  private closed = false

  constructor(initial?: T) {
    this.value = initial
  }

  get isClosed(): boolean {
    return this.closed
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  current(): T | undefined {
    return this.value
  }

  listen(listener: SourceListener<T>): () => void {
    if (this.closed) return () => {}
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  set(value: T): void {
    if (this.closed) return
    this.value = value
    this.emit(valueEvent(value))
  }

  update(fn: (previous: T | undefined) => T): void {
    this.set(fn(this.value))
  }

  /** Ask every bound component to delete itself. */
  remove(): void {
    if (this.closed) return
    this.emit(REMOVED)
  }

  close(): void {
    this.closed = true
    this.listeners.clear()
  }

  private emit(event: SourceEvent<T>): void {
    // Copy so listeners may unlisten (or register) while we iterate
    for (const listener of [...this.listeners]) {
      listener(event)
    }
  }
}

/**
 * Create a writable source and its setter, for use inside render functions.
 *
 * @example
 * const [waiting, setWaiting] = useState<{ code: string }>()
 * scope.live(waiting, ({ code }) => `Waiting for player, code ${code}`)
 */
export function useState<T>(initial?: T): readonly [StateSource<T>, (value: T) => void] {
  const source = new StateSource<T>(initial)
  return [source, (value: T) => source.set(value)] as const
}

/**
 * Source derived from other sources. Recomputed when any input emits and
 * only emits when the derived value actually changes.
 */
class ComputedSource<R> implements Source<R> {
  private listeners = new Set<SourceListener<R>>()
  private unlistenInputs: Array<() => void> = []
  private value: R
  private closed = false

  constructor(
    private inputs: readonly Source<unknown>[],
    private read: () => R,
    private isEqual: (previous: R, next: R) => boolean,
  ) {
    this.value = read()
  }

  current(): R | undefined {
    return this.value
  }

  listen(listener: SourceListener<R>): () => void {
    if (this.closed) return () => {}
    if (this.listeners.size === 0) this.attach()
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
      if (this.listeners.size === 0) this.detach()
    }
  }

  close(): void {
    this.closed = true
    this.listeners.clear()
    this.detach()
  }

  private attach(): void {
    // Inputs may have moved on while nobody was listening
    this.value = this.read()
    this.unlistenInputs = this.inputs.map((input) =>
      input.listen((event) => {
        if (event.type === 'removed') {
          this.emit(REMOVED)
          return
        }
        const next = this.read()
        if (this.isEqual(this.value, next)) return
        this.value = next
        this.emit(valueEvent(next))
      }),
    )
  }

  private detach(): void {
    for (const unlisten of this.unlistenInputs) unlisten()
    this.unlistenInputs = []
  }

  private emit(event: SourceEvent<R>): void {
    for (const listener of [...this.listeners]) {
      listener(event)
    }
  }
}

/**
 * Derive a source from one or more inputs. `read` pulls the current
 * values of the inputs it needs; it runs whenever any input emits.
 *
 * @example
 * const total = computed([price, quantity], () => (price.current() ?? 0) * (quantity.current() ?? 0))
 */
export function computed<R>(inputs: readonly Source<unknown>[], read: () => R): Source<R> {
  return new ComputedSource(inputs, read, Object.is)
}

/**
 * Project an object source onto part of it. The result only emits when the
 * projection changes under a shallow comparison, so unrelated changes to
 * the input do not re-render components bound to it.
 *
 * @example
 * const players = select(game, ({ players, turn }) => ({ players, turn }))
 */
export function select<T, R>(source: Source<T>, project: (value: T) => R): Source<R | undefined> {
  return new ComputedSource<R | undefined>(
    [source],
    () => {
      const value = source.current()
      return value === undefined ? undefined : project(value)
    },
    shallowEqual,
  )
}

export function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false
  if (Array.isArray(a) !== Array.isArray(b)) return false
  const left = Object.entries(a)
  const right = new Map(Object.entries(b))
  return left.length === right.size && left.every(([key, value]) => right.has(key) && Object.is(value, right.get(key)))
}
