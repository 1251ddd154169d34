/**
 * Vertex
 *
 * A mapping-like record stored in a database. Subclasses customize what is
 * persisted (`pack`/`fromPack`) and how insertion behaves (`onInsert`,
 * `isReadyForInsertion`).
 */

import { InvalidValueError, MissingElementError } from "../errors"
import { isReservedKey, toValue, toValueMap, type Value, type ValueMap } from "../value"

/**
 * Place of a vertex that does not belong to any database.
 */
export const DETACHED_PLACE = 0

/**
 * Place setters, reachable only from inside the package (the vertex store and
 * the database). Not re-exported from the package entry point.
 */
export const attachPlace = Symbol("attachPlace")
export const detachPlace = Symbol("detachPlace")

export class Vertex {
  private _place = DETACHED_PLACE
  private readonly elements = new Map<string, Value>()

  constructor(init?: ValueMap) {
    if (init !== undefined) {
      for (const [key, value] of Object.entries(toValueMap(init))) {
        this.elements.set(key, value)
      }
    }
  }

  /**
   * Build a detached vertex from packed data.
   * Used as the default reconstruction when a database loads.
   */
  static fromPack(data: ValueMap): Vertex {
    return new Vertex(data)
  }

  // ===========================================================================
  // PLACE
  // ===========================================================================

  /** Stable identity inside its database, 0 while detached */
  get place(): number {
    return this._place
  }

  get isInserted(): boolean {
    return this._place !== DETACHED_PLACE
  }

  [attachPlace](place: number): void {
    this._place = place
  }

  [detachPlace](): void {
    this._place = DETACHED_PLACE
  }

  // ===========================================================================
  // ELEMENTS
  // ===========================================================================

  /**
   * Returns a copy; change nested values through `set`.
   *
   * @throws MissingElementError when the key is absent
   */
  get(key: string): Value {
    const value = this.elements.get(key)
    if (value === undefined) {
      throw new MissingElementError(key)
    }
    return structuredClone(value)
  }

  /**
   * @throws InvalidValueError for a reserved key or a value outside the domain
   */
  set(key: string, value: Value): this {
    if (isReservedKey(key)) {
      throw new InvalidValueError(key, [`Key "${key}" is not allowed`])
    }
    this.elements.set(key, toValue(value, key))
    return this
  }

  delete(key: string): boolean {
    return this.elements.delete(key)
  }

  has(key: string): boolean {
    return this.elements.has(key)
  }

  keys(): IterableIterator<string> {
    return this.elements.keys()
  }

  /** Pairs carry copies, like `get` */
  *entries(): IterableIterator<[string, Value]> {
    for (const [key, value] of this.elements) {
      yield [key, structuredClone(value)]
    }
  }

  get elementCount(): number {
    return this.elements.size
  }

  // ===========================================================================
  // HOOKS
  // ===========================================================================

  /**
   * Export the data to persist. Returns a copy.
   */
  pack(): ValueMap {
    const data: ValueMap = {}
    for (const [key, value] of this.elements) {
      data[key] = value
    }
    return toValueMap(data)
  }

  /**
   * Called right after the vertex receives its place.
   */
  onInsert(): void {}

  /**
   * Insertion gate. Returning false makes `insert` reject the vertex.
   */
  isReadyForInsertion(): boolean {
    return true
  }

  toString(): string {
    return `<Vertex ${this._place} ${JSON.stringify(this.pack())}>`
  }
}

/**
 * Rebuild a vertex from its persisted place and data.
 * The returned vertex must be detached; the store assigns the place.
 */
export type VertexFactory<V extends Vertex = Vertex> = (place: number, data: ValueMap) => V

export const defaultVertexFactory: VertexFactory<Vertex> = (_place, data) => Vertex.fromPack(data)
