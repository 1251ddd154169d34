/**
 * Vertex Store
 *
 * Place allocation and place -> vertex lookup. Places are allocated from a
 * monotonic counter and never handed out twice, even after removal.
 */

import { DuplicateInsertionError, NotInsertedError } from "../errors"
import { restartable } from "../utils"
import { attachPlace, detachPlace, type Vertex } from "../vertex"

export const FIRST_PLACE = 1

export interface VertexStoreOptions<V extends Vertex> {
  /** Called before a vertex is unregistered (edge cascade) */
  onRemove?: (vertex: V) => void
}

export class VertexStore<V extends Vertex = Vertex> {
  /** Inserted vertices by place, kept in place order */
  private vertices = new Map<number, V>()

  private _nextPlace = FIRST_PLACE

  private readonly onRemove?: (vertex: V) => void

  constructor(options: VertexStoreOptions<V> = {}) {
    this.onRemove = options.onRemove
  }

  get nextPlace(): number {
    return this._nextPlace
  }

  get size(): number {
    return this.vertices.size
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  /**
   * Insert a vertex and return its new place, or `false` when its readiness
   * gate rejects it (the vertex then stays detached).
   *
   * @throws DuplicateInsertionError if the vertex is already inserted
   */
  insert(vertex: V): number | false {
    if (vertex.isInserted) {
      throw new DuplicateInsertionError("vertex", vertex.place)
    }

    if (!vertex.isReadyForInsertion()) {
      return false
    }

    const place = this._nextPlace
    this._nextPlace += 1
    vertex[attachPlace](place)
    this.vertices.set(place, vertex)

    vertex.onInsert()
    return place
  }

  /**
   * Remove a vertex, detach it and return the place it had.
   *
   * @throws NotInsertedError if this store does not own the vertex
   */
  remove(vertex: V): number {
    if (!this.contains(vertex)) {
      throw new NotInsertedError("vertex", vertex.isInserted ? vertex.place : undefined)
    }

    const place = vertex.place
    this.onRemove?.(vertex)
    this.vertices.delete(place)
    vertex[detachPlace]()
    return place
  }

  /**
   * Register a detached vertex at a known place. Load path only: places must
   * arrive in ascending order so the map keeps place order.
   */
  restore(place: number, vertex: V): void {
    if (vertex.isInserted) {
      throw new DuplicateInsertionError("vertex", vertex.place)
    }
    if (place < this._nextPlace) {
      throw new DuplicateInsertionError("vertex", place)
    }

    vertex[attachPlace](place)
    this.vertices.set(place, vertex)
    this._nextPlace = place + 1
  }

  /**
   * Raise the allocation counter. Never lowers it.
   */
  reserve(nextPlace: number): void {
    this._nextPlace = Math.max(this._nextPlace, nextPlace)
  }

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  /**
   * @throws NotInsertedError if no vertex holds this place
   */
  get(place: number): V {
    const vertex = this.vertices.get(place)
    if (!vertex) {
      throw new NotInsertedError("vertex", place)
    }
    return vertex
  }

  find(place: number): V | undefined {
    return this.vertices.get(place)
  }

  has(place: number): boolean {
    return this.vertices.has(place)
  }

  /**
   * Whether this exact vertex object is inserted here.
   */
  contains(vertex: Vertex): boolean {
    return vertex.isInserted && this.vertices.get(vertex.place) === vertex
  }

  /**
   * Lazy, restartable pass over the vertices in place order.
   */
  values(): Iterable<V> {
    return restartable(() => this.vertices.values())
  }
}
