/**
 * Edge Store
 *
 * Edge registry plus a per-vertex adjacency index keyed by place.
 * Provides edge insertion/removal, the cascade run when a vertex is removed,
 * and filtered adjacency searches.
 */

import type { Edge, EdgeQuery, EdgeView } from "../edge"
import { DanglingReferenceError, DuplicateInsertionError, NotInsertedError } from "../errors"
import { restartable } from "../utils"
import type { Vertex } from "../vertex"
import type { VertexStore } from "./vertex-store"

export class EdgeStore<V extends Vertex = Vertex> {
  /** All edges, in insertion order */
  private edges = new Set<Edge<V>>()

  /** Edges touching each vertex: place -> Set<edge> */
  private adjacency = new Map<number, Set<Edge<V>>>()

  constructor(private readonly vertices: VertexStore<V>) {}

  get size(): number {
    return this.edges.size
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  /**
   * @throws DuplicateInsertionError if the edge is already registered
   * @throws DanglingReferenceError unless both endpoints are inserted here
   */
  insertEdge(edge: Edge<V>): void {
    if (this.edges.has(edge)) {
      throw new DuplicateInsertionError("edge")
    }
    this.register(edge)
    edge.onInsert()
  }

  /**
   * Register without running the insertion hook. Load path.
   */
  register(edge: Edge<V>): void {
    for (const endpoint of [edge.start, edge.end]) {
      if (!this.vertices.contains(endpoint)) {
        throw new DanglingReferenceError(
          "Both vertices must be inserted in this database to make an edge",
          endpoint.isInserted ? endpoint.place : undefined,
        )
      }
    }

    this.edges.add(edge)
    this.link(edge.start.place, edge)
    this.link(edge.end.place, edge)
  }

  /**
   * @throws NotInsertedError if the edge is not registered
   */
  removeEdge(edge: Edge<V>): void {
    if (!this.edges.has(edge)) {
      throw new NotInsertedError("edge")
    }

    this.edges.delete(edge)
    this.adjacency.get(edge.start.place)?.delete(edge)
    this.adjacency.get(edge.end.place)?.delete(edge)
  }

  /**
   * Remove every edge touching the vertex at `place`. Returns how many went.
   */
  removeVertexEdges(place: number): number {
    const touching = this.adjacency.get(place)
    if (!touching) return 0

    for (const edge of touching) {
      this.edges.delete(edge)
      const neighbor = edge.start.place === place ? edge.end.place : edge.start.place
      if (neighbor !== place) {
        this.adjacency.get(neighbor)?.delete(edge)
      }
    }

    this.adjacency.delete(place)
    return touching.size
  }

  private link(place: number, edge: Edge<V>): void {
    let touching = this.adjacency.get(place)
    if (!touching) {
      touching = new Set()
      this.adjacency.set(place, touching)
    }
    touching.add(edge)
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  has(edge: Edge<V>): boolean {
    return this.edges.has(edge)
  }

  /**
   * Lazy, restartable pass over all edges in insertion order.
   */
  values(): Iterable<Edge<V>> {
    return restartable(() => this.edges.values())
  }

  /**
   * Lazy, restartable search over the edges touching `vertex`.
   *
   * Every candidate is re-anchored on `vertex` before filtering, so `other`
   * and `direction` read from its side. That anchor is shared: a later search
   * through the same edge moves it again.
   *
   * @throws NotInsertedError if `vertex` is not inserted here
   */
  searchEdge(vertex: V, query: EdgeQuery<V> = {}): Iterable<Edge<V>> {
    const touching = this.adjacentTo(vertex)
    const { other, label, direction = "all" } = query

    return restartable(function* () {
      for (const edge of touching) {
        edge.changeAnchor(vertex)
        if (other !== undefined && edge.other !== other) continue
        if (label !== undefined && edge.label !== label) continue
        if (direction !== "all" && edge.direction !== direction) continue
        yield edge
      }
    })
  }

  /**
   * Same filters as `searchEdge`, but yields frozen views and leaves the
   * edges' own anchors alone.
   */
  searchEdgeViews(vertex: V, query: EdgeQuery<V> = {}): Iterable<EdgeView<V>> {
    const touching = this.adjacentTo(vertex)
    const { other, label, direction = "all" } = query

    return restartable(function* () {
      for (const edge of touching) {
        const anchored = anchoredView(edge, vertex)
        if (other !== undefined && anchored.other !== other) continue
        if (label !== undefined && anchored.label !== label) continue
        if (direction !== "all" && anchored.direction !== direction) continue
        yield anchored
      }
    })
  }

  private adjacentTo(vertex: V): Iterable<Edge<V>> {
    if (!this.vertices.contains(vertex)) {
      throw new NotInsertedError("vertex", vertex.isInserted ? vertex.place : undefined)
    }
    const place = vertex.place
    const adjacency = this.adjacency
    return restartable(() => (adjacency.get(place) ?? new Set<Edge<V>>()).values())
  }
}

function anchoredView<V extends Vertex>(edge: Edge<V>, anchor: V): EdgeView<V> {
  const isStart = edge.start === anchor
  const view: EdgeView<V> = {
    start: edge.start,
    end: edge.end,
    label: edge.label,
    hasDirection: edge.hasDirection,
    anchor,
    other: isStart ? edge.end : edge.start,
    direction: !edge.hasDirection ? "none" : isStart ? "out" : "in",
  }
  return Object.freeze(view)
}
