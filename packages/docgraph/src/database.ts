/**
 * Database
 *
 * Facade over one vertex store and one edge store, loaded from and saved to
 * a single backing file. This is the only component client code needs.
 */

import { resolveConfig, type BaseDatabaseConfig, type DatabaseConfig } from "./config"
import { PersistenceCodec } from "./codec"
import { Edge, type EdgeQuery, type EdgeView } from "./edge"
import { MissingElementError } from "./errors"
import { createGraphState, type GraphState } from "./store"
import type { StorageAdapter } from "./storage"
import { restartable, type Logger } from "./utils"
import { defaultVertexFactory, detachPlace, type Vertex } from "./vertex"

export interface DatabaseStats {
  vertices: number
  edges: number
  nextPlace: number
}

function matches<V extends Vertex>(predicate: (vertex: V) => boolean, vertex: V): boolean {
  try {
    return predicate(vertex)
  } catch (error) {
    // A predicate reading a key the vertex lacks simply does not match.
    if (error instanceof MissingElementError) return false
    throw error
  }
}

export class Database<V extends Vertex = Vertex> implements Iterable<V> {
  readonly path: string

  private readonly codec: PersistenceCodec<V>
  private readonly storage: StorageAdapter
  private readonly logger: Logger
  private state: GraphState<V>

  /**
   * Open a database; an existing backing file is loaded immediately.
   *
   * @throws MalformedStoreError when the backing file is invalid
   */
  constructor(config: DatabaseConfig<V>) {
    const resolved = resolveConfig(config)
    this.path = resolved.path
    this.storage = resolved.storage
    this.logger = resolved.logger
    this.codec = new PersistenceCodec({
      reconstruct: resolved.reconstruct,
      reconstructEdge: resolved.reconstructEdge,
    })
    this.state = this.load()
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  private load(): GraphState<V> {
    const state = createGraphState<V>((vertex, removedEdges) => {
      this.logger.debug("Removed vertex", { place: vertex.place, removedEdges })
    })

    const text = this.storage.read()
    if (text === undefined) {
      this.logger.debug("No store file yet, starting empty", { location: this.storage.location })
      return state
    }

    this.codec.deserialize(this.codec.decode(text), state)
    this.logger.debug("Loaded store", {
      location: this.storage.location,
      vertices: state.vertices.size,
      edges: state.edges.size,
    })
    return state
  }

  /**
   * Rewrite the whole backing file with the current contents.
   */
  save(): void {
    const text = this.codec.encode(this.codec.serialize(this.state))
    this.storage.write(text)
    this.logger.debug("Saved store", {
      location: this.storage.location,
      vertices: this.state.vertices.size,
      edges: this.state.edges.size,
    })
  }

  /**
   * Discard the in-memory contents and read the backing file again.
   * Vertices held from before the reload are detached.
   */
  reload(): void {
    const previous = this.state
    this.state = this.load()
    for (const vertex of previous.vertices.values()) {
      vertex[detachPlace]()
    }
  }

  // ===========================================================================
  // VERTICES
  // ===========================================================================

  /**
   * Insert a vertex. Returns its place, or `false` if the vertex's readiness
   * gate rejected it.
   *
   * @throws DuplicateInsertionError if the vertex is already inserted
   */
  insert(vertex: V): number | false {
    return this.state.vertices.insert(vertex)
  }

  /**
   * Remove a vertex and every edge touching it. Returns its former place.
   *
   * @throws NotInsertedError if this database does not own the vertex
   */
  remove(vertex: V): number {
    return this.state.vertices.remove(vertex)
  }

  /**
   * @throws NotInsertedError if no vertex holds this place
   */
  get(place: number): V {
    return this.state.vertices.get(place)
  }

  find(place: number): V | undefined {
    return this.state.vertices.find(place)
  }

  has(place: number): boolean {
    return this.state.vertices.has(place)
  }

  contains(vertex: Vertex): boolean {
    return this.state.vertices.contains(vertex)
  }

  /** Number of inserted vertices */
  get size(): number {
    return this.state.vertices.size
  }

  vertices(): Iterable<V> {
    return this.state.vertices.values()
  }

  [Symbol.iterator](): Iterator<V> {
    return this.state.vertices.values()[Symbol.iterator]()
  }

  /**
   * Lazy scan of the vertices matching `predicate`, in place order.
   *
   * @example
   * ```typescript
   * const rock = [...db.search((v) => v.get("genre") === "rock")]
   * ```
   */
  search(predicate: (vertex: V) => boolean): Iterable<V> {
    const vertices = this.state.vertices
    return restartable(function* () {
      for (const vertex of vertices.values()) {
        if (matches(predicate, vertex)) yield vertex
      }
    })
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  /**
   * @throws DuplicateInsertionError if the edge is already inserted
   * @throws DanglingReferenceError unless both endpoints are inserted here
   */
  insertEdge(edge: Edge<V>): void {
    this.state.edges.insertEdge(edge)
  }

  /**
   * Build and insert an edge in one go.
   */
  makeEdge(start: V, end: V, label = "", hasDirection = true): Edge<V> {
    const edge = new Edge(start, end, label, hasDirection)
    this.insertEdge(edge)
    return edge
  }

  /**
   * @throws NotInsertedError if the edge is not inserted
   */
  removeEdge(edge: Edge<V>): void {
    this.state.edges.removeEdge(edge)
  }

  hasEdge(edge: Edge<V>): boolean {
    return this.state.edges.has(edge)
  }

  edges(): Iterable<Edge<V>> {
    return this.state.edges.values()
  }

  /**
   * Edges touching `vertex`, each re-anchored on `vertex`.
   * See `EdgeStore.searchEdge` for the shared-anchor caveat.
   */
  searchEdge(vertex: V, query?: EdgeQuery<V>): Iterable<Edge<V>> {
    return this.state.edges.searchEdge(vertex, query)
  }

  searchEdgeViews(vertex: V, query?: EdgeQuery<V>): Iterable<EdgeView<V>> {
    return this.state.edges.searchEdgeViews(vertex, query)
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  stats(): DatabaseStats {
    return {
      vertices: this.state.vertices.size,
      edges: this.state.edges.size,
      nextPlace: this.state.vertices.nextPlace,
    }
  }

  toString(): string {
    return `<Database ${this.storage.location}>`
  }
}

/**
 * Open a database of base vertices.
 *
 * @example
 * ```typescript
 * const db = createDatabase({ path: "./data/music.json" })
 * db.insert(new Vertex({ name: "Prologue" }))
 * db.save()
 * ```
 */
export function createDatabase(config: BaseDatabaseConfig): Database<Vertex> {
  return new Database<Vertex>({
    ...config,
    reconstruct: config.reconstruct ?? defaultVertexFactory,
  })
}
