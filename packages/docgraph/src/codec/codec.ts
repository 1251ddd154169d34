/**
 * Persistence Codec
 *
 * Bidirectional mapping between the in-memory stores and the persisted
 * document, and between the document and its UTF-8 JSON text.
 *
 * Objects never survive the trip: loading always builds new vertices and
 * edges, with the same places, data and edge triples.
 */

import { Edge, type EdgeFactory, type EdgeRecord } from "../edge"
import { DanglingReferenceError, MalformedStoreError } from "../errors"
import { createGraphState, type GraphState } from "../store"
import { formatIssues, toValueMap } from "../value"
import type { Vertex, VertexFactory } from "../vertex"
import { STORE_FORMAT_VERSION, storeDocumentSchema, type StoreDocument } from "./schema"

export interface CodecOptions<V extends Vertex> {
  /** Rebuilds each vertex from its place and packed data */
  reconstruct: VertexFactory<V>
  /** Rebuilds each edge once its endpoints are resolved */
  reconstructEdge?: EdgeFactory<V>
}

export class PersistenceCodec<V extends Vertex = Vertex> {
  private readonly reconstruct: VertexFactory<V>
  private readonly reconstructEdge: EdgeFactory<V>

  constructor(options: CodecOptions<V>) {
    this.reconstruct = options.reconstruct
    this.reconstructEdge = options.reconstructEdge ?? Edge.fromPack
  }

  // ===========================================================================
  // STORE <-> DOCUMENT
  // ===========================================================================

  serialize(state: GraphState<V>): StoreDocument {
    return {
      version: STORE_FORMAT_VERSION,
      nextPlace: state.vertices.nextPlace,
      vertices: Array.from(state.vertices.values(), (vertex) => ({
        place: vertex.place,
        data: toValueMap(vertex.pack()),
      })),
      edges: Array.from(state.edges.values(), (edge) => normalizeEdgeRecord(edge.pack())),
    }
  }

  /**
   * Build stores from a validated document. Pass `state` to fill stores that
   * were wired by the caller; it must be empty.
   *
   * @throws MalformedStoreError when an edge references a missing place
   */
  deserialize(doc: StoreDocument, state: GraphState<V> = createGraphState<V>()): GraphState<V> {
    for (const record of doc.vertices) {
      state.vertices.restore(record.place, this.reconstruct(record.place, record.data))
    }
    state.vertices.reserve(doc.nextPlace)

    doc.edges.forEach((record, index) => {
      const start = this.resolve(state, record.start, index)
      const end = this.resolve(state, record.end, index)
      state.edges.register(this.reconstructEdge(record, start, end))
    })

    return state
  }

  private resolve(state: GraphState<V>, place: number, index: number): V {
    const vertex = state.vertices.find(place)
    if (!vertex) {
      const message = `Edge ${index} references place ${place}, which holds no vertex`
      throw new MalformedStoreError(message, [], new DanglingReferenceError(message, place))
    }
    return vertex
  }

  // ===========================================================================
  // DOCUMENT <-> TEXT
  // ===========================================================================

  /**
   * Validate an already-parsed structure.
   *
   * @throws MalformedStoreError
   */
  parse(input: unknown): StoreDocument {
    const result = storeDocumentSchema.safeParse(input)
    if (!result.success) {
      throw new MalformedStoreError("Invalid store document", formatIssues(result.error))
    }
    return result.data
  }

  encode(doc: StoreDocument): string {
    return `${JSON.stringify(doc, null, 2)}\n`
  }

  /**
   * @throws MalformedStoreError on invalid JSON or an invalid document
   */
  decode(text: string): StoreDocument {
    let input: unknown
    try {
      input = JSON.parse(text)
    } catch (error) {
      throw new MalformedStoreError(
        "Store file is not valid JSON",
        [],
        error instanceof Error ? error : undefined,
      )
    }
    return this.parse(input)
  }
}

/**
 * Fix the key order of an edge record so saves are byte-stable.
 */
function normalizeEdgeRecord(record: EdgeRecord): EdgeRecord {
  const normalized: EdgeRecord = {
    start: record.start,
    end: record.end,
    label: record.label,
    hasDirection: record.hasDirection,
  }
  if (record.data !== undefined) {
    normalized.data = toValueMap(record.data)
  }
  return normalized
}
