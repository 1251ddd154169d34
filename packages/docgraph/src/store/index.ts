/**
 * Store Module
 */

import type { Vertex } from "../vertex"
import { EdgeStore } from "./edge-store"
import { VertexStore } from "./vertex-store"

export { VertexStore, FIRST_PLACE } from "./vertex-store"
export type { VertexStoreOptions } from "./vertex-store"
export { EdgeStore } from "./edge-store"

/**
 * The vertex and edge stores of one database, wired together.
 */
export interface GraphState<V extends Vertex = Vertex> {
  vertices: VertexStore<V>
  edges: EdgeStore<V>
}

/**
 * Create an empty pair of stores. Removing a vertex cascades into the edge store.
 */
export function createGraphState<V extends Vertex>(
  onCascade?: (vertex: V, removedEdges: number) => void,
): GraphState<V> {
  let edges: EdgeStore<V> | undefined
  const vertices = new VertexStore<V>({
    onRemove: (vertex) => {
      const removed = edges?.removeVertexEdges(vertex.place) ?? 0
      onCascade?.(vertex, removed)
    },
  })
  edges = new EdgeStore(vertices)
  return { vertices, edges }
}
