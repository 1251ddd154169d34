/**
 * Edge Types
 */

import type { ValueMap } from "../value"
import type { Vertex } from "../vertex"

/**
 * Direction of an edge seen from its anchor.
 */
export type Direction = "out" | "in" | "none"

/**
 * Direction filter accepted by edge searches.
 */
export type DirectionFilter = Direction | "all"

/**
 * Persisted form of an edge. Endpoints are referenced by place.
 */
export interface EdgeRecord {
  start: number
  end: number
  label: string
  hasDirection: boolean
  /** Extra data a subclass chooses to persist */
  data?: ValueMap
}

/**
 * Immutable snapshot of an edge seen from one endpoint.
 */
export interface EdgeView<V extends Vertex = Vertex> {
  readonly start: V
  readonly end: V
  readonly label: string
  readonly hasDirection: boolean
  readonly anchor: V
  readonly other: V
  readonly direction: Direction
}

/**
 * Filters for `searchEdge`. Omitted fields match everything.
 */
export interface EdgeQuery<V extends Vertex = Vertex> {
  other?: V
  label?: string
  direction?: DirectionFilter
}
