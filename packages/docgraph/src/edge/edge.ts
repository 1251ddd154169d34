/**
 * Edge
 *
 * A labeled link between two vertices. The anchor is the endpoint the edge is
 * currently "seen from"; `other` and `direction` are derived from it.
 *
 * The anchor is shared mutable state: `searchEdge` re-anchors every edge it
 * yields. Use `view()` (or `searchEdgeViews`) to keep a stable reading.
 */

import { InvalidAnchorError, InvalidDirectionError } from "../errors"
import type { ValueMap } from "../value"
import type { Vertex } from "../vertex"
import type { Direction, EdgeRecord, EdgeView } from "./types"

export class Edge<V extends Vertex = Vertex> {
  private _anchor: V

  /** Persisted extra data, written back unchanged by `pack()` */
  data: ValueMap | undefined

  constructor(
    public readonly start: V,
    public readonly end: V,
    public readonly label: string = "",
    public readonly hasDirection: boolean = true,
  ) {
    this._anchor = start
  }

  // ===========================================================================
  // FACTORIES
  // ===========================================================================

  /**
   * Create an edge described from one of its endpoints.
   *
   * @example
   * ```typescript
   * // parent -> child, seen from the child
   * const edge = Edge.fromAnchor(child, parent, "parent", "in")
   * edge.start === parent // true
   * edge.anchor === child // true
   * ```
   */
  static fromAnchor<V extends Vertex>(
    anchor: V,
    other: V,
    label = "",
    direction: Direction = "out",
  ): Edge<V> {
    let edge: Edge<V>
    switch (direction) {
      case "out":
        edge = new Edge(anchor, other, label, true)
        break
      case "in":
        edge = new Edge(other, anchor, label, true)
        break
      case "none":
        edge = new Edge(anchor, other, label, false)
        break
      default:
        throw new InvalidDirectionError(direction)
    }
    edge.changeAnchor(anchor)
    return edge
  }

  /**
   * Default reconstruction used when a database loads.
   */
  static fromPack<V extends Vertex>(record: EdgeRecord, start: V, end: V): Edge<V> {
    const edge = new Edge(start, end, record.label, record.hasDirection)
    edge.data = record.data
    return edge
  }

  // ===========================================================================
  // ANCHOR
  // ===========================================================================

  get anchor(): V {
    return this._anchor
  }

  get other(): V {
    return this._anchor === this.start ? this.end : this.start
  }

  get direction(): Direction {
    if (!this.hasDirection) return "none"
    return this._anchor === this.start ? "out" : "in"
  }

  /**
   * @throws InvalidAnchorError when `anchor` is not one of the endpoints
   */
  changeAnchor(anchor: V): void {
    if (!this.hasVertex(anchor)) {
      throw new InvalidAnchorError()
    }
    this._anchor = anchor
  }

  hasVertex(vertex: Vertex): boolean {
    return this.start === vertex || this.end === vertex
  }

  /**
   * Same endpoints (by identity), label and directedness.
   */
  equals(other: Edge<Vertex>): boolean {
    return (
      this.start === other.start &&
      this.end === other.end &&
      this.label === other.label &&
      this.hasDirection === other.hasDirection
    )
  }

  view(): EdgeView<V> {
    const view: EdgeView<V> = {
      start: this.start,
      end: this.end,
      label: this.label,
      hasDirection: this.hasDirection,
      anchor: this._anchor,
      other: this.other,
      direction: this.direction,
    }
    return Object.freeze(view)
  }

  // ===========================================================================
  // HOOKS
  // ===========================================================================

  /**
   * Export the edge for persistence. Subclasses may add `data`.
   */
  pack(): EdgeRecord {
    const record: EdgeRecord = {
      start: this.start.place,
      end: this.end.place,
      label: this.label,
      hasDirection: this.hasDirection,
    }
    if (this.data !== undefined) {
      record.data = this.data
    }
    return record
  }

  /**
   * Called once the edge is registered in a database.
   */
  onInsert(): void {}

  toString(): string {
    const link = this.hasDirection ? "->" : "--"
    return `<Edge ${this.start.place} ${link} ${this.end.place} '${this.label}'>`
  }
}

/**
 * Rebuild an edge from its record and resolved endpoints.
 */
export type EdgeFactory<V extends Vertex = Vertex> = (record: EdgeRecord, start: V, end: V) => Edge<V>
