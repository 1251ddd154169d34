export { Edge } from "./edge"
export type { EdgeFactory } from "./edge"
export type { Direction, DirectionFilter, EdgeRecord, EdgeView, EdgeQuery } from "./types"
