export { Vertex, DETACHED_PLACE, attachPlace, detachPlace, defaultVertexFactory } from "./vertex"
export type { VertexFactory } from "./vertex"
