export { PersistenceCodec } from "./codec"
export type { CodecOptions } from "./codec"
export {
  STORE_FORMAT_VERSION,
  storeDocumentSchema,
  vertexRecordSchema,
  edgeRecordSchema,
} from "./schema"
export type { StoreDocument, VertexRecord } from "./schema"
