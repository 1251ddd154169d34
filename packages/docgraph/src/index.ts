/**
 * docgraph
 *
 * Embedded document-and-graph store: record-like vertices linked by labeled,
 * optionally directed edges, kept in memory and saved wholesale to one JSON file.
 *
 * @example
 * ```typescript
 * import { createDatabase, Vertex } from 'docgraph';
 *
 * const db = createDatabase({ path: './data/music.json' });
 *
 * const album = new Vertex({ title: 'Farewell' });
 * const track = new Vertex({ name: 'Resurrections', minutes: 9 });
 * db.insert(album); // 1
 * db.insert(track); // 2
 * db.makeEdge(album, track, 'contains');
 *
 * // Linear predicate scans; a missing key simply does not match
 * const long = [...db.search((v) => v.get('minutes') === 9)];
 *
 * // Edges seen from one vertex
 * for (const edge of db.searchEdge(track, { direction: 'in' })) {
 *   edge.other; // album
 * }
 *
 * db.save();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { Database, createDatabase } from "./database"
export type { DatabaseStats } from "./database"
export { resolveConfig } from "./config"
export type { DatabaseConfig, BaseDatabaseConfig, ResolvedDatabaseConfig } from "./config"

// =============================================================================
// MODEL
// =============================================================================

export { Vertex, DETACHED_PLACE, defaultVertexFactory } from "./vertex"
export type { VertexFactory } from "./vertex"
export { Edge } from "./edge"
export type { EdgeFactory, Direction, DirectionFilter, EdgeRecord, EdgeView, EdgeQuery } from "./edge"
export { valueSchema, valueMapSchema, toValue, toValueMap, isValue } from "./value"
export type { Value, ValueMap } from "./value"

// =============================================================================
// STORES & PERSISTENCE (for advanced use cases)
// =============================================================================

export { VertexStore, EdgeStore, createGraphState, FIRST_PLACE } from "./store"
export type { GraphState, VertexStoreOptions } from "./store"
export { PersistenceCodec, STORE_FORMAT_VERSION, storeDocumentSchema } from "./codec"
export type { CodecOptions, StoreDocument, VertexRecord } from "./codec"
export { FileStorage, MemoryStorage } from "./storage"
export type { StorageAdapter } from "./storage"

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export * from "./errors"
export { Logger, createLogger } from "./utils"
export type { LogLevel, LoggerOptions } from "./utils"
