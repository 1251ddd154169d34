/**
 * Database Configuration
 */

import type { EdgeFactory } from "./edge"
import { FileStorage, type StorageAdapter } from "./storage"
import { createLogger, type Logger } from "./utils"
import type { Vertex, VertexFactory } from "./vertex"

/**
 * Configuration for a database.
 */
export interface DatabaseConfig<V extends Vertex = Vertex> {
  /** Location of the backing file */
  path: string
  /** Rebuilds vertices on load; decides the vertex class of the database */
  reconstruct: VertexFactory<V>
  /** Rebuilds edges on load (defaults to `Edge.fromPack`) */
  reconstructEdge?: EdgeFactory<V>
  /** Backing storage (defaults to a `FileStorage` on `path`) */
  storage?: StorageAdapter
  /** Logger (defaults to a "docgraph" logger) */
  logger?: Logger
}

/**
 * Configuration for a database of base vertices; `reconstruct` may be omitted.
 */
export type BaseDatabaseConfig = Omit<DatabaseConfig<Vertex>, "reconstruct"> & {
  reconstruct?: VertexFactory<Vertex>
}

export interface ResolvedDatabaseConfig<V extends Vertex> {
  path: string
  reconstruct: VertexFactory<V>
  reconstructEdge?: EdgeFactory<V>
  storage: StorageAdapter
  logger: Logger
}

export function resolveConfig<V extends Vertex>(config: DatabaseConfig<V>): ResolvedDatabaseConfig<V> {
  return {
    path: config.path,
    reconstruct: config.reconstruct,
    reconstructEdge: config.reconstructEdge,
    storage: config.storage ?? new FileStorage(config.path),
    logger: config.logger ?? createLogger("docgraph"),
  }
}
