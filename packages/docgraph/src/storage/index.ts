export { FileStorage } from "./file-storage"
export { MemoryStorage } from "./memory-storage"
export type { StorageAdapter } from "./types"
