/**
 * Errors Module
 */

export {
  DocGraphError,
  DuplicateInsertionError,
  NotInsertedError,
  DanglingReferenceError,
  InvalidAnchorError,
  InvalidDirectionError,
  MalformedStoreError,
  MissingElementError,
  InvalidValueError,
  StorageError,
} from "./errors"
