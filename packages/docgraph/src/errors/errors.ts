/**
 * Custom Error Classes
 */

/**
 * Base error for all docgraph errors.
 */
export class DocGraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "DocGraphError"
    this.cause = cause

    // V8-specific; typed by @types/node
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Duplicate insertion error.
 * Thrown when a vertex or an edge is inserted while already owned by a database.
 */
export class DuplicateInsertionError extends DocGraphError {
  constructor(
    public readonly target: "vertex" | "edge",
    public readonly place?: number,
  ) {
    super(
      target === "vertex"
        ? `Vertex is already inserted at place ${place ?? "?"}`
        : "Edge is already inserted",
    )
    this.name = "DuplicateInsertionError"
  }
}

/**
 * Not inserted error.
 * Thrown when removing, looking up or searching from something this database does not own.
 */
export class NotInsertedError extends DocGraphError {
  constructor(
    public readonly target: "vertex" | "edge",
    public readonly place?: number,
  ) {
    const details = place !== undefined ? ` (place ${place})` : ""
    super(`${target === "vertex" ? "Vertex" : "Edge"} is not inserted in this database${details}`)
    this.name = "NotInsertedError"
  }
}

/**
 * Dangling reference error.
 * Thrown when an edge points at a vertex that is not inserted in the same database.
 */
export class DanglingReferenceError extends DocGraphError {
  constructor(
    message: string,
    public readonly place?: number,
  ) {
    super(message)
    this.name = "DanglingReferenceError"
  }
}

/**
 * Invalid anchor error.
 * Thrown when an edge is given an anchor that is neither of its endpoints.
 */
export class InvalidAnchorError extends DocGraphError {
  constructor() {
    super("The given anchor does not belong to the edge")
    this.name = "InvalidAnchorError"
  }
}

/**
 * Invalid direction error.
 */
export class InvalidDirectionError extends DocGraphError {
  constructor(public readonly direction: string) {
    super(`Direction must be "out", "in" or "none", got "${direction}"`)
    this.name = "InvalidDirectionError"
  }
}

/**
 * Malformed store error.
 * Thrown when persisted data is structurally invalid.
 */
export class MalformedStoreError extends DocGraphError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, cause)
    this.name = "MalformedStoreError"
  }
}

/**
 * Missing element error.
 * Thrown when reading a key a vertex does not hold.
 */
export class MissingElementError extends DocGraphError {
  constructor(public readonly key: string) {
    super(`Missing element: '${key}'`)
    this.name = "MissingElementError"
  }
}

/**
 * Invalid value error.
 * Thrown when a vertex is given a value outside the JSON value domain.
 */
export class InvalidValueError extends DocGraphError {
  constructor(
    public readonly key: string | undefined,
    public readonly issues: string[],
  ) {
    const target = key !== undefined ? ` for element '${key}'` : ""
    super(`Invalid value${target}: ${issues.join("; ")}`)
    this.name = "InvalidValueError"
  }
}

/**
 * Storage error.
 * Thrown when the backing storage cannot be read or written.
 */
export class StorageError extends DocGraphError {
  constructor(
    message: string,
    public readonly location: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "StorageError"
  }
}
