/**
 * Value Model
 *
 * The closed, JSON-shaped value domain shared by vertex elements and the
 * persisted document. Validation happens at write time so nothing outside
 * the domain ever reaches the store.
 */

import { z } from "zod"
import { InvalidValueError } from "../errors"

// =============================================================================
// TYPES
// =============================================================================

/**
 * Any value a vertex element may hold.
 */
export type Value = null | boolean | number | string | Value[] | ValueMap

/**
 * Ordered mapping of string keys to values.
 */
export interface ValueMap {
  [key: string]: Value
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * Keys a plain object cannot hold as its own data.
 */
export const RESERVED_KEYS: readonly string[] = ["__proto__"]

export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.includes(key)
}

// Own "__proto__" keys (as JSON.parse creates them) would be dropped by
// z.record, so they are rejected before it runs.
function recordSchema(): z.ZodType<ValueMap, z.ZodTypeDef, unknown> {
  return z
    .unknown()
    .superRefine((input, ctx) => {
      if (typeof input !== "object" || input === null) return
      for (const key of RESERVED_KEYS) {
        if (Object.prototype.hasOwnProperty.call(input, key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Key "${key}" is not allowed`,
          })
        }
      }
    })
    .pipe(z.record(valueSchema))
}

export const valueSchema: z.ZodType<Value, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(valueSchema),
    recordSchema(),
  ]),
)

export const valueMapSchema: z.ZodType<ValueMap, z.ZodTypeDef, unknown> = recordSchema()

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Flatten zod issues into "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)"
    return `${path}: ${issue.message}`
  })
}

/**
 * Validate an arbitrary input and return a detached copy of it.
 *
 * @throws InvalidValueError when the input is outside the value domain
 */
export function toValue(input: unknown, key?: string): Value {
  const result = valueSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidValueError(key, formatIssues(result.error))
  }
  return result.data
}

/**
 * Validate a mapping and return a detached copy of it.
 */
export function toValueMap(input: unknown): ValueMap {
  const result = valueMapSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidValueError(undefined, formatIssues(result.error))
  }
  return result.data
}

export function isValue(input: unknown): input is Value {
  return valueSchema.safeParse(input).success
}
