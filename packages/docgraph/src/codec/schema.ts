/**
 * Persisted Document Schema
 *
 * Shape of the backing file, validated with zod on every load.
 */

import { z } from "zod"
import type { EdgeRecord } from "../edge"
import { valueMapSchema, type ValueMap } from "../value"

export const STORE_FORMAT_VERSION = 1

export interface VertexRecord {
  place: number
  data: ValueMap
}

export interface StoreDocument {
  version: typeof STORE_FORMAT_VERSION
  /** Next place to allocate, greater than every place in the document */
  nextPlace: number
  /** Inserted vertices, strictly ascending by place */
  vertices: VertexRecord[]
  /** Edges in insertion order */
  edges: EdgeRecord[]
}

const placeSchema = z.number().int().min(1)

export const vertexRecordSchema: z.ZodType<VertexRecord, z.ZodTypeDef, unknown> = z
  .object({
    place: placeSchema,
    data: valueMapSchema,
  })
  .strict()

export const edgeRecordSchema: z.ZodType<EdgeRecord, z.ZodTypeDef, unknown> = z
  .object({
    start: placeSchema,
    end: placeSchema,
    label: z.string(),
    hasDirection: z.boolean(),
    data: valueMapSchema.optional(),
  })
  .strict()

export const storeDocumentSchema: z.ZodType<StoreDocument, z.ZodTypeDef, unknown> = z
  .object({
    version: z.literal(STORE_FORMAT_VERSION),
    nextPlace: placeSchema,
    vertices: z.array(vertexRecordSchema),
    edges: z.array(edgeRecordSchema),
  })
  .strict()
  .superRefine((doc, ctx) => {
    let previous = 0
    doc.vertices.forEach((record, index) => {
      if (record.place <= previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["vertices", index, "place"],
          message: `Places must be strictly ascending (${record.place} after ${previous})`,
        })
      }
      previous = Math.max(previous, record.place)
    })

    if (doc.nextPlace <= previous) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["nextPlace"],
        message: `nextPlace must be greater than every place (got ${doc.nextPlace}, highest place ${previous})`,
      })
    }
  })
