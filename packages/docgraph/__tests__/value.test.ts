import { describe, it, expect } from "vitest"
import { InvalidValueError, isValue, toValue, toValueMap } from "../src"

describe("value model", () => {
  describe("toValue", () => {
    it("should accept every JSON-shaped value", () => {
      const input = { a: [1, "x", null, { b: true }], c: -2.5 }

      expect(toValue(input)).toEqual(input)
      expect(toValue(null)).toBeNull()
      expect(toValue("")).toBe("")
    })

    it("should return a detached copy", () => {
      const input = { list: [1, 2] }
      const copy = toValue(input)

      input.list.push(3)

      expect(copy).toEqual({ list: [1, 2] })
    })

    it("should reject values outside the domain", () => {
      expect(() => toValue(undefined)).toThrow(InvalidValueError)
      expect(() => toValue(Number.NaN)).toThrow(InvalidValueError)
      expect(() => toValue(Number.POSITIVE_INFINITY)).toThrow(InvalidValueError)
      expect(() => toValue(new Date())).toThrow(InvalidValueError)
      expect(() => toValue(new Map())).toThrow(InvalidValueError)
      expect(() => toValue(() => 1)).toThrow(InvalidValueError)
      expect(() => toValue([1, undefined])).toThrow(InvalidValueError)
    })

    it("should report the element key and the issue path", () => {
      try {
        toValue(undefined, "name")
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidValueError)
        if (error instanceof InvalidValueError) {
          expect(error.key).toBe("name")
          expect(error.issues).toEqual(["(root): Invalid input"])
        }
      }
    })
  })

  describe("toValueMap", () => {
    it("should reject a mapping holding an undefined member", () => {
      try {
        toValueMap({ a: undefined })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidValueError)
        if (error instanceof InvalidValueError) {
          expect(error.key).toBeUndefined()
          expect(error.issues).toEqual(["a: Invalid input"])
        }
      }
    })

    it("should reject non-mappings", () => {
      expect(() => toValueMap([1])).toThrow(InvalidValueError)
      expect(() => toValueMap("text")).toThrow(InvalidValueError)
    })
  })

  describe("reserved keys", () => {
    it("should reject an own __proto__ key instead of dropping it", () => {
      const parsed: unknown = JSON.parse('{"__proto__":{"x":1},"a":2}')

      expect(() => toValueMap(parsed)).toThrow('Invalid value: (root): Key "__proto__" is not allowed')
      expect(() => toValue({ nested: JSON.parse('{"__proto__":1}') })).toThrow(InvalidValueError)
    })

    it("should accept keys that only look special", () => {
      expect(toValueMap({ proto: 1, constructor: 2 })).toEqual({ proto: 1, constructor: 2 })
    })
  })

  describe("isValue", () => {
    it("should tell values apart", () => {
      expect(isValue({ nested: [true] })).toBe(true)
      expect(isValue(Symbol("x"))).toBe(false)
      expect(isValue(Number.NEGATIVE_INFINITY)).toBe(false)
    })
  })
})
