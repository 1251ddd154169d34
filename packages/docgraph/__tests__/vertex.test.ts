import { describe, it, expect } from "vitest"
import * as docgraph from "../src"
import { InvalidValueError, MissingElementError, Vertex } from "../src"

describe("Vertex", () => {
  describe("construction", () => {
    it("should start detached", () => {
      const vertex = new Vertex()

      expect(vertex.place).toBe(0)
      expect(vertex.isInserted).toBe(false)
      expect(vertex.elementCount).toBe(0)
    })

    it("should use the initial elements", () => {
      const vertex = new Vertex({ name: "Reflection", chapter: 6 })

      expect(vertex.get("name")).toBe("Reflection")
      expect(vertex.get("chapter")).toBe(6)
    })

    it("should not keep a reference to the initial mapping", () => {
      const initial = { name: "Reflection", tags: ["a"] }
      const vertex = new Vertex(initial)

      initial.name = "changed"
      initial.tags.push("b")

      expect(vertex.get("name")).toBe("Reflection")
      expect(vertex.get("tags")).toEqual(["a"])
    })

    it("should reject out-of-domain initial values", () => {
      expect(() => new Vertex({ score: Number.NaN })).toThrow(InvalidValueError)
    })
  })

  describe("elements", () => {
    it("should behave like a mapping", () => {
      const vertex = new Vertex()
      vertex.set("name", "v")
      expect(vertex.get("name")).toBe("v")

      vertex.set("version", 2)
      vertex.set("version", 3)
      expect(vertex.get("name")).toBe("v")
      expect(vertex.get("version")).toBe(3)

      expect(vertex.delete("name")).toBe(true)
      expect(vertex.delete("name")).toBe(false)
      expect(vertex.has("name")).toBe(false)
      expect(vertex.get("version")).toBe(3)
    })

    it("should throw MissingElementError for an absent key", () => {
      const vertex = new Vertex({ a: 1 })

      expect(() => vertex.get("b")).toThrow(MissingElementError)
      expect(() => vertex.get("b")).toThrow("Missing element: 'b'")
    })

    it("should hold null as a real value", () => {
      const vertex = new Vertex({ empty: null })

      expect(vertex.has("empty")).toBe(true)
      expect(vertex.get("empty")).toBeNull()
    })

    it("should chain set calls", () => {
      const vertex = new Vertex().set("a", 1).set("b", 2)

      expect([...vertex.keys()]).toEqual(["a", "b"])
      expect([...vertex.entries()]).toEqual([
        ["a", 1],
        ["b", 2],
      ])
    })

    it("should store a copy of compound values", () => {
      const list = [1]
      const vertex = new Vertex().set("list", list)

      list.push(2)

      expect(vertex.get("list")).toEqual([1])
    })

    it("should hand out copies of compound values", () => {
      const vertex = new Vertex({ list: [1], map: { n: 1 } })

      const list = vertex.get("list")
      if (Array.isArray(list)) list.push(2)
      for (const [key, value] of vertex.entries()) {
        if (key === "map" && value !== null && typeof value === "object" && !Array.isArray(value)) {
          value.n = 2
        }
      }

      expect(vertex.get("list")).toEqual([1])
      expect(vertex.get("map")).toEqual({ n: 1 })
    })

    it("should refuse reserved keys", () => {
      const vertex = new Vertex()

      expect(() => vertex.set("__proto__", 1)).toThrow(
        "Invalid value for element '__proto__': Key \"__proto__\" is not allowed",
      )
      expect(vertex.elementCount).toBe(0)
    })

    it("should reject out-of-domain values on write", () => {
      const vertex = new Vertex()

      expect(() => vertex.set("x", Number.POSITIVE_INFINITY)).toThrow(InvalidValueError)
      expect(vertex.has("x")).toBe(false)
    })
  })

  describe("hooks", () => {
    it("should pack a copy of its elements", () => {
      const vertex = new Vertex({ name: "a", nested: { n: 1 } })
      const packed = vertex.pack()

      packed.name = "b"

      expect(packed).toEqual({ name: "b", nested: { n: 1 } })
      expect(vertex.get("name")).toBe("a")
    })

    it("should rebuild a detached vertex from packed data", () => {
      const vertex = Vertex.fromPack({ name: "a" })

      expect(vertex).toBeInstanceOf(Vertex)
      expect(vertex.isInserted).toBe(false)
      expect(vertex.get("name")).toBe("a")
    })

    it("should not expose place setters", () => {
      const vertex = new Vertex()

      expect("attach" in vertex).toBe(false)
      expect("detach" in vertex).toBe(false)
      expect("attachPlace" in docgraph).toBe(false)
      expect("detachPlace" in docgraph).toBe(false)
    })

    it("should be ready for insertion by default", () => {
      expect(new Vertex().isReadyForInsertion()).toBe(true)
    })
  })

  it("should describe itself", () => {
    expect(new Vertex({ name: "a" }).toString()).toBe('<Vertex 0 {"name":"a"}>')
  })
})
