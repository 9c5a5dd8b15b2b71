import { RelationError } from "./errors"
import { groupSignature } from "./grouping"
import { Relation } from "./relation"
import type { Row } from "./types"

const STAFF: Row<string | number>[] = [
  { id: 1, dept: "A", level: 1 },
  { id: 2, dept: "A", level: 2 },
  { id: 3, dept: "B", level: 1 },
  { id: 4, dept: "A", level: 1 },
]

describe("Grouping keeps the first row of each group", () => {
  const staff = new Relation(STAFF)

  it("should group by a single key in first seen order", () => {
    const groups = staff.groupBy("dept")

    expect(groups.size).toBe(2)
    expect(groups.get(0)).toBe(STAFF[0])
    expect(groups.get(1)).toBe(STAFF[2])
  })

  it("should group by several keys", () => {
    expect([...staff.groupBy(["dept", "level"])].map((r) => r.id)).toEqual([
      1, 2, 3,
    ])
  })

  it("should group objects without a prototype", () => {
    const bare: object = Object.setPrototypeOf({}, null)
    const groups = new Relation([
      { id: 1, v: bare },
      { id: 2, v: {} },
    ]).groupBy("v")

    expect(groupSignature({ v: bare }, ["v"], 0)).toBe("[object Object]")
    expect(groups.size).toBe(1)
    expect(groups.first()?.id).toBe(1)
  })

  it("should never repeat a signature", () => {
    const groups = staff.groupBy(["level"])
    const signatures = [...groups].map((row, offset) =>
      groupSignature(row, ["level"], offset),
    )

    expect(new Set(signatures).size).toBe(signatures.length)
    expect(signatures).toEqual(["1", "2"])
  })

  it("should build signatures in key order", () => {
    expect(groupSignature(STAFF[0], ["level", "dept"], 0)).toBe("1,A")
    expect(groupSignature(STAFF[0], ["dept", "level"], 0)).toBe("A,1")
  })

  it("should compare values by their string form", () => {
    const mixed = new Relation<string | number>([{ v: 1 }, { v: "1" }])
    expect(mixed.groupBy("v").toArray()).toEqual([{ v: 1 }])

    const joined = new Relation<string | number>([
      { a: "1,2", b: 3 },
      { a: 1, b: "2,3" },
    ])
    expect(joined.groupBy(["a", "b"]).size).toBe(1)
  })

  it("should fail when a row is missing a key", () => {
    const partial = new Relation<string>([{ dept: "A" }, { name: "x" }])
    expect(() => partial.groupBy("dept")).toThrow(RelationError)
    expect(() => partial.groupBy("dept")).toThrow('Row 1 has no field "dept"')
  })

  it("should return nothing for no rows", () => {
    expect(new Relation().groupBy("dept").size).toBe(0)
  })
})
