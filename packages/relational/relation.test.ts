import { RelationError } from "./errors"
import { Relation } from "./relation"
import type { Row } from "./types"

const EMPLOYEES: Row<string | number>[] = [
  { id: 1, dept: "A", sal: 100 },
  { id: 2, dept: "B", sal: 200 },
  { id: 3, dept: "A", sal: 300 },
]

function ids<V>(relation: Relation<V>): unknown[] {
  return [...relation].map((row) => row.id)
}

describe("Relations should normalize their sources", () => {
  it("should copy arrays but keep the rows", () => {
    const source = [...EMPLOYEES]
    const relation = new Relation(source)

    source.push({ id: 4, dept: "C", sal: 400 })

    expect(relation.size).toBe(3)
    expect(relation.first()).toBe(EMPLOYEES[0])
  })

  it("should copy the rows of another relation", () => {
    const original = new Relation(EMPLOYEES)
    const copy = Relation.make(original)

    expect(copy.count()).toBe(3)
    expect(copy.first()).not.toBe(EMPLOYEES[0])
    expect(copy.toArray()).toEqual(EMPLOYEES)
  })

  it("should read any iterable", () => {
    function* generate(): Generator<Row<number>> {
      yield { id: 1 }
      yield { id: 2 }
    }

    expect(ids(new Relation(generate()))).toEqual([1, 2])
    expect(ids(new Relation(new Set(EMPLOYEES)))).toEqual([1, 2, 3])
  })

  it("should wrap a single row", () => {
    const relation = new Relation({ id: 7, name: "solo" })

    expect(relation.size).toBe(1)
    expect(relation.first()).toEqual({ id: 7, name: "solo" })
  })

  it("should reject sources that are not objects", () => {
    expect(() => Reflect.construct(Relation, [5])).toThrow(RelationError)
    expect(() => Reflect.construct(Relation, ["rows"])).toThrow(
      "Cannot read rows from a string source",
    )
  })

  it("should treat missing input as empty", () => {
    expect(new Relation().size).toBe(0)
    expect(new Relation(null).size).toBe(0)
    expect(Relation.make([]).size).toBe(0)
  })
})

describe("Projection and filtering", () => {
  const relation = new Relation(EMPLOYEES)

  it("should keep only the selected fields in row order", () => {
    expect(relation.select("id").toArray()).toEqual([
      { id: 1 },
      { id: 2 },
      { id: 3 },
    ])

    const projected = relation.select(["sal", "id"]).first()
    expect(Object.keys(projected ?? {})).toEqual(["id", "sal"])
  })

  it("should skip fields that are not present", () => {
    expect(relation.select(["id", "missing"]).toArray()).toEqual([
      { id: 1 },
      { id: 2 },
      { id: 3 },
    ])
  })

  it("should narrow when projections are chained", () => {
    expect(
      relation.select(["id", "dept"]).select(["dept", "sal"]).toArray(),
    ).toEqual([{ dept: "A" }, { dept: "B" }, { dept: "A" }])
  })

  it("should filter with the row and its position", () => {
    expect(ids(relation.where((row) => row.dept === "A"))).toEqual([1, 3])
    expect(ids(relation.where((_, index) => index > 0))).toEqual([2, 3])
  })

  it("should keep the original rows when filtering", () => {
    const filtered = relation.where((row) => row.dept === "B")

    expect(filtered.size).toBe(1)
    expect(filtered.first()).toBe(EMPLOYEES[1])
  })

  it("should be idempotent for the same predicate", () => {
    const inDeptA = (row: Row<string | number>): boolean => row.dept === "A"

    expect(relation.where(inDeptA).where(inDeptA).toArray()).toEqual(
      relation.where(inDeptA).toArray(),
    )
  })

  it("should not change the source relation", () => {
    relation.where(() => false)
    relation.select("id")

    expect(relation.toArray()).toEqual(EMPLOYEES)
  })
})

describe("First and last rows", () => {
  it("should return the rows at either end", () => {
    const relation = new Relation(EMPLOYEES)

    expect(relation.first()).toBe(EMPLOYEES[0])
    expect(relation.last()).toBe(EMPLOYEES[2])
    expect(relation.first("unused")).toBe(EMPLOYEES[0])
  })

  it("should fall back to the default when empty", () => {
    const empty = new Relation<number>()

    expect(empty.first()).toBeUndefined()
    expect(empty.last()).toBeUndefined()
    expect(empty.first("none")).toBe("none")
    expect(empty.last(null)).toBeNull()
  })
})

describe("Indexed access", () => {
  let relation: Relation<string | number>

  beforeEach(() => {
    relation = new Relation(EMPLOYEES)
  })

  it("should check for offsets", () => {
    expect(relation.has(0)).toBeTruthy()
    expect(relation.has(2)).toBeTruthy()
    expect(relation.has(3)).toBeFalsy()
    expect(relation.has(-1)).toBeFalsy()
    expect(relation.has(1.5)).toBeFalsy()
  })

  it("should get rows or fail for missing offsets", () => {
    expect(relation.get(1)).toBe(EMPLOYEES[1])
    expect(() => relation.get(5)).toThrow(RelationError)
    expect(() => relation.get(5)).toThrow("No row at offset 5")
  })

  it("should append when no offset is given", () => {
    const row = { id: 4, dept: "C", sal: 50 }
    relation.set(row)
    relation.set(undefined, { id: 5, dept: "C", sal: 60 })
    relation.set(null, { id: 6, dept: "C", sal: 70 })

    expect(relation.size).toBe(6)
    expect(relation.get(3)).toBe(row)
    expect(ids(relation)).toEqual([1, 2, 3, 4, 5, 6])
    expect(EMPLOYEES.length).toBe(3)
  })

  it("should replace rows and append at the end", () => {
    relation.set(0, { id: 10, dept: "Z", sal: 1 })
    relation.set(3, { id: 11, dept: "Z", sal: 2 })

    expect(ids(relation)).toEqual([10, 2, 3, 11])
    expect(() => relation.set(10, { id: 12 })).toThrow(RelationError)
  })

  it("should remove rows", () => {
    relation.unset(0)
    relation.unset(99)

    expect(relation.size).toBe(2)
    expect(ids(relation)).toEqual([2, 3])
  })
})

describe("Iteration and conversion", () => {
  it("should iterate in order as many times as needed", () => {
    const relation = new Relation(EMPLOYEES)

    expect([...relation]).toEqual(EMPLOYEES)
    expect([...relation]).toEqual(EMPLOYEES)

    let total = 0
    for (const row of relation) {
      total += Number(row.sal)
    }
    expect(total).toBe(600)
  })

  it("should convert nested relations", () => {
    const relation = new Relation([
      { id: 1, children: new Relation([{ id: 2 }, { id: 3 }]) },
    ])

    expect(relation.toArray()).toEqual([
      { id: 1, children: [{ id: 2 }, { id: 3 }] },
    ])
  })

  it("should produce a detached copy", () => {
    const relation = new Relation([{ id: 1, tags: ["a"] }])

    const copy = relation.toArray()
    copy[0].id = 99
    const tags = copy[0].tags
    if (Array.isArray(tags)) {
      tags.push("b")
    }

    expect(relation.toArray()).toEqual([{ id: 1, tags: ["a"] }])
  })

  it("should share dates and other class instances", () => {
    const hired = new Date(0)
    const copy = new Relation([{ id: 1, hired }]).toArray()

    expect(copy[0].hired).toBe(hired)
  })

  it("should serialize as an array of rows", () => {
    expect(JSON.stringify(new Relation(EMPLOYEES.slice(0, 1)))).toBe(
      '[{"id":1,"dept":"A","sal":100}]',
    )
  })
})

describe("Relations should support chained queries", () => {
  it("should group, aggregate and order employees", () => {
    const relation = new Relation(EMPLOYEES)

    expect(relation.groupBy("dept").toArray()).toEqual([
      { id: 1, dept: "A", sal: 100 },
      { id: 2, dept: "B", sal: 200 },
    ])
    expect(relation.sum("sal")).toBe(600)
    expect(relation.avg("sal")).toBe(200)
    expect(ids(relation.orderBy("sal", "desc"))).toEqual([3, 2, 1])
  })

  it("should combine joins with the other operations", () => {
    const departments = [
      { dept: "A", title: "Accounting" },
      { dept: "B", title: "Billing" },
    ]

    const result = new Relation(EMPLOYEES)
      .innerJoin(departments, (e, d) => e.dept === d.dept)
      .where((row) => row.title === "Accounting")
      .orderBy("sal", "desc")
      .select(["id", "title"])

    expect(result.toArray()).toEqual([
      { id: 3, title: "Accounting" },
      { id: 1, title: "Accounting" },
    ])
  })
})
