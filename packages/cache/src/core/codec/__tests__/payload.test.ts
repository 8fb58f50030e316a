import { SerializationError } from "../../cache-errors"
import { assertPayload, isPayload } from "../payload"

describe("assertPayload", () => {
  it.each([
    ["numbers", -12.5],
    ["strings", ""],
    ["booleans", false],
    ["empty arrays", []],
    ["nested structures", { rows: [{ id: 1, tags: ["a"] }], meta: { ok: true } }],
    ["objects without a prototype", Object.assign(Object.create(null), { a: 1 })],
    ["null fields and array items", { price: 1, discount: null, rows: [1, null] }],
  ])("accepts %s", (_label, value) => {
    expect(() => assertPayload(value)).not.toThrow()
    expect(isPayload(value)).toBe(true)
  })

  it.each([
    ["undefined at the top", undefined, "Cannot serialize payload: is undefined"],
    ["null at the top", null, "Cannot serialize payload: is null"],
    ["negative zero", { delta: -0 }, "Cannot serialize payload.delta: is -0"],
    ["infinity", Number.POSITIVE_INFINITY, "Cannot serialize payload: is Infinity"],
    ["an undefined field", { a: undefined }, "Cannot serialize payload.a: is undefined"],
    ["an array hole", [1, , 3], "Cannot serialize payload[1]: is undefined"],
    ["a function", { cb: () => 1 }, "Cannot serialize payload.cb: is a function"],
    ["a Set", { s: new Set([1]) }, "Cannot serialize payload.s: is a Set object"],
  ])("rejects %s", (_label, value, message) => {
    expect(() => assertPayload(value)).toThrow(SerializationError)
    expect(() => assertPayload(value)).toThrow(message)
    expect(isPayload(value)).toBe(false)
  })

  it("rejects cycles instead of recursing forever", () => {
    const list: unknown[] = [1]
    list.push(list)

    expect(() => assertPayload(list)).toThrow("Cannot serialize payload[1]: contains a cycle")
  })
})
