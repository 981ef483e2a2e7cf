import { describe, it, expect } from "vitest"
import { Option } from "effect"
import { makeMessage } from "../domain/Message.js"
import { cleanTypeName, dispatchSpanName, handlerSpanName, messageName } from "../domain/MessageName.js"
import { commandResultAttributes, queryResultAttributes, valueTypeName } from "../domain/ResultAttributes.js"
import { CreateOrder, FindOrder, OrderCreated } from "./support.js"

describe("cleanTypeName", () => {
  it("should strip package qualification", () => {
    expect(cleanTypeName("com.example.orders.CreateOrder")).toBe("CreateOrder")
  })

  it("should strip proxy suffixes", () => {
    expect(cleanTypeName("CreateOrder$$EnhancedProxy")).toBe("CreateOrder")
  })

  it("should keep the inner name of nested types", () => {
    expect(cleanTypeName("Orders$CreateOrder")).toBe("CreateOrder")
  })

  it("should drop anonymous type counters", () => {
    expect(cleanTypeName("Orders$1")).toBe("Orders")
    expect(cleanTypeName("Orders$CreateOrder$2")).toBe("CreateOrder")
  })

  it("should fall back to Unknown for an empty name", () => {
    expect(cleanTypeName("  ")).toBe("Unknown")
  })
})

describe("messageName", () => {
  it("should prefer the explicit name", () => {
    const message = makeMessage({
      id: "m-1",
      kind: "event",
      name: "com.example.OrderCreated",
      payload: { orderId: "order-1" }
    })

    expect(messageName(message)).toBe("OrderCreated")
  })

  it("should use the payload class name", () => {
    expect(messageName(makeMessage({ id: "m-1", kind: "command", payload: new CreateOrder("order-1") }))).toBe(
      "CreateOrder"
    )
  })

  it("should fall back to Unknown for plain and primitive payloads", () => {
    expect(messageName(makeMessage({ id: "m-1", kind: "command", payload: { orderId: "order-1" } }))).toBe("Unknown")
    expect(messageName(makeMessage({ id: "m-1", kind: "command", payload: "order-1" }))).toBe("Unknown")
  })
})

describe("span names", () => {
  it("should name dispatch spans by kind", () => {
    expect(dispatchSpanName(makeMessage({ id: "m-1", kind: "command", payload: new CreateOrder("o") }))).toBe(
      "Command: CreateOrder"
    )
    expect(dispatchSpanName(makeMessage({ id: "m-2", kind: "event", payload: new OrderCreated("o") }))).toBe(
      "Event: OrderCreated"
    )
    expect(dispatchSpanName(makeMessage({ id: "m-3", kind: "query", payload: new FindOrder("o") }))).toBe(
      "Query: FindOrder"
    )
  })

  it("should name handler spans after the message", () => {
    expect(handlerSpanName(makeMessage({ id: "m-1", kind: "query", payload: new FindOrder("o") }))).toBe(
      "Handle: FindOrder"
    )
  })
})

describe("result attributes", () => {
  it("should name value types", () => {
    expect(valueTypeName(undefined)).toBe("void")
    expect(valueTypeName(new CreateOrder("o"))).toBe("CreateOrder")
    expect(valueTypeName(3)).toBe("number")
  })

  it("should describe command results", () => {
    expect(commandResultAttributes(undefined)).toEqual({ "command.result_type": "void" })
    expect(commandResultAttributes("order-1")).toEqual({
      "command.result_type": "string",
      "command.result": "order-1"
    })
  })

  it("should count collection query results", () => {
    expect(queryResultAttributes([1, 2, 3])).toEqual({ "query.result_type": "Array", "query.result_count": 3 })
    expect(queryResultAttributes(new Set(["a"]))).toEqual({ "query.result_type": "Set", "query.result_count": 1 })
  })

  it("should report presence of optional query results", () => {
    expect(queryResultAttributes(Option.none())).toEqual({
      "query.result_type": "Option",
      "query.result_present": false
    })
  })
})
