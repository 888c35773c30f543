import { describe, it, expect } from "vitest"
import * as Quantities from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(Quantities).toHaveProperty("Quantity")
    expect(Quantities).toHaveProperty("UnitTerm")
    expect(Quantities).toHaveProperty("parse")
    expect(Quantities).toHaveProperty("format")
    expect(Quantities).toHaveProperty("merge")
    expect(Quantities).toHaveProperty("rectify")
    expect(Quantities).toHaveProperty("convert")
    expect(Quantities).toHaveProperty("Measurements")
    expect(Quantities).toHaveProperty("QuantitySettings")
    expect(Quantities).toHaveProperty("UnitParseError")
    expect(Quantities).toHaveProperty("UnitMismatchError")
  })
})
