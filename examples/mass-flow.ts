import { Effect } from "effect"
import { Measurements } from "../src/Measurements.js"
import { Quantity } from "../src/Quantity.js"

const program = Effect.gen(function* () {
  const density = yield* Quantity.make(10, "kg/m^3")
  const flow = yield* Quantity.make(25.5, "m^3/s")
  const massFlow = yield* density.multiply(flow)
  yield* Effect.log(`mass flow: ${massFlow}`)

  const measurements = yield* Measurements
  const cargo = yield* measurements.measure("mass", 1.2, "short_ton")
  yield* Effect.log(`cargo: ${cargo}`)

  const leg = yield* measurements.convert("distance", 26.2, "mile", "km")
  yield* Effect.log(`marathon: ${leg.toFixed(3)} km`)
}).pipe(Effect.provide(Measurements.layer()))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run the mass flow example", error)
  process.exitCode = 1
})
