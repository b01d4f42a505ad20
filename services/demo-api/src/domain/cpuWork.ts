import { Effect } from "effect"

export const CPU_CHUNK_SIZE = 250_000

// Sum of the integers in [from, to)
export const sumRange = (from: number, to: number): number => {
  let total = 0
  for (let i = from; i < to; i++) {
    total += i
  }
  return total
}

/**
 * Same result as `sumRange(0, iterations)`, yielding to other fibers
 * between chunks so a long computation does not stall request handling.
 */
export const sumInChunks = (iterations: number, chunkSize = CPU_CHUNK_SIZE): Effect.Effect<number> =>
  Effect.gen(function* () {
    let total = 0
    for (let start = 0; start < iterations; start += chunkSize) {
      total += sumRange(start, Math.min(start + chunkSize, iterations))
      yield* Effect.yieldNow()
    }
    return total
  })
