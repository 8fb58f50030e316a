import { systemRandom } from "../../adapters/random"
import type { RandomSource } from "../../ports/random-source"
import { gaussianJitter } from "./gaussian"

export type JitteredOptions = {
  factor?: number
  random?: RandomSource
}

/**
 * Wraps `fn` so its numeric result is jittered. Default factor: 1.
 */
export function jittered<A extends unknown[]>(
  fn: (...args: A) => number,
  options: JitteredOptions = {},
): (...args: A) => number {
  const jitter = gaussianJitter({ factor: options.factor ?? 1 }, options.random ?? systemRandom)

  return (...args: A): number => jitter.apply(fn(...args))
}

export type JitterArgsOptions = {
  /**
   * Factor per positional argument. A negative factor leaves that argument
   * alone; missing factors leave the remaining arguments alone.
   */
  factors: readonly number[]
  random?: RandomSource
}

/**
 * Wraps `fn` so its numeric arguments are jittered before each call.
 */
export function jitterArgs<R>(
  fn: (...args: number[]) => R,
  options: JitterArgsOptions,
): (...args: number[]) => R {
  const random = options.random ?? systemRandom
  const strategies = options.factors.map((factor) =>
    factor >= 0 ? gaussianJitter({ factor }, random) : undefined,
  )

  return (...args: number[]): R => {
    const next = args.map((arg, i) => strategies[i]?.apply(arg) ?? arg)
    return fn(...next)
  }
}
