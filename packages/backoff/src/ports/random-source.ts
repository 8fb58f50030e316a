/**
 * Source of uniform randomness.
 *
 * @remarks
 * `next()` MUST return a floating-point number in the range [0, 1).
 */
export interface RandomSource {
  next(): number
}
