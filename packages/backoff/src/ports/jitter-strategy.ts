/**
 * Perturbs a numeric value (a delay, a sampled quantity, an argument).
 * Callers that need a non-negative result must clamp it themselves.
 */
export interface JitterStrategy {
  apply(value: number): number
}
