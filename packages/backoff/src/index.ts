export { seededRandom, systemRandom } from "./adapters/random"
export { type CreateBackoffOptions, createBackoff } from "./core/create-backoff"
export { sampleNormal, sampleStandardNormal } from "./core/gaussian/normal-sample"
export {
  type GaussianJitterOptions,
  gaussianJitter,
  gaussianJitterAmount,
  JITTER_SIGMA_COUNT,
} from "./core/jitter/gaussian"
export {
  type JitterArgsOptions,
  type JitteredOptions,
  jitterArgs,
  jittered,
} from "./core/jitter/jitter-wrappers"
export { type ConstantOptions, constant, immediate } from "./core/strategies/constant"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"
