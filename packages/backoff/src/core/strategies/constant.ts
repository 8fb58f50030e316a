import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ConstantOptions {
  delay: Delay
}

export function constant(options: ConstantOptions): DelayPolicy {
  const { milliseconds } = options.delay

  return {
    getDelay(_attempt: number): Delay {
      return { milliseconds }
    },
  }
}

/** No wait between attempts. */
export const immediate: DelayPolicy = constant({ delay: { milliseconds: 0 } })
