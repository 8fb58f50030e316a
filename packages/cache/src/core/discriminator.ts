import { randomBytes } from "node:crypto"
import type { UnixMs } from "@scrapekit/clock"

/** Matches discriminators produced by {@link DiscriminatorSequence}. */
export const DISCRIMINATOR_PATTERN = /^\d{13}-\d{6}-[0-9a-f]{8}$/

export type RandomHex = () => string

const randomHex: RandomHex = () => randomBytes(4).toString("hex")

/**
 * Produces unique, sortable discriminators for historical entries:
 * `<13-digit ms>-<6-digit counter>-<8 hex>`.
 *
 * The counter restarts whenever the millisecond changes, so two entries
 * written in the same millisecond still sort in write order.
 */
export class DiscriminatorSequence {
  private lastMs: UnixMs = -1
  private counter = 0

  constructor(private readonly random: RandomHex = randomHex) {}

  next(nowMs: UnixMs): string {
    if (nowMs === this.lastMs) {
      this.counter++
    } else {
      this.lastMs = nowMs
      this.counter = 0
    }

    const ms = String(Math.trunc(nowMs)).padStart(13, "0")
    const counter = String(this.counter).padStart(6, "0")

    return `${ms}-${counter}-${this.random()}`
  }
}

/** Shared by stores that are not given their own sequence. */
export const processSequence = new DiscriminatorSequence()
