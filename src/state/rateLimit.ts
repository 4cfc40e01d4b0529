import { RateLimitedError } from "../errors.js";
import type { SharedStore } from "./sharedStore.js";

export interface RateLimitOptions {
  tokens: number;
  periodSeconds: number;
}

/** Fixed-window counter per identifier, kept in the shared store. */
export class RateLimiter {
  constructor(
    private readonly store: SharedStore,
    private readonly options: RateLimitOptions
  ) {}

  async consume(identifier: string): Promise<void> {
    const count = await this.store.increment(`rl:${identifier}`, this.options.periodSeconds * 1000);
    if (count > this.options.tokens) {
      throw new RateLimitedError(this.options.tokens, this.options.periodSeconds);
    }
  }
}
