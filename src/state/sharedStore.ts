import { EventEmitter } from "events";

/**
 * Fast key-value store shared by every request handler. Values are strings and
 * every write carries a TTL, so losing the store only costs wake-up latency.
 */
export interface SharedStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Atomic acquire-if-absent. Resolves `false` when a live value already exists. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Deletes the key; with `expected`, only when the stored value still matches. */
  delete(key: string, expected?: string): Promise<boolean>;
  /** Increments a counter; the TTL applies from the first increment of a window. */
  increment(key: string, ttlMs: number): Promise<number>;
  /** Broadcasts to every current subscriber of the channel; returns how many received it. */
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, listener: (message: string) => void): () => void;
}

interface Entry {
  value: string;
  expiresAt: number;
}

const DEFAULT_SWEEP_THRESHOLD = 1024;

export class MemorySharedStore implements SharedStore {
  private readonly entries = new Map<string, Entry>();
  private readonly emitter = new EventEmitter();
  private readonly sweepThreshold: number;
  private nextSweepAt: number;

  constructor(
    private readonly now: () => number = Date.now,
    options: { sweepThreshold?: number } = {}
  ) {
    this.emitter.setMaxListeners(0);
    this.sweepThreshold = options.sweepThreshold ?? DEFAULT_SWEEP_THRESHOLD;
    this.nextSweepAt = this.sweepThreshold;
  }

  /** Number of stored entries, expired ones included until the next sweep. */
  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | undefined> {
    return this.live(key)?.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.write(key, { value, expiresAt: this.now() + ttlMs });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.write(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async delete(key: string, expected?: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    if (expected !== undefined && entry.value !== expected) {
      return false;
    }
    return this.entries.delete(key);
  }

  async increment(key: string, ttlMs: number): Promise<number> {
    const entry = this.live(key);
    const next = entry ? Number(entry.value) + 1 : 1;
    this.write(key, {
      value: String(next),
      expiresAt: entry ? entry.expiresAt : this.now() + ttlMs
    });
    return next;
  }

  async publish(channel: string, message: string): Promise<number> {
    const receivers = this.emitter.listenerCount(channel);
    this.emitter.emit(channel, message);
    return receivers;
  }

  subscribe(channel: string, listener: (message: string) => void): () => void {
    this.emitter.on(channel, listener);
    return () => this.emitter.off(channel, listener);
  }

  subscriberCount(channel: string): number {
    return this.emitter.listenerCount(channel);
  }

  private write(key: string, entry: Entry): void {
    this.entries.set(key, entry);
    if (this.entries.size >= this.nextSweepAt) {
      this.sweep();
    }
  }

  /** Drops every expired entry; the next sweep waits until the live set doubles. */
  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
    this.nextSweepAt = Math.max(this.sweepThreshold, this.entries.size * 2);
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
