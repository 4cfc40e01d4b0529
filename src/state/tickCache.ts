import { z } from "zod";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { TickSnapshot } from "../types.js";
import type { SharedStore } from "./sharedStore.js";

export type WakeReason = "changed" | "timeout" | "aborted";

export interface ChangeSubscription {
  /**
   * Resolves on the first publish since the previous `wait` (a publish that
   * arrived in between counts), when `timeoutMs` elapses, or on abort.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<WakeReason>;
  close(): void;
}

export const timerTickKey = (timerId: string) => `timer:${timerId}:tick`;
export const timerChannel = (timerId: string) => `timer:${timerId}:changes`;
export const timerFinishLockKey = (timerId: string) => `timer:${timerId}:finish-lock`;

const snapshotSchema = z.object({
  id: z.string(),
  label: z.string(),
  status: z.enum(["running", "completed", "canceled"]),
  endsAt: z.string(),
  remainingSeconds: z.number().int().min(0),
  etag: z.string(),
  lastModified: z.string()
});

/**
 * Ephemeral view of the latest published snapshot per timer, plus the change
 * channel long-poll requests wait on. Never authoritative.
 */
export class TickCache {
  private readonly ttlMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: SharedStore,
    options: { ttlSeconds?: number; logger?: Logger } = {}
  ) {
    this.ttlMs = (options.ttlSeconds ?? 30) * 1000;
    this.logger = options.logger ?? silentLogger;
  }

  async remember(snapshot: TickSnapshot): Promise<void> {
    await this.store.set(timerTickKey(snapshot.id), JSON.stringify(snapshot), this.ttlMs);
  }

  async recall(timerId: string): Promise<TickSnapshot | undefined> {
    const raw = await this.store.get(timerTickKey(timerId));
    if (raw === undefined) {
      return undefined;
    }
    try {
      const parsed = snapshotSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      this.logger.warn("Discarding unreadable cached tick", { timerId, error });
      return undefined;
    }
    this.logger.warn("Discarding malformed cached tick", { timerId });
    return undefined;
  }

  /** Caches the snapshot and wakes every waiter on the timer. */
  async publish(snapshot: TickSnapshot): Promise<number> {
    await this.remember(snapshot);
    const receivers = await this.store.publish(timerChannel(snapshot.id), snapshot.etag);
    this.logger.debug("Published tick", { timerId: snapshot.id, status: snapshot.status, receivers });
    return receivers;
  }

  subscribe(timerIds: readonly string[]): ChangeSubscription {
    return new ChannelSubscription(this.store, timerIds);
  }
}

class ChannelSubscription implements ChangeSubscription {
  private readonly unsubscribers: Array<() => void>;
  private pending = false;
  private closed = false;
  private notify: (() => void) | null = null;
  private cancel: (() => void) | null = null;

  constructor(store: SharedStore, timerIds: readonly string[]) {
    this.unsubscribers = timerIds.map(id => store.subscribe(timerChannel(id), () => this.onMessage()));
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<WakeReason> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve("aborted");
    }
    if (this.pending) {
      this.pending = false;
      return Promise.resolve("changed");
    }

    return new Promise<WakeReason>(resolve => {
      const finish = (reason: WakeReason) => {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
        this.notify = null;
        this.cancel = null;
        resolve(reason);
      };
      const onAbort = () => finish("aborted");
      const timeout = setTimeout(() => finish("timeout"), Math.max(timeoutMs, 0));

      signal?.addEventListener("abort", onAbort, { once: true });
      this.notify = () => finish("changed");
      this.cancel = () => finish("aborted");
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.cancel?.();
  }

  private onMessage(): void {
    if (this.notify) {
      this.notify();
      return;
    }
    this.pending = true;
  }
}
