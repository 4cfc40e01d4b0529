import { randomUUID } from "crypto";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { SharedStore } from "../state/sharedStore.js";
import { TickCache, timerFinishLockKey } from "../state/tickCache.js";
import type { TimerRecordStore } from "../state/timerStore.js";
import { isPastDeadline, markCompleted, resolveTick } from "../timers.js";
import type { TickSnapshot, Timer } from "../types.js";

export interface FinishCoordinatorOptions {
  lockTtlSeconds?: number;
  logger?: Logger;
}

export type FinishResult =
  | { outcome: "finished"; timer: Timer; snapshot: TickSnapshot }
  | { outcome: "unchanged"; timer: Timer; snapshot: TickSnapshot }
  | { outcome: "contended"; snapshot: TickSnapshot };

export type LockedResult<T> = { acquired: true; value: T } | { acquired: false };

/**
 * Moves running timers past their deadline to `completed`, at most once per
 * timer across every worker sharing the store. The same per-timer lock guards
 * cancellation, so no two status writes for one timer ever overlap.
 */
export class FinishCoordinator {
  private readonly lockTtlMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly records: TimerRecordStore,
    private readonly shared: SharedStore,
    private readonly ticks: TickCache,
    options: FinishCoordinatorOptions = {}
  ) {
    this.lockTtlMs = (options.lockTtlSeconds ?? 5) * 1000;
    this.logger = options.logger ?? silentLogger;
  }

  get lockTtlSeconds(): number {
    return this.lockTtlMs / 1000;
  }

  /**
   * Runs `action` while holding the timer's transition lock. A lock held by
   * someone else is not an error: the caller gets `{ acquired: false }`.
   */
  async withTransitionLock<T>(timerId: string, action: () => Promise<T>): Promise<LockedResult<T>> {
    const lockKey = timerFinishLockKey(timerId);
    const token = randomUUID();

    const acquired = await this.shared.setIfAbsent(lockKey, token, this.lockTtlMs);
    if (!acquired) {
      return { acquired: false };
    }

    try {
      return { acquired: true, value: await action() };
    } finally {
      await this.shared.delete(lockKey, token);
    }
  }

  async finish(timer: Timer, now: Date): Promise<FinishResult> {
    const result = await this.withTransitionLock(timer.id, async (): Promise<FinishResult> => {
      const current = (await this.records.findById(timer.id)) ?? timer;
      if (!isPastDeadline(current, now)) {
        return { outcome: "unchanged", timer: current, snapshot: resolveTick(current, now) };
      }

      const completed = await this.records.save(markCompleted(current, now));
      const snapshot = resolveTick(completed, now);
      await this.ticks.publish(snapshot);
      this.logger.info("Timer completed", { timerId: completed.id, owner: completed.owner });
      return { outcome: "finished", timer: completed, snapshot };
    });

    if (result.acquired) {
      return result.value;
    }

    this.logger.debug("Finish already in progress elsewhere", { timerId: timer.id });
    const published = await this.ticks.recall(timer.id);
    const snapshot = published && published.status !== "running" ? published : resolveTick(timer, now);
    return { outcome: "contended", snapshot };
  }
}
