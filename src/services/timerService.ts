import { differenceInMilliseconds, parseISO } from "date-fns";
import { performance } from "perf_hooks";
import { z } from "zod";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import { MAX_LONG_POLL_SECONDS } from "../config.js";
import { InvalidStateError, NotFoundError, TimerServiceError } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { RateLimiter } from "../state/rateLimit.js";
import type { TickCache } from "../state/tickCache.js";
import type { TimerRecordStore } from "../state/timerStore.js";
import {
  applyTerminalSnapshot,
  createTimer,
  isPastDeadline,
  markCanceled,
  resolveTick,
  toTimerResource
} from "../timers.js";
import type { BatchTickError, BatchTickResult, TickOutcome, TickSnapshot, Timer, TimerResource } from "../types.js";
import type { FinishCoordinator } from "./finishCoordinator.js";

export const MAX_DURATION_SECONDS = 8 * 60 * 60;
export const MAX_BATCH_SIZE = 50;
const DEADLINE_SLACK_MS = 5;
const CANCEL_LOCK_ATTEMPTS = 3;

export const startTimerInput = z.object({
  duration_seconds: z.number().int().positive().max(MAX_DURATION_SECONDS),
  label: z.string().trim().min(1).max(128).optional()
});

export const batchTickInput = z.object({
  timers: z
    .array(
      z.object({
        id: z.string().min(1),
        etag: z.string().min(1).optional()
      })
    )
    .min(1)
    .max(MAX_BATCH_SIZE)
    .refine(entries => new Set(entries.map(entry => entry.id)).size === entries.length, {
      message: "Timer ids must be unique."
    }),
  wait: z.boolean().default(false),
  timeout_seconds: z.number().positive().max(MAX_LONG_POLL_SECONDS).optional()
});

export interface TickOptions {
  etag?: string;
  wait?: boolean;
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export type BatchTickOutcome = { kind: "result"; result: BatchTickResult } | { kind: "aborted" };

export interface TimerServiceDeps {
  records: TimerRecordStore;
  ticks: TickCache;
  finisher: FinishCoordinator;
  clock?: Clock;
  rateLimiter?: RateLimiter;
  logger?: Logger;
  longPollTimeoutSeconds?: number;
}

interface Settled {
  timer: Timer;
  snapshot: TickSnapshot;
}

type Evaluation =
  | { id: string; ok: true; settled: Settled; changed: boolean }
  | { id: string; ok: false; error: BatchTickError };

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidStateError(`${path}${issue?.message ?? "Invalid input."}`);
  }
  return parsed.data;
}

export class TimerService {
  private readonly records: TimerRecordStore;
  private readonly ticks: TickCache;
  private readonly finisher: FinishCoordinator;
  private readonly clock: Clock;
  private readonly rateLimiter?: RateLimiter;
  private readonly logger: Logger;
  private readonly longPollTimeoutSeconds: number;

  constructor(deps: TimerServiceDeps) {
    this.records = deps.records;
    this.ticks = deps.ticks;
    this.finisher = deps.finisher;
    this.clock = deps.clock ?? systemClock;
    this.rateLimiter = deps.rateLimiter;
    this.logger = deps.logger ?? silentLogger;
    this.longPollTimeoutSeconds = Math.min(deps.longPollTimeoutSeconds ?? 30, MAX_LONG_POLL_SECONDS);
  }

  async startTimer(owner: string, input: unknown): Promise<TimerResource> {
    await this.consume(owner, "timer:create");
    const parsed = parseInput(startTimerInput, input);

    const timer = await this.records.insert(
      createTimer(
        {
          owner,
          label: parsed.label ?? "Timer",
          durationSeconds: parsed.duration_seconds
        },
        this.clock.now()
      )
    );
    const snapshot = resolveTick(timer, this.clock.now());
    await this.ticks.remember(snapshot);
    this.logger.info("Timer started", { timerId: timer.id, owner, durationSeconds: timer.durationSeconds });
    return toTimerResource(timer, snapshot);
  }

  async cancelTimer(owner: string, timerId: string): Promise<TimerResource> {
    await this.consume(owner, "timer:cancel");
    const loaded = await this.load(owner, timerId);
    if (loaded.status !== "running" || isPastDeadline(loaded, this.clock.now())) {
      const { timer, snapshot } = await this.settle(loaded);
      return toTimerResource(timer, snapshot);
    }

    let timer = loaded;
    for (let attempt = 1; attempt <= CANCEL_LOCK_ATTEMPTS; attempt += 1) {
      const locked = await this.finisher.withTransitionLock(timerId, async () => {
        const current = await this.load(owner, timerId);
        const now = this.clock.now();
        if (current.status !== "running" || isPastDeadline(current, now)) {
          return current;
        }
        const canceled = await this.records.save(markCanceled(current, now));
        await this.ticks.publish(resolveTick(canceled, now));
        this.logger.info("Timer canceled", { timerId, owner });
        return canceled;
      });
      if (locked.acquired) {
        timer = locked.value;
        break;
      }

      // A holder that never releases loses the lock at its TTL; retry then.
      timer = await this.awaitTransition(owner, timerId);
      if (timer.status !== "running" || isPastDeadline(timer, this.clock.now())) {
        break;
      }
      if (attempt === CANCEL_LOCK_ATTEMPTS) {
        this.logger.warn("Cancel gave up waiting for the transition lock", { timerId, owner, attempts: attempt });
      }
    }

    const { timer: settledTimer, snapshot } = await this.settle(timer);
    return toTimerResource(settledTimer, snapshot);
  }

  async getTimer(owner: string, timerId: string): Promise<TimerResource> {
    const { timer, snapshot } = await this.settle(await this.load(owner, timerId));
    return toTimerResource(timer, snapshot);
  }

  async listTimers(owner: string): Promise<TimerResource[]> {
    const timers = await this.records.listByOwner(owner);
    const settled = await Promise.all(timers.map(timer => this.settle(timer)));
    return settled.map(({ timer, snapshot }) => toTimerResource(timer, snapshot));
  }

  /**
   * Long-poll for one timer. Answers at once when the client's tag is stale;
   * otherwise, with `wait`, holds until a published change, the timer's
   * deadline, the wait budget, or the caller aborting.
   */
  async tick(owner: string, timerId: string, options: TickOptions = {}): Promise<TickOutcome> {
    await this.consume(owner, "timer:tick");
    const startedAt = performance.now();
    const budgetMs = this.budgetMs(options.timeoutSeconds);
    const subscription = options.wait ? this.ticks.subscribe([timerId]) : null;

    try {
      let { timer, snapshot } = await this.settle(await this.load(owner, timerId));
      if (snapshot.etag !== options.etag) {
        return { kind: "changed", snapshot };
      }
      if (!subscription || snapshot.status !== "running") {
        return { kind: "not_modified", snapshot };
      }

      const observed = snapshot;
      for (;;) {
        const leftMs = budgetMs - (performance.now() - startedAt);
        if (leftMs <= 0) {
          return { kind: "not_modified", snapshot: observed };
        }

        const reason = await subscription.wait(Math.min(leftMs, this.untilDeadlineMs([timer])), options.signal);
        if (reason === "aborted") {
          return { kind: "aborted" };
        }
        if (reason === "timeout" && budgetMs - (performance.now() - startedAt) <= 0) {
          return { kind: "not_modified", snapshot: observed };
        }

        ({ timer, snapshot } = await this.settle(await this.load(owner, timerId)));
        if (snapshot.etag !== options.etag) {
          return { kind: "changed", snapshot };
        }
      }
    } finally {
      subscription?.close();
    }
  }

  /**
   * Fans out to the single-timer resolution for every entry and reports only
   * the changed ones. A failing id lands in `errors` without failing the rest.
   */
  async batchTick(owner: string, input: unknown, signal?: AbortSignal): Promise<BatchTickOutcome> {
    await this.consume(owner, "timer:batch-tick");
    const request = parseInput(batchTickInput, input);
    const startedAt = performance.now();
    const budgetMs = this.budgetMs(request.timeout_seconds);
    const subscription = request.wait ? this.ticks.subscribe(request.timers.map(entry => entry.id)) : null;

    try {
      for (;;) {
        const evaluations = await Promise.all(request.timers.map(entry => this.evaluate(owner, entry.id, entry.etag)));
        const waitable = evaluations.flatMap(evaluation =>
          evaluation.ok && !evaluation.changed && evaluation.settled.snapshot.status === "running"
            ? [evaluation.settled.timer]
            : []
        );
        const anyChanged = evaluations.some(evaluation => evaluation.ok && evaluation.changed);
        const leftMs = budgetMs - (performance.now() - startedAt);

        if (!subscription || anyChanged || waitable.length === 0 || leftMs <= 0) {
          return { kind: "result", result: this.summarize(evaluations) };
        }

        const reason = await subscription.wait(Math.min(leftMs, this.untilDeadlineMs(waitable)), signal);
        if (reason === "aborted") {
          return { kind: "aborted" };
        }
        if (reason === "timeout" && budgetMs - (performance.now() - startedAt) <= 0) {
          return { kind: "result", result: this.summarize(evaluations) };
        }
      }
    } finally {
      subscription?.close();
    }
  }

  private async evaluate(owner: string, timerId: string, etag: string | undefined): Promise<Evaluation> {
    try {
      const settled = await this.settle(await this.load(owner, timerId));
      return { id: timerId, ok: true, settled, changed: settled.snapshot.etag !== etag };
    } catch (error) {
      if (error instanceof TimerServiceError) {
        return { id: timerId, ok: false, error: { id: timerId, error: error.code, message: error.message } };
      }
      this.logger.error("Batch tick entry failed", { timerId, error });
      return { id: timerId, ok: false, error: { id: timerId, error: "internal_error", message: "Tick resolution failed." } };
    }
  }

  private summarize(evaluations: Evaluation[]): BatchTickResult {
    const result: BatchTickResult = { timers: [], notModified: [], errors: [] };
    for (const evaluation of evaluations) {
      if (!evaluation.ok) {
        result.errors.push(evaluation.error);
      } else if (evaluation.changed) {
        result.timers.push(evaluation.settled.snapshot);
      } else {
        result.notModified.push(evaluation.id);
      }
    }
    return result;
  }

  /** Resolves the timer at the current instant, finishing it first when its deadline has passed. */
  private async settle(timer: Timer): Promise<Settled> {
    const now = this.clock.now();
    if (!isPastDeadline(timer, now)) {
      return { timer, snapshot: resolveTick(timer, now) };
    }

    const result = await this.finisher.finish(timer, now);
    if (result.outcome === "contended") {
      const current = (await this.records.findById(timer.id)) ?? timer;
      if (current.status !== "running") {
        return { timer: current, snapshot: resolveTick(current, now) };
      }
      return { timer: applyTerminalSnapshot(current, result.snapshot), snapshot: result.snapshot };
    }
    return { timer: result.timer, snapshot: result.snapshot };
  }

  /** Waits for another worker's transition to land, bounded by the lock TTL. */
  private async awaitTransition(owner: string, timerId: string): Promise<Timer> {
    const subscription = this.ticks.subscribe([timerId]);
    try {
      const current = await this.load(owner, timerId);
      if (current.status !== "running") {
        return current;
      }
      await subscription.wait(this.finisher.lockTtlSeconds * 1000);
      return await this.load(owner, timerId);
    } finally {
      subscription.close();
    }
  }

  private async load(owner: string, timerId: string): Promise<Timer> {
    const timer = await this.records.findById(timerId);
    if (!timer || timer.owner !== owner) {
      throw new NotFoundError(`Timer ${timerId} not found.`);
    }
    return timer;
  }

  private untilDeadlineMs(timers: Timer[]): number {
    const now = this.clock.now();
    const remaining = timers.map(timer => differenceInMilliseconds(parseISO(timer.endsAt), now));
    return Math.max(Math.min(...remaining), 0) + DEADLINE_SLACK_MS;
  }

  private budgetMs(timeoutSeconds: number | undefined): number {
    const seconds = Math.min(timeoutSeconds ?? this.longPollTimeoutSeconds, MAX_LONG_POLL_SECONDS);
    return seconds * 1000;
  }

  private async consume(owner: string, scope: string): Promise<void> {
    await this.rateLimiter?.consume(`${scope}:${owner}`);
  }
}
