import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { TickResource, TimerResource, TimerStatus } from "../types.js";
import { ApiError } from "./apiClient.js";

export type PollLoopState = "idle" | "polling" | "suspended-on-network" | "stopped";

/** What the UI renders for the adopted timer. */
export interface TimerDisplayState {
  id: string;
  label: string;
  status: TimerStatus;
  endsAt: string;
  remainingSeconds: number;
  etag: string;
  lastModified: string;
  lastSyncedAt: number;
}

export interface TickSource {
  longPollTimer(timerId: string, etag: string | undefined, signal: AbortSignal): Promise<TickResource | null>;
}

export interface PollLoopOptions {
  backoffMs?: number;
  /** Consecutive transient failures tolerated before `onError` hears about them. */
  maxConsecutiveFailures?: number;
  onTick?: (timer: TimerDisplayState) => void;
  onStateChange?: (state: PollLoopState) => void;
  onError?: (error: Error) => void;
  logger?: Logger;
  now?: () => number;
}

export function normalizeTick(resource: TickResource | TimerResource, syncedAt = Date.now()): TimerDisplayState {
  return {
    id: resource.id,
    label: resource.label,
    status: resource.status,
    endsAt: resource.ends_at,
    remainingSeconds: resource.remaining_seconds,
    etag: resource.etag,
    lastModified: resource.last_modified,
    lastSyncedAt: syncedAt
  };
}

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ApiError) {
    return error.status >= 500 || error.status === 429;
  }
  return true;
}

function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timeout);
      resolve(false);
    };
    const timeout = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Keeps one adopted timer in sync with the server through repeated
 * conditional long-polls. `stopped` is terminal.
 */
export class TimerPollLoop {
  private readonly backoffMs: number;
  private readonly maxConsecutiveFailures: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private currentState: PollLoopState = "idle";
  private current: TimerDisplayState | null = null;
  private controller: AbortController | null = null;
  private running: Promise<void> = Promise.resolve();
  private adoption: Promise<void> = Promise.resolve();

  constructor(
    private readonly source: TickSource,
    private readonly options: PollLoopOptions = {}
  ) {
    this.backoffMs = options.backoffMs ?? 1000;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 5;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get state(): PollLoopState {
    return this.currentState;
  }

  get timer(): TimerDisplayState | null {
    return this.current;
  }

  /**
   * Starts following `timer`. Any request still in flight for a previously
   * adopted timer is aborted and allowed to unwind before the next poll.
   */
  adopt(timer: TimerDisplayState | TickResource | TimerResource): Promise<void> {
    if (this.currentState === "stopped") {
      return Promise.reject(new Error("Poll loop has been stopped."));
    }
    const display = "ends_at" in timer ? normalizeTick(timer, this.now()) : timer;
    this.adoption = this.adoption.then(() => this.switchTo(display));
    return this.adoption;
  }

  /** Aborts the in-flight request and halts for good. */
  async stop(): Promise<void> {
    this.transition("stopped");
    this.controller?.abort();
    this.controller = null;
    await this.running;
  }

  /** Resolves once the current polling run has unwound. */
  settled(): Promise<void> {
    return this.running;
  }

  private async switchTo(timer: TimerDisplayState): Promise<void> {
    this.controller?.abort();
    await this.running;
    if (this.currentState === "stopped") {
      return;
    }

    this.current = timer;
    if (timer.status !== "running") {
      this.transition("stopped");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.transition("polling");
    this.running = this.run(controller.signal);
  }

  private async run(signal: AbortSignal): Promise<void> {
    let failures = 0;

    while (!signal.aborted && this.current) {
      const { id, etag } = this.current;
      try {
        const tick = await this.source.longPollTimer(id, etag, signal);
        if (signal.aborted) {
          return;
        }
        failures = 0;
        if (!tick) {
          continue;
        }

        this.current = normalizeTick(tick, this.now());
        this.options.onTick?.(this.current);
        if (this.current.status !== "running") {
          this.logger.debug("Timer reached a terminal status", { timerId: id, status: this.current.status });
          this.transition("stopped");
          return;
        }
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        const failure = error instanceof Error ? error : new Error(String(error));
        if (!isTransientFailure(failure)) {
          this.logger.warn("Polling halted", { timerId: id, error: failure });
          this.options.onError?.(failure);
          this.transition("stopped");
          return;
        }

        failures += 1;
        this.logger.debug("Transient polling failure", { timerId: id, failures, error: failure });
        if (failures === this.maxConsecutiveFailures) {
          this.options.onError?.(failure);
        }

        this.transition("suspended-on-network");
        if (!(await delay(this.backoffMs, signal))) {
          return;
        }
        this.transition("polling");
      }
    }
  }

  private transition(next: PollLoopState): void {
    if (this.currentState === next || this.currentState === "stopped") {
      return;
    }
    this.currentState = next;
    this.options.onStateChange?.(next);
  }
}
