import { createHash } from "crypto";
import { addSeconds, differenceInMilliseconds, parseISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { InvalidStateError } from "./errors.js";
import type { TickResource, TickSnapshot, Timer, TimerResource, TimerStatus } from "./types.js";

export interface NewTimer {
  owner: string;
  label: string;
  durationSeconds: number;
}

export function createTimer(input: NewTimer, now: Date): Timer {
  if (!Number.isInteger(input.durationSeconds) || input.durationSeconds <= 0) {
    throw new InvalidStateError("Duration must be a positive whole number of seconds.");
  }
  const startedAt = now.toISOString();
  return {
    id: uuid(),
    owner: input.owner,
    label: input.label,
    durationSeconds: input.durationSeconds,
    status: "running",
    startedAt,
    endsAt: addSeconds(now, input.durationSeconds).toISOString(),
    completedAt: null,
    canceledAt: null,
    createdAt: startedAt,
    updatedAt: startedAt,
    version: 1
  };
}

export function markCompleted(timer: Timer, now: Date): Timer {
  return transition(timer, { status: "completed", completedAt: now.toISOString() }, now);
}

export function markCanceled(timer: Timer, now: Date): Timer {
  return transition(timer, { status: "canceled", canceledAt: now.toISOString() }, now);
}

function transition(timer: Timer, patch: Pick<Partial<Timer>, "status" | "completedAt" | "canceledAt">, now: Date): Timer {
  if (timer.status !== "running") {
    throw new InvalidStateError(`Timer ${timer.id} is already ${timer.status}.`);
  }
  return {
    ...timer,
    ...patch,
    updatedAt: now.toISOString(),
    version: timer.version + 1
  };
}

export function isPastDeadline(timer: Timer, now: Date): boolean {
  return timer.status === "running" && differenceInMilliseconds(parseISO(timer.endsAt), now) <= 0;
}

/**
 * Computes what a timer looks like at `now` without touching the record.
 *
 * A running timer whose deadline has passed is reported as `completed`; writing
 * that transition back is the finish coordinator's job.
 */
export function resolveTick(timer: Timer, now: Date): TickSnapshot {
  if (!Number.isInteger(timer.durationSeconds) || timer.durationSeconds <= 0) {
    throw new InvalidStateError(`Timer ${timer.id} has a non-positive duration.`);
  }

  let status: TimerStatus = timer.status;
  let remainingSeconds = 0;
  let lastModified: string;

  if (timer.status === "running") {
    const remainingMs = differenceInMilliseconds(parseISO(timer.endsAt), now);
    if (remainingMs <= 0) {
      status = "completed";
      lastModified = timer.endsAt;
    } else {
      remainingSeconds = Math.max(Math.ceil(remainingMs / 1000), 0);
      lastModified = timer.startedAt;
    }
  } else {
    lastModified = (timer.status === "completed" ? timer.completedAt : timer.canceledAt) ?? timer.updatedAt;
  }

  return {
    id: timer.id,
    label: timer.label,
    status,
    endsAt: timer.endsAt,
    remainingSeconds,
    etag: buildEtag(status, remainingSeconds, timer.endsAt),
    lastModified
  };
}

export function buildEtag(status: TimerStatus, remainingSeconds: number, endsAt: string): string {
  const digest = createHash("sha1").update([status, String(remainingSeconds), endsAt].join("::")).digest("base64url");
  return `W/"${digest}"`;
}

export function toTickResource(snapshot: TickSnapshot): TickResource {
  return {
    id: snapshot.id,
    label: snapshot.label,
    status: snapshot.status,
    ends_at: snapshot.endsAt,
    remaining_seconds: snapshot.remainingSeconds,
    etag: snapshot.etag,
    last_modified: snapshot.lastModified
  };
}

/**
 * The record as a terminal snapshot describes it. Used while another worker
 * still holds the transition lock and the durable write has not landed.
 */
export function applyTerminalSnapshot(timer: Timer, snapshot: TickSnapshot): Timer {
  if (timer.status !== "running" || snapshot.status === "running") {
    return timer;
  }
  return {
    ...timer,
    status: snapshot.status,
    completedAt: snapshot.status === "completed" ? snapshot.lastModified : null,
    canceledAt: snapshot.status === "canceled" ? snapshot.lastModified : null
  };
}

export function toTimerResource(timer: Timer, snapshot: TickSnapshot): TimerResource {
  return {
    id: timer.id,
    label: timer.label,
    duration_seconds: timer.durationSeconds,
    status: snapshot.status,
    started_at: timer.startedAt,
    ends_at: timer.endsAt,
    completed_at: timer.completedAt,
    canceled_at: timer.canceledAt,
    remaining_seconds: snapshot.remainingSeconds,
    etag: snapshot.etag,
    last_modified: snapshot.lastModified
  };
}
