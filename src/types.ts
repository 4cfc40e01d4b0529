export type TimerStatus = "running" | "completed" | "canceled";

export interface Timer {
  id: string;
  owner: string;
  label: string;
  durationSeconds: number;
  status: TimerStatus;
  startedAt: string;
  endsAt: string;
  completedAt: string | null;
  canceledAt: string | null;
  createdAt: string;
  updatedAt: string;
  version: number;
}

export interface TickSnapshot {
  id: string;
  label: string;
  status: TimerStatus;
  endsAt: string;
  remainingSeconds: number;
  etag: string;
  lastModified: string;
}

export interface TimerResource {
  id: string;
  label: string;
  duration_seconds: number;
  status: TimerStatus;
  started_at: string;
  ends_at: string;
  completed_at: string | null;
  canceled_at: string | null;
  remaining_seconds: number;
  etag: string;
  last_modified: string;
}

export interface TickResource {
  id: string;
  label: string;
  status: TimerStatus;
  ends_at: string;
  remaining_seconds: number;
  etag: string;
  last_modified: string;
}

export type TickOutcome =
  | { kind: "changed"; snapshot: TickSnapshot }
  | { kind: "not_modified"; snapshot: TickSnapshot }
  | { kind: "aborted" };

export interface BatchTickError {
  id: string;
  error: string;
  message: string;
}

export interface BatchTickResult {
  timers: TickSnapshot[];
  notModified: string[];
  errors: BatchTickError[];
}
