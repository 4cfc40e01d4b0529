import { z } from "zod";
import type { TickResource, TimerResource } from "../types.js";

const statusSchema = z.enum(["running", "completed", "canceled"]);

export const tickResourceSchema = z.object({
  id: z.string(),
  label: z.string(),
  status: statusSchema,
  ends_at: z.string(),
  remaining_seconds: z.number().int().min(0),
  etag: z.string(),
  last_modified: z.string()
});

export const timerResourceSchema = tickResourceSchema.extend({
  duration_seconds: z.number().int().positive(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  canceled_at: z.string().nullable()
});

const batchTickResponseSchema = z.object({
  timers: z.array(tickResourceSchema),
  not_modified: z.array(z.string()),
  errors: z.array(z.object({ id: z.string(), error: z.string(), message: z.string() }))
});

export type BatchTickResponse = z.infer<typeof batchTickResponseSchema>;

const errorBodySchema = z.object({
  error: z.string(),
  message: z.string()
});

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

async function parseError(response: Response): Promise<ApiError> {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    const body = errorBodySchema.safeParse(await response.json());
    if (body.success) {
      return new ApiError(response.status, body.data.error, body.data.message);
    }
  }
  return new ApiError(response.status, "http_error", response.statusText || "Request failed");
}

export interface TimerApiClientOptions {
  baseUrl: string;
  token: string;
  fetch?: typeof fetch;
}

export interface LongPollOptions {
  wait?: boolean;
  timeoutSeconds?: number;
}

export class TimerApiClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TimerApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async startTimer(durationSeconds: number, label?: string): Promise<TimerResource> {
    const body = await this.request("/timers", {
      method: "POST",
      body: JSON.stringify({ duration_seconds: durationSeconds, label })
    });
    return timerResourceSchema.parse(body);
  }

  async cancelTimer(timerId: string): Promise<TimerResource> {
    const body = await this.request(`/timers/${encodeURIComponent(timerId)}/cancel`, { method: "POST" });
    return timerResourceSchema.parse(body);
  }

  async getTimer(timerId: string): Promise<TimerResource> {
    return timerResourceSchema.parse(await this.request(`/timers/${encodeURIComponent(timerId)}`));
  }

  async listTimers(): Promise<TimerResource[]> {
    return z.array(timerResourceSchema).parse(await this.request("/timers"));
  }

  /** Resolves `null` when the server answers 304 (no change within its wait budget). */
  async longPollTimer(
    timerId: string,
    etag?: string,
    signal?: AbortSignal,
    options: LongPollOptions = {}
  ): Promise<TickResource | null> {
    const params = new URLSearchParams({ wait: String(options.wait ?? true) });
    if (options.timeoutSeconds !== undefined) {
      params.set("timeout", String(options.timeoutSeconds));
    }

    const headers = this.headers();
    if (etag) {
      headers.set("If-None-Match", etag);
    }

    const response = await this.fetchImpl(`${this.baseUrl}/timers/${encodeURIComponent(timerId)}/tick?${params}`, {
      method: "GET",
      headers,
      signal
    });

    if (response.status === 304) {
      return null;
    }
    if (!response.ok) {
      throw await parseError(response);
    }
    return tickResourceSchema.parse(await response.json());
  }

  async batchTick(
    entries: Array<{ id: string; etag?: string }>,
    options: LongPollOptions = {},
    signal?: AbortSignal
  ): Promise<BatchTickResponse> {
    const body = await this.request(
      "/timers/batch/tick",
      {
        method: "POST",
        body: JSON.stringify({
          timers: entries,
          wait: options.wait ?? false,
          timeout_seconds: options.timeoutSeconds
        })
      },
      signal
    );
    return batchTickResponseSchema.parse(body);
  }

  private headers(): Headers {
    return new Headers({
      Accept: "application/json",
      Authorization: `Bearer ${this.token}`
    });
  }

  private async request(path: string, init: RequestInit = {}, signal?: AbortSignal): Promise<unknown> {
    const headers = this.headers();
    if (init.body) {
      headers.set("Content-Type", "application/json");
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, headers, signal });
    if (!response.ok) {
      throw await parseError(response);
    }
    return response.json();
  }
}
