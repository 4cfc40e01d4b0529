import cors from "cors";
import express from "express";
import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import type { CredentialResolver } from "./auth.js";
import { StaticTokenResolver, extractBearer } from "./auth.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { AppConfig } from "./config.js";
import { InvalidStateError, TimerServiceError } from "./errors.js";
import type { Logger } from "./logging.js";
import { createLogger } from "./logging.js";
import { FinishCoordinator } from "./services/finishCoordinator.js";
import { TimerService } from "./services/timerService.js";
import { RateLimiter } from "./state/rateLimit.js";
import type { SharedStore } from "./state/sharedStore.js";
import { MemorySharedStore } from "./state/sharedStore.js";
import { TickCache } from "./state/tickCache.js";
import type { TimerRecordStore } from "./state/timerStore.js";
import { TimerStore } from "./state/timerStore.js";
import { toTickResource } from "./timers.js";
import type { TickSnapshot } from "./types.js";

export interface TimerServerOptions {
  config: AppConfig;
  records?: TimerRecordStore;
  shared?: SharedStore;
  credentials?: CredentialResolver;
  clock?: Clock;
  logger?: Logger;
}

export interface TimerServerContext {
  app: Express;
  service: TimerService;
  /** Releases every suspended long-poll request without answering it. */
  abortPendingPolls(): void;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const route =
  (handler: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export function extractClientEtag(ifNoneMatch: string | undefined): string | undefined {
  if (!ifNoneMatch) {
    return undefined;
  }
  const candidates = ifNoneMatch
    .split(",")
    .map(token => token.trim())
    .filter(token => token.length > 0 && token !== "*");
  return candidates[0];
}

export function parseWaitFlag(value: unknown): boolean {
  if (value === undefined) {
    return true;
  }
  if (typeof value !== "string") {
    throw new InvalidStateError("wait must be a boolean.");
  }
  switch (value.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new InvalidStateError("wait must be a boolean.");
  }
}

export function parseTimeoutSeconds(value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const seconds = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidStateError("timeout must be a positive number of seconds.");
  }
  return seconds;
}

function tickHeaders(res: Response, snapshot: TickSnapshot): void {
  res.setHeader("ETag", snapshot.etag);
  res.setHeader("Last-Modified", new Date(snapshot.lastModified).toUTCString());
  res.setHeader("Cache-Control", "no-cache");
}

function notModifiedSince(snapshot: TickSnapshot, ifModifiedSince: string | undefined): boolean {
  if (!ifModifiedSince) {
    return false;
  }
  const since = Date.parse(ifModifiedSince);
  if (Number.isNaN(since)) {
    return false;
  }
  return Math.floor(Date.parse(snapshot.lastModified) / 1000) * 1000 <= since;
}

export function createTimerServer(options: TimerServerOptions): TimerServerContext {
  const { config } = options;
  const logger = options.logger ?? createLogger("timers", config.logLevel);
  const clock = options.clock ?? systemClock;
  const records = options.records ?? new TimerStore({ logger: logger.child("store") });
  const shared = options.shared ?? new MemorySharedStore();
  const credentials = options.credentials ?? new StaticTokenResolver(config.apiTokens);
  const ticks = new TickCache(shared, { ttlSeconds: config.tickCacheTtlSeconds, logger: logger.child("ticks") });
  const finisher = new FinishCoordinator(records, shared, ticks, {
    lockTtlSeconds: config.finishLockTtlSeconds,
    logger: logger.child("finish")
  });
  const service = new TimerService({
    records,
    ticks,
    finisher,
    clock,
    logger: logger.child("service"),
    rateLimiter: new RateLimiter(shared, {
      tokens: config.rateLimitTokens,
      periodSeconds: config.rateLimitPeriodSeconds
    }),
    longPollTimeoutSeconds: config.longPollTimeoutSeconds
  });

  const shutdown = new AbortController();

  // Aborts when the client goes away before an answer is written, or on shutdown.
  const requestSignal = (res: Response): AbortSignal => {
    const controller = new AbortController();
    const abort = () => controller.abort();
    shutdown.signal.addEventListener("abort", abort, { once: true });
    res.on("close", () => {
      shutdown.signal.removeEventListener("abort", abort);
      if (!res.writableEnded) {
        controller.abort();
      }
    });
    return controller.signal;
  };

  const authenticate = (req: Request) => credentials.resolveOwner(extractBearer(req.header("authorization")));

  const app = express();
  app.use(express.json({ limit: "64kb" }));
  app.use(
    cors({
      origin: config.corsOrigin,
      exposedHeaders: ["ETag", "Last-Modified"]
    })
  );

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  const timers = express.Router();

  timers.post(
    "/",
    route(async (req, res) => {
      const owner = await authenticate(req);
      res.status(201).json(await service.startTimer(owner, req.body));
    })
  );

  timers.get(
    "/",
    route(async (req, res) => {
      const owner = await authenticate(req);
      res.json(await service.listTimers(owner));
    })
  );

  timers.post(
    "/batch/tick",
    route(async (req, res) => {
      const owner = await authenticate(req);
      const outcome = await service.batchTick(owner, req.body, requestSignal(res));
      if (outcome.kind === "aborted") {
        return;
      }
      const { result } = outcome;
      res.json({
        timers: result.timers.map(toTickResource),
        not_modified: result.notModified,
        errors: result.errors
      });
    })
  );

  timers.get(
    "/:id",
    route(async (req, res) => {
      const owner = await authenticate(req);
      res.json(await service.getTimer(owner, req.params.id));
    })
  );

  timers.post(
    "/:id/cancel",
    route(async (req, res) => {
      const owner = await authenticate(req);
      res.json(await service.cancelTimer(owner, req.params.id));
    })
  );

  timers.get(
    "/:id/tick",
    route(async (req, res) => {
      const owner = await authenticate(req);
      const wait = parseWaitFlag(req.query.wait);
      const timeoutSeconds = parseTimeoutSeconds(req.query.timeout);
      const clientEtag = extractClientEtag(req.header("if-none-match"));

      const outcome = await service.tick(owner, req.params.id, {
        etag: clientEtag,
        wait,
        timeoutSeconds,
        signal: requestSignal(res)
      });
      if (outcome.kind === "aborted") {
        return;
      }

      tickHeaders(res, outcome.snapshot);
      const unchangedSince = !clientEtag && !wait && notModifiedSince(outcome.snapshot, req.header("if-modified-since"));
      if (outcome.kind === "not_modified" || unchangedSince) {
        res.status(304).end();
        return;
      }
      res.status(200).json(toTickResource(outcome.snapshot));
    })
  );

  app.use("/timers", timers);

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof TimerServiceError) {
      res.status(error.status).json({ error: error.code, message: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_state", message: "Request body is not valid JSON." });
      return;
    }
    logger.error("Unhandled request error", { error });
    res.status(500).json({
      error: "internal_error",
      message: "The timer service encountered an unexpected error."
    });
  });

  return {
    app,
    service,
    abortPendingPolls: () => shutdown.abort()
  };
}
