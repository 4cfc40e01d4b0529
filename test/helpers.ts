import { once } from "node:events";
import type { TestContext } from "node:test";
import type { Clock } from "../src/clock.js";
import { ManualClock } from "../src/clock.js";
import { loadConfig } from "../src/config.js";
import { createTimerServer } from "../src/server.js";
import { FinishCoordinator } from "../src/services/finishCoordinator.js";
import { TimerService } from "../src/services/timerService.js";
import { MemorySharedStore } from "../src/state/sharedStore.js";
import { TickCache } from "../src/state/tickCache.js";
import type { TimerRecordStore } from "../src/state/timerStore.js";
import { TimerStore } from "../src/state/timerStore.js";
import type { Timer } from "../src/types.js";

export const OWNER = "alice";

/** Record store that counts durable `completed` writes. */
export class CountingTimerStore extends TimerStore {
  completedWrites = 0;

  async save(timer: Timer): Promise<Timer> {
    if (timer.status === "completed") {
      this.completedWrites += 1;
    }
    return super.save(timer);
  }
}

export function createHarness<C extends Clock = ManualClock>(
  options: { clock?: C; records?: TimerRecordStore; longPollTimeoutSeconds?: number; lockTtlSeconds?: number } = {}
) {
  const clock = options.clock ?? new ManualClock();
  const records = options.records ?? new TimerStore();
  const shared = new MemorySharedStore(() => clock.now().getTime());
  const ticks = new TickCache(shared, { ttlSeconds: 30 });
  const finisher = new FinishCoordinator(records, shared, ticks, { lockTtlSeconds: options.lockTtlSeconds ?? 5 });
  const service = new TimerService({
    records,
    ticks,
    finisher,
    clock,
    longPollTimeoutSeconds: options.longPollTimeoutSeconds ?? 30
  });
  return { clock, records, shared, ticks, finisher, service };
}

export const TEST_TOKEN = "test-token";
export const OTHER_TOKEN = "other-token";

/** Starts the HTTP app on an ephemeral loopback port, closed when the test ends. */
export async function startTestServer(t: TestContext, env: Record<string, string> = {}) {
  const clock = new ManualClock();
  const config = loadConfig({
    API_TOKENS: `${TEST_TOKEN}:${OWNER},${OTHER_TOKEN}:bob`,
    LOG_LEVEL: "silent",
    LONG_POLL_TIMEOUT: "0.2",
    ...env
  });
  const context = createTimerServer({ config, clock });
  const server = context.app.listen(0, "127.0.0.1");
  await once(server, "listening");

  t.after(() => {
    context.abortPendingPolls();
    server.closeAllConnections();
    server.close();
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port.");
  }
  return { clock, context, baseUrl: `http://127.0.0.1:${address.port}` };
}

export function authHeaders(token = TEST_TOKEN, extra: Record<string, string> = {}): Record<string, string> {
  return { Authorization: `Bearer ${token}`, ...extra };
}
