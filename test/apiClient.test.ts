import { test } from "node:test";
import assert from "node:assert/strict";
import { ApiError, TimerApiClient } from "../src/client/apiClient.js";
import { TEST_TOKEN, startTestServer } from "./helpers.js";

test("the client drives the timer endpoints end to end", async t => {
  const { baseUrl } = await startTestServer(t);
  const client = new TimerApiClient({ baseUrl: `${baseUrl}/`, token: TEST_TOKEN });

  const started = await client.startTimer(90, "Tea");
  assert.equal(started.status, "running");
  assert.equal(started.label, "Tea");
  assert.equal(started.remaining_seconds, 90);

  const listed = await client.listTimers();
  assert.deepEqual(
    listed.map(timer => timer.id),
    [started.id]
  );

  assert.equal(await client.longPollTimer(started.id, started.etag, undefined, { wait: false }), null);

  const fresh = await client.longPollTimer(started.id, undefined, undefined, { wait: false });
  assert.equal(fresh?.etag, started.etag);

  const batch = await client.batchTick([{ id: started.id, etag: started.etag }, { id: "missing" }]);
  assert.deepEqual(batch, {
    timers: [],
    not_modified: [started.id],
    errors: [{ id: "missing", error: "not_found", message: "Timer missing not found." }]
  });

  const canceled = await client.cancelTimer(started.id);
  assert.equal(canceled.status, "canceled");
  assert.equal((await client.getTimer(started.id)).etag, canceled.etag);
});

test("the client surfaces error bodies as ApiError", async t => {
  const { baseUrl } = await startTestServer(t);
  const client = new TimerApiClient({ baseUrl, token: TEST_TOKEN });

  await assert.rejects(client.getTimer("missing"), (error: unknown) => {
    assert.ok(error instanceof ApiError);
    assert.equal(error.status, 404);
    assert.equal(error.code, "not_found");
    assert.equal(error.message, "Timer missing not found.");
    return true;
  });

  const stranger = new TimerApiClient({ baseUrl, token: "wrong-token" });
  await assert.rejects(stranger.listTimers(), { name: "ApiError", code: "unauthorized", status: 401 });
});

test("a response without a JSON body becomes an http_error", async () => {
  const client = new TimerApiClient({
    baseUrl: "http://timers.invalid",
    token: TEST_TOKEN,
    fetch: async () => new Response("upstream down", { status: 502, statusText: "Bad Gateway" })
  });

  await assert.rejects(client.longPollTimer("t1"), { name: "ApiError", code: "http_error", status: 502, message: "Bad Gateway" });
});
