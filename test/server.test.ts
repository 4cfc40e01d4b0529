import { test } from "node:test";
import assert from "node:assert/strict";
import { tickResourceSchema, timerResourceSchema } from "../src/client/apiClient.js";
import { extractClientEtag, parseTimeoutSeconds, parseWaitFlag } from "../src/server.js";
import { OTHER_TOKEN, authHeaders, startTestServer } from "./helpers.js";

async function startTimer(baseUrl: string, body: unknown = { duration_seconds: 5, label: "Focus" }) {
  const response = await fetch(`${baseUrl}/timers`, {
    method: "POST",
    headers: authHeaders(undefined, { "Content-Type": "application/json" }),
    body: JSON.stringify(body)
  });
  return response;
}

async function createTimer(baseUrl: string, body?: unknown) {
  const response = await startTimer(baseUrl, body);
  assert.equal(response.status, 201);
  return timerResourceSchema.parse(await response.json());
}

test("health needs no credentials", async t => {
  const { baseUrl } = await startTestServer(t);
  const response = await fetch(`${baseUrl}/health`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { status: "ok" });
});

test("timer routes reject missing and unknown credentials", async t => {
  const { baseUrl } = await startTestServer(t);

  const missing = await fetch(`${baseUrl}/timers`);
  assert.equal(missing.status, 401);
  assert.deepEqual(await missing.json(), { error: "unauthorized", message: "Provide a bearer token." });

  const unknown = await fetch(`${baseUrl}/timers`, { headers: authHeaders("nope") });
  assert.equal(unknown.status, 401);
  assert.deepEqual(await unknown.json(), { error: "unauthorized", message: "Invalid credentials." });
});

test("start, poll conditionally and observe completion", async t => {
  const { baseUrl, clock } = await startTestServer(t);

  const created = await startTimer(baseUrl);
  assert.equal(created.status, 201);
  const timer = timerResourceSchema.parse(await created.json());
  assert.equal(timer.status, "running");
  assert.equal(timer.remaining_seconds, 5);
  assert.equal(timer.duration_seconds, 5);
  assert.equal(timer.completed_at, null);

  const tick = await fetch(`${baseUrl}/timers/${timer.id}/tick?wait=false`, { headers: authHeaders() });
  assert.equal(tick.status, 200);
  const etag = tick.headers.get("etag");
  const body = tickResourceSchema.parse(await tick.json());
  assert.equal(etag, body.etag);
  assert.equal(body.status, "running");
  assert.equal(body.remaining_seconds, 5);
  assert.equal(tick.headers.get("last-modified"), "Sun, 27 Oct 2024 09:00:00 GMT");

  const cached = await fetch(`${baseUrl}/timers/${timer.id}/tick?wait=false`, {
    headers: authHeaders(undefined, { "If-None-Match": body.etag })
  });
  assert.equal(cached.status, 304);
  assert.equal(cached.headers.get("etag"), body.etag);

  clock.advance(6);
  const finished = await fetch(`${baseUrl}/timers/${timer.id}/tick?wait=false`, {
    headers: authHeaders(undefined, { "If-None-Match": body.etag })
  });
  assert.equal(finished.status, 200);
  const finishedBody = tickResourceSchema.parse(await finished.json());
  assert.equal(finishedBody.status, "completed");
  assert.equal(finishedBody.remaining_seconds, 0);
  assert.notEqual(finishedBody.etag, body.etag);
});

test("a waiting poll with the current tag answers 304 after the budget", async t => {
  const { baseUrl } = await startTestServer(t);
  const timer = await createTimer(baseUrl, { duration_seconds: 60 });

  const startedAt = Date.now();
  const response = await fetch(`${baseUrl}/timers/${timer.id}/tick?wait=true`, {
    headers: authHeaders(undefined, { "If-None-Match": timer.etag })
  });
  assert.equal(response.status, 304);
  assert.ok(Date.now() - startedAt >= 150);
});

test("a waiting poll answers 200 when the timer is canceled", async t => {
  const { baseUrl } = await startTestServer(t, { LONG_POLL_TIMEOUT: "5" });
  const timer = await createTimer(baseUrl, { duration_seconds: 60 });

  const pending = fetch(`${baseUrl}/timers/${timer.id}/tick`, {
    headers: authHeaders(undefined, { "If-None-Match": timer.etag })
  });
  await new Promise(resolve => setTimeout(resolve, 30));
  const cancel = await fetch(`${baseUrl}/timers/${timer.id}/cancel`, { method: "POST", headers: authHeaders() });
  assert.equal(cancel.status, 200);

  const response = await pending;
  assert.equal(response.status, 200);
  assert.equal(tickResourceSchema.parse(await response.json()).status, "canceled");
});

test("cancel is idempotent by effect", async t => {
  const { baseUrl } = await startTestServer(t);
  const timer = await createTimer(baseUrl, { duration_seconds: 120 });

  const canceled = await fetch(`${baseUrl}/timers/${timer.id}/cancel`, { method: "POST", headers: authHeaders() });
  const first = timerResourceSchema.parse(await canceled.json());
  const second = await fetch(`${baseUrl}/timers/${timer.id}/cancel`, { method: "POST", headers: authHeaders() });
  assert.equal(second.status, 200);
  assert.deepEqual(await second.json(), first);
  assert.equal(first.status, "canceled");
});

test("other owners get 404 for a timer they do not own", async t => {
  const { baseUrl } = await startTestServer(t);
  const timer = await createTimer(baseUrl);

  const response = await fetch(`${baseUrl}/timers/${timer.id}`, { headers: authHeaders(OTHER_TOKEN) });
  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), { error: "not_found", message: `Timer ${timer.id} not found.` });

  const own = await fetch(`${baseUrl}/timers/${timer.id}`, { headers: authHeaders() });
  assert.equal(own.status, 200);
  assert.equal(timerResourceSchema.parse(await own.json()).id, timer.id);
});

test("list returns every timer of the caller", async t => {
  const { baseUrl, clock } = await startTestServer(t);
  await startTimer(baseUrl, { duration_seconds: 60, label: "A" });
  clock.advance(1);
  await startTimer(baseUrl, { duration_seconds: 60, label: "B" });

  const response = await fetch(`${baseUrl}/timers`, { headers: authHeaders() });
  assert.equal(response.status, 200);
  const timers = timerResourceSchema.array().parse(await response.json());
  assert.deepEqual(
    timers.map(timer => timer.label),
    ["B", "A"]
  );

  const other = await fetch(`${baseUrl}/timers`, { headers: authHeaders(OTHER_TOKEN) });
  assert.deepEqual(await other.json(), []);
});

test("invalid input is a 400 with the invalid_state code", async t => {
  const { baseUrl } = await startTestServer(t);

  const invalid = await startTimer(baseUrl, { duration_seconds: -1 });
  assert.equal(invalid.status, 400);
  assert.deepEqual(await invalid.json(), {
    error: "invalid_state",
    message: "duration_seconds: Number must be greater than 0"
  });

  const malformed = await fetch(`${baseUrl}/timers`, {
    method: "POST",
    headers: authHeaders(undefined, { "Content-Type": "application/json" }),
    body: "{"
  });
  assert.equal(malformed.status, 400);
  assert.deepEqual(await malformed.json(), { error: "invalid_state", message: "Request body is not valid JSON." });

  const timer = await createTimer(baseUrl);
  const badWait = await fetch(`${baseUrl}/timers/${timer.id}/tick?wait=maybe`, { headers: authHeaders() });
  assert.equal(badWait.status, 400);
});

test("batch tick reports changes, unchanged ids and per-id errors", async t => {
  const { baseUrl } = await startTestServer(t);
  const one = await createTimer(baseUrl, { duration_seconds: 300, label: "One" });
  const two = await createTimer(baseUrl, { duration_seconds: 300, label: "Two" });

  const response = await fetch(`${baseUrl}/timers/batch/tick`, {
    method: "POST",
    headers: authHeaders(undefined, { "Content-Type": "application/json" }),
    body: JSON.stringify({
      timers: [{ id: one.id, etag: one.etag }, { id: two.id, etag: 'W/"stale"' }, { id: "missing" }]
    })
  });
  assert.equal(response.status, 200);
  const body = await response.json();
  assert.deepEqual(body, {
    timers: [
      {
        id: two.id,
        label: "Two",
        status: "running",
        ends_at: two.ends_at,
        remaining_seconds: 300,
        etag: two.etag,
        last_modified: two.last_modified
      }
    ],
    not_modified: [one.id],
    errors: [{ id: "missing", error: "not_found", message: "Timer missing not found." }]
  });
});

test("rate limits answer 429", async t => {
  const { baseUrl } = await startTestServer(t, { RATE_LIMIT_TOKENS: "1" });

  assert.equal((await startTimer(baseUrl)).status, 201);
  const limited = await startTimer(baseUrl);
  assert.equal(limited.status, 429);
  assert.deepEqual(await limited.json(), { error: "rate_limited", message: "Rate limit exceeded (1 per 60s)." });
});

test("request helpers parse conditional headers and flags", () => {
  assert.equal(extractClientEtag(undefined), undefined);
  assert.equal(extractClientEtag('W/"a", W/"b"'), 'W/"a"');
  assert.equal(extractClientEtag("*"), undefined);
  assert.equal(parseWaitFlag(undefined), true);
  assert.equal(parseWaitFlag("false"), false);
  assert.equal(parseWaitFlag("1"), true);
  assert.throws(() => parseWaitFlag("maybe"), /wait must be a boolean/);
  assert.equal(parseTimeoutSeconds("2.5"), 2.5);
  assert.equal(parseTimeoutSeconds(undefined), undefined);
  assert.throws(() => parseTimeoutSeconds("-1"), /timeout/);
});
