import assert from "node:assert";
import { describe, test } from "node:test";
import { calculateBackoff, DEFAULT_BACKOFF_CONFIG, sleep } from "../../../src/utils/timing.util";

describe("calculateBackoff", () => {
  const noJitter = () => 0;

  test("doubles per attempt", () => {
    assert.strictEqual(calculateBackoff(0, DEFAULT_BACKOFF_CONFIG, noJitter), 1000);
    assert.strictEqual(calculateBackoff(1, DEFAULT_BACKOFF_CONFIG, noJitter), 2000);
    assert.strictEqual(calculateBackoff(3, DEFAULT_BACKOFF_CONFIG, noJitter), 8000);
  });

  test("caps at the maximum", () => {
    assert.strictEqual(calculateBackoff(10, DEFAULT_BACKOFF_CONFIG, noJitter), 30_000);
  });

  test("adds proportional jitter", () => {
    assert.strictEqual(calculateBackoff(0, DEFAULT_BACKOFF_CONFIG, () => 0.5), 1150);
  });
});

describe("sleep", () => {
  test("resolves after the delay", async () => {
    const started = Date.now();
    await sleep(20);
    assert.ok(Date.now() - started >= 15);
  });

  test("resolves at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    assert.ok(Date.now() - started < 1000);
  });

  test("resolves early when aborted mid-wait", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);
    await sleep(10_000, controller.signal);
    assert.ok(Date.now() - started < 5000);
  });
});
