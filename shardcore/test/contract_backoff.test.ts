// shardcore/test/contract_backoff.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { Backoff } from "../gateway/Backoff";

test("[backoff] delays double from the minimum and stop at the cap", () => {
  const backoff = new Backoff({ minMs: 1_000, maxMs: 5_000 }, () => 0);

  assert.deepEqual(
    [backoff.next(), backoff.next(), backoff.next(), backoff.next(), backoff.next()],
    [1_000, 2_000, 4_000, 5_000, 5_000],
  );
  assert.equal(backoff.attempts, 5);
});

test("[backoff] jitter adds up to 30% and never passes the cap", () => {
  const backoff = new Backoff({ minMs: 1_000, maxMs: 2_500 }, () => 1);

  assert.equal(backoff.next(), 1_300);
  assert.equal(backoff.next(), 2_500);
});

test("[backoff] reset starts over from the minimum", () => {
  const backoff = new Backoff({ minMs: 100, maxMs: 10_000 }, () => 0);
  backoff.next();
  backoff.next();

  backoff.reset();
  assert.equal(backoff.attempts, 0);
  assert.equal(backoff.next(), 100);
});

test("[backoff] an inverted range is rejected", () => {
  assert.throws(() => new Backoff({ minMs: 10, maxMs: 5 }), RangeError);
});
