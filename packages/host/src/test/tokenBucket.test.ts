import assert from "node:assert/strict";
import { test } from "node:test";
import { TokenBucket } from "../tokenBucket";

test("a full bucket admits exactly burst requests at one instant", () => {
  const bucket = new TokenBucket(120, 20, 0);

  for (let index = 0; index < 20; index += 1) {
    assert.equal(bucket.tryConsume(0), true);
  }
  assert.equal(bucket.tryConsume(0), false);
});

test("refill after an empty bucket admits one request per 1/rate seconds", () => {
  const bucket = new TokenBucket(120, 20, 0);
  for (let index = 0; index < 20; index += 1) {
    bucket.tryConsume(0);
  }

  assert.equal(bucket.msUntilAvailable(0), 9);
  assert.equal(bucket.tryConsume(9), true);
  assert.equal(bucket.tryConsume(9), false);
});

test("tokens never exceed burst however long the bucket idles", () => {
  const bucket = new TokenBucket(120, 20, 0);
  bucket.tryConsume(0);

  assert.equal(bucket.available(60_000), 20);
  assert.equal(bucket.msUntilAvailable(60_000), 0);
});

test("a clock stepping backwards does not mint tokens", () => {
  const bucket = new TokenBucket(10, 2, 1_000);
  bucket.tryConsume(1_000);
  bucket.tryConsume(1_000);

  assert.equal(bucket.tryConsume(500), false);
  assert.equal(bucket.available(1_000), 0);
  assert.equal(bucket.tryConsume(1_100), true);
});

test("constructor rejects non-positive rate or burst", () => {
  assert.throws(() => new TokenBucket(0, 1, 0), RangeError);
  assert.throws(() => new TokenBucket(1, 0, 0), RangeError);
});
