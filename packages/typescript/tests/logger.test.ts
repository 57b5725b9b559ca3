import test from "node:test";
import assert from "node:assert/strict";

import { resolveLevel, runId } from "../src/logger.ts";

test("a known LOG_LEVEL is used as given", () => {
  assert.equal(resolveLevel({ LOG_LEVEL: "warn" }), "warn");
  assert.equal(resolveLevel({ LOG_LEVEL: " WARN " }), "warn");
  assert.equal(resolveLevel({ LOG_LEVEL: "silent", NODE_ENV: "production" }), "silent");
});

test("an unknown LOG_LEVEL falls back to the environment default", () => {
  assert.equal(resolveLevel({ LOG_LEVEL: "verbose", NODE_ENV: "test" }), "silent");
  assert.equal(resolveLevel({ LOG_LEVEL: "verbose", NODE_ENV: "production" }), "info");
  assert.equal(resolveLevel({ LOG_LEVEL: "constructor" }), "debug");
});

test("default level without LOG_LEVEL", () => {
  assert.equal(resolveLevel({ NODE_ENV: "test" }), "silent");
  assert.equal(resolveLevel({ NODE_ENV: "production" }), "info");
  assert.equal(resolveLevel({}), "debug");
});

test("run id is a local timestamp", () => {
  assert.equal(runId(new Date(2024, 0, 2, 3, 4, 5)), "20240102_030405");
});
