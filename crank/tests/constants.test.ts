import assert from "node:assert";
import { afterEach, test } from "node:test";
import { envBigInt, envFlag, envInt, loadCrankConfig } from "../src/constants.ts";

const touched = [
  "TEST_CRANK_INT",
  "TEST_CRANK_BIG",
  "TEST_CRANK_FLAG",
  "POLL_INTERVAL_MS",
  "TICKET_PRICE_RAW",
  "AUTO_RESET_STUCK",
  "HEALTH_LOG_INTERVAL_SEC",
  "ACTIONS_PORT",
];

afterEach(() => {
  for (const name of touched) delete process.env[name];
});

test("envInt falls back on unset, blank and non-numeric values but keeps zero", () => {
  assert.equal(envInt("TEST_CRANK_INT", 7), 7);
  process.env.TEST_CRANK_INT = "  ";
  assert.equal(envInt("TEST_CRANK_INT", 7), 7);
  process.env.TEST_CRANK_INT = "abc";
  assert.equal(envInt("TEST_CRANK_INT", 7), 7);
  process.env.TEST_CRANK_INT = "0";
  assert.equal(envInt("TEST_CRANK_INT", 7), 0);
  process.env.TEST_CRANK_INT = "42.9";
  assert.equal(envInt("TEST_CRANK_INT", 7), 42);
});

test("envBigInt accepts only unsigned integers", () => {
  process.env.TEST_CRANK_BIG = "12345678901234567890";
  assert.equal(envBigInt("TEST_CRANK_BIG", 1n), 12_345_678_901_234_567_890n);
  process.env.TEST_CRANK_BIG = "-5";
  assert.equal(envBigInt("TEST_CRANK_BIG", 1n), 1n);
});

test("envFlag is on only for 1", () => {
  process.env.TEST_CRANK_FLAG = "1";
  assert.equal(envFlag("TEST_CRANK_FLAG"), true);
  process.env.TEST_CRANK_FLAG = "true";
  assert.equal(envFlag("TEST_CRANK_FLAG"), false);
});

test("loadCrankConfig reads the environment with engine defaults", () => {
  process.env.POLL_INTERVAL_MS = "500";
  process.env.TICKET_PRICE_RAW = "250000";
  process.env.AUTO_RESET_STUCK = "1";
  process.env.HEALTH_LOG_INTERVAL_SEC = "0";
  process.env.ACTIONS_PORT = "0";

  const config = loadCrankConfig();
  assert.equal(config.pollIntervalMs, 500);
  assert.equal(config.ticketPrice, 250_000n);
  assert.equal(config.autoResetStuck, true);
  assert.equal(config.healthLogIntervalSec, 0);
  assert.equal(config.actionsPort, 0);
});
