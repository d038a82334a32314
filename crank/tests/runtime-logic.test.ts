import assert from "node:assert";
import { test } from "node:test";
import { TierStatus } from "../../src/lib/constants.ts";
import {
  buildRetryScheduleUpdate,
  classifyDrawFailure,
  computeRetryDelay,
  getStuckThresholdSec,
  isThresholdNotMetMessage,
  shouldAutoReset,
  shouldEmitStuckWarning,
} from "../src/runtimeLogic.ts";

test("isThresholdNotMetMessage matches the code name and number", () => {
  assert.equal(
    isThresholdNotMetMessage("ThresholdNotMet (6003): hourly: 1 participant(s), need 3"),
    true
  );
  assert.equal(isThresholdNotMetMessage('{"err":{"Custom":6003}}'), true);
  assert.equal(isThresholdNotMetMessage("TransferFailed (6002): deposit refused"), false);
  assert.equal(isThresholdNotMetMessage("round 60030 missing"), false);
});

test("classifyDrawFailure separates stale tokens, fatal errors and retryable failures", () => {
  assert.deepEqual(
    classifyDrawFailure("UnrecognizedCorrelationToken (6005): no outstanding request for token ab…", false),
    { kind: "stale" }
  );
  assert.deepEqual(
    classifyDrawFailure("NoValidWinner (6007): window is empty", true),
    { kind: "fatal", message: "NoValidWinner (6007): window is empty" }
  );
  assert.deepEqual(
    classifyDrawFailure("TransferFailed (6002): hourly split #0 prize of 150 refused", false),
    { kind: "retry", message: "TransferFailed (6002): hourly split #0 prize of 150 refused" }
  );
});

test("computeRetryDelay doubles and caps", () => {
  assert.equal(computeRetryDelay({ currentDelaySec: 5, minDelaySec: 5, maxDelaySec: 60 }), 10);
  assert.equal(computeRetryDelay({ currentDelaySec: 40, minDelaySec: 5, maxDelaySec: 60 }), 60);
  assert.equal(computeRetryDelay({ currentDelaySec: 1, minDelaySec: 5, maxDelaySec: 60 }), 5);
  assert.equal(computeRetryDelay({ minDelaySec: 5, maxDelaySec: 60 }), 10);
});

test("buildRetryScheduleUpdate computes delay, next attempt timestamp, retry count and reason", () => {
  assert.deepEqual(
    buildRetryScheduleUpdate({
      nowSec: 1_000,
      reason: "TransferFailed (6002): refused",
      minDelaySec: 5,
      maxDelaySec: 60,
      currentDelaySec: 5,
      retryCount: 3,
    }),
    {
      nextDelaySec: 10,
      nextAttemptAtSec: 1_010,
      nextRetryCount: 4,
      lastReason: "TransferFailed (6002): refused",
    }
  );
});

test("repeated retries back off 10, 20, 40, 60, 60", () => {
  let currentDelaySec = 5;
  let retryCount = 0;
  let nowSec = 0;
  const delays: number[] = [];

  for (let i = 0; i < 5; i++) {
    const step = buildRetryScheduleUpdate({
      nowSec,
      reason: "InsufficientBalance (6001): vault short",
      minDelaySec: 5,
      maxDelaySec: 60,
      currentDelaySec,
      retryCount,
    });
    delays.push(step.nextDelaySec);
    currentDelaySec = step.nextDelaySec;
    retryCount = step.nextRetryCount;
    nowSec = step.nextAttemptAtSec;
  }

  assert.deepEqual(delays, [10, 20, 40, 60, 60]);
  assert.equal(retryCount, 5);
  assert.equal(nowSec, 190);
});

test("getStuckThresholdSec only applies to tiers awaiting randomness", () => {
  const thresholds = { awaitingRandomnessSec: 180 };
  assert.equal(getStuckThresholdSec(TierStatus.AwaitingRandomness, thresholds), 180);
  assert.equal(getStuckThresholdSec(TierStatus.Accruing, thresholds), null);
  assert.equal(getStuckThresholdSec(TierStatus.Settling, thresholds), null);
});

test("shouldEmitStuckWarning respects threshold and repeat throttle", () => {
  const base = {
    observedStatus: TierStatus.AwaitingRandomness,
    targetStatus: TierStatus.AwaitingRandomness,
    observedSinceSec: 900,
    thresholdSec: 180,
    repeatSec: 60,
  };

  assert.equal(shouldEmitStuckWarning({ ...base, nowSec: 1_000 }), false, "age below threshold");
  assert.equal(shouldEmitStuckWarning({ ...base, nowSec: 1_100 }), true, "age above threshold, no prior warning");
  assert.equal(shouldEmitStuckWarning({ ...base, nowSec: 1_100, lastWarnSec: 1_050 }), false, "throttled");
  assert.equal(
    shouldEmitStuckWarning({ ...base, nowSec: 1_130, observedStatus: TierStatus.Accruing }),
    false,
    "status mismatch"
  );
  assert.equal(shouldEmitStuckWarning({ ...base, nowSec: 1_130, thresholdSec: null }), false, "no threshold");
});

test("shouldAutoReset needs the flag and an expired request", () => {
  assert.equal(shouldAutoReset({ enabled: true, nowSec: 4_200, requestedAtSec: 3_600, timeoutSec: 600 }), true);
  assert.equal(shouldAutoReset({ enabled: true, nowSec: 4_199, requestedAtSec: 3_600, timeoutSec: 600 }), false);
  assert.equal(shouldAutoReset({ enabled: false, nowSec: 9_999, requestedAtSec: 3_600, timeoutSec: 600 }), false);
});
