import { TierStatus, type TierStatusName } from "../../src/index.js";

export type StuckThresholds = {
  awaitingRandomnessSec: number;
};

export type RetryScheduleInput = {
  nowSec: number;
  reason: string;
  minDelaySec: number;
  maxDelaySec: number;
  currentDelaySec?: number;
  retryCount?: number;
};

export type RetryScheduleUpdate = {
  nextDelaySec: number;
  nextAttemptAtSec: number;
  nextRetryCount: number;
  lastReason: string;
};

export type DrawFailure =
  | { kind: "stale" }
  | { kind: "fatal"; message: string }
  | { kind: "retry"; message: string };

export function isThresholdNotMetMessage(message: string): boolean {
  return message.includes("ThresholdNotMet") || /\b6003\b/.test(message);
}

/**
 * Sort a failed `onDrawReceived` into: a token the engine no longer knows
 * (reset or already settled), a ledger invariant violation, or a transient
 * payout failure worth retrying with the same draw.
 */
export function classifyDrawFailure(message: string, fatal: boolean): DrawFailure {
  if (message.includes("UnrecognizedCorrelationToken") || /\b6005\b/.test(message)) {
    return { kind: "stale" };
  }
  if (fatal || message.includes("NoValidWinner") || /\b6007\b/.test(message)) {
    return { kind: "fatal", message };
  }
  return { kind: "retry", message };
}

export function computeRetryDelay(args: {
  currentDelaySec?: number;
  minDelaySec: number;
  maxDelaySec: number;
}): number {
  const currentDelaySec = args.currentDelaySec ?? args.minDelaySec;
  return Math.min(args.maxDelaySec, Math.max(args.minDelaySec, currentDelaySec * 2));
}

export function buildRetryScheduleUpdate(args: RetryScheduleInput): RetryScheduleUpdate {
  const nextDelaySec = computeRetryDelay({
    currentDelaySec: args.currentDelaySec ?? args.minDelaySec,
    minDelaySec: args.minDelaySec,
    maxDelaySec: args.maxDelaySec,
  });

  return {
    nextDelaySec,
    nextAttemptAtSec: args.nowSec + nextDelaySec,
    nextRetryCount: (args.retryCount ?? 0) + 1,
    lastReason: args.reason,
  };
}

export function getStuckThresholdSec(
  status: TierStatusName,
  thresholds: StuckThresholds
): number | null {
  switch (status) {
    case TierStatus.AwaitingRandomness:
      return thresholds.awaitingRandomnessSec;
    default:
      return null;
  }
}

export function shouldEmitStuckWarning(args: {
  nowSec: number;
  observedStatus: TierStatusName;
  targetStatus: TierStatusName;
  observedSinceSec: number;
  thresholdSec: number | null;
  lastWarnSec?: number;
  repeatSec: number;
}): boolean {
  if (args.thresholdSec == null || args.thresholdSec <= 0) {
    return false;
  }

  if (args.observedStatus !== args.targetStatus) {
    return false;
  }

  const ageSec = args.nowSec - args.observedSinceSec;
  if (ageSec < args.thresholdSec) {
    return false;
  }

  const lastWarnSec = args.lastWarnSec ?? 0;
  return args.nowSec - lastWarnSec >= args.repeatSec;
}

export function shouldAutoReset(args: {
  enabled: boolean;
  nowSec: number;
  requestedAtSec: number;
  timeoutSec: number;
}): boolean {
  return args.enabled && args.nowSec - args.requestedAtSec >= args.timeoutSec;
}
