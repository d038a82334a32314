/**
 * Crank configuration from the environment. `dotenv/config` is loaded by the
 * entry point before this module is evaluated.
 */
import { DEFAULT_RANDOMNESS_TIMEOUT_SEC, DEFAULT_REFERRAL_BPS, DEFAULT_TICKET_PRICE } from "../../src/index.js";

/** Integer env var; unset, blank or non-numeric values fall back. Zero is kept. */
export function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

export function envFlag(name: string): boolean {
  return process.env[name] === "1";
}

export function envBigInt(name: string, fallback: bigint): bigint {
  const raw = process.env[name]?.trim();
  if (!raw || !/^\d+$/.test(raw)) return fallback;
  return BigInt(raw);
}

export interface CrankConfig {
  pollIntervalMs: number;
  ticketPrice: bigint;
  referralBps: number;
  randomnessDelayMs: number;
  randomnessTimeoutSec: number;
  stuckAwaitingSec: number;
  stuckWarnRepeatSec: number;
  healthLogIntervalSec: number;
  retryBackoffMinSec: number;
  retryBackoffMaxSec: number;
  autoResetStuck: boolean;
  /** Port for the actions HTTP server; 0 disables it. */
  actionsPort: number;
}

export function loadCrankConfig(): CrankConfig {
  return {
    pollIntervalMs: envInt("POLL_INTERVAL_MS", 3000),
    ticketPrice: envBigInt("TICKET_PRICE_RAW", DEFAULT_TICKET_PRICE),
    referralBps: envInt("REFERRAL_BPS", DEFAULT_REFERRAL_BPS),
    randomnessDelayMs: envInt("RANDOMNESS_DELAY_MS", 2000),
    randomnessTimeoutSec: envInt("RANDOMNESS_TIMEOUT_SEC", DEFAULT_RANDOMNESS_TIMEOUT_SEC),
    stuckAwaitingSec: envInt("STUCK_AWAITING_SEC", 180),
    stuckWarnRepeatSec: envInt("STUCK_WARN_REPEAT_SEC", 60),
    healthLogIntervalSec: envInt("HEALTH_LOG_INTERVAL_SEC", 60),
    retryBackoffMinSec: envInt("RETRY_BACKOFF_MIN_SEC", 5),
    retryBackoffMaxSec: envInt("RETRY_BACKOFF_MAX_SEC", 60),
    autoResetStuck: envFlag("AUTO_RESET_STUCK"),
    actionsPort: envInt("ACTIONS_PORT", 8787),
  };
}
