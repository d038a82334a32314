import { PublicKey } from "@solana/web3.js";

export const USDC_DECIMALS = 6;
export const BPS_DENOMINATOR = 10_000n;

// 1 USDC = 1 ticket (6 decimals)
export const DEFAULT_TICKET_PRICE = 1_000_000n;
export const DEFAULT_REFERRAL_BPS = 500; // 5%
export const DEFAULT_BONUS_SHARE_BPS = 1_000; // 10%
// Awaiting tiers may be reset by the admin after this long without a draw.
export const DEFAULT_RANDOMNESS_TIMEOUT_SEC = 3_600;

// The all-zero key doubles as "no referrer" and as the ledger sentinel's buyer.
export const NULL_IDENTITY = PublicKey.default;

export const TIER_IDS = ["hourly", "monthly", "yearly", "decade"] as const;
export type TierId = (typeof TIER_IDS)[number];

export interface TierConfig {
  id: TierId;
  shareBps: number;
  periodSec: number;
  minimumParticipants: number;
  minimumPot: bigint;
  splitsBps: readonly number[];
}

// ─── Default tier table ─────────────────────────────────────
// Shares: 40% + 20% + 15% + 10% to tiers, 10% bonus pool, 5% house.
export const DEFAULT_TIERS: readonly TierConfig[] = [
  {
    id: "hourly",
    shareBps: 4_000,
    periodSec: 3_600,
    minimumParticipants: 2,
    minimumPot: 1_000_000n,
    splitsBps: [10_000],
  },
  {
    id: "monthly",
    shareBps: 2_000,
    periodSec: 30 * 86_400,
    minimumParticipants: 3,
    minimumPot: 10_000_000n,
    splitsBps: [7_000, 3_000],
  },
  {
    id: "yearly",
    shareBps: 1_500,
    periodSec: 365 * 86_400,
    minimumParticipants: 5,
    minimumPot: 100_000_000n,
    splitsBps: [5_000, 3_000, 2_000],
  },
  {
    id: "decade",
    shareBps: 1_000,
    periodSec: 10 * 365 * 86_400,
    minimumParticipants: 10,
    minimumPot: 1_000_000_000n,
    splitsBps: [6_000, 4_000],
  },
];

// Tier status
export const TierStatus = {
  Accruing: "accruing",
  AwaitingRandomness: "awaitingRandomness",
  Settling: "settling",
} as const;

export type TierStatusName = (typeof TierStatus)[keyof typeof TierStatus];
