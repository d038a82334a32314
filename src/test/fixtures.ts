import { PublicKey } from "@solana/web3.js";
import type { TierConfig } from "../lib/constants";
import { Jackpot, type JackpotOptions } from "../lib/jackpot";
import type { DrawRequest, RandomnessSource } from "../lib/randomness";
import { InMemoryValueLedger } from "../lib/valueLedger";

/** Deterministic test key: 32 bytes of `n`. */
export function key(n: number): PublicKey {
  return new PublicKey(new Uint8Array(32).fill(n));
}

export const ADMIN = key(200);
export const VAULT = key(201);
export const HOUSE = key(202);

/**
 * Randomness source whose draws the test chooses. Accepts any draw whose
 * proof is `proof:<token>` while `accept` is true.
 */
export class ScriptedRandomness implements RandomnessSource {
  readonly requests: DrawRequest[] = [];
  accept = true;

  requestDraw(rangeUpperBound: bigint, token: string): void {
    this.requests.push({ token, rangeUpperBound });
  }

  verify(token: string, _drawValue: bigint, proof: string): boolean {
    return this.accept && proof === this.proofFor(token);
  }

  proofFor(token: string): string {
    return `proof:${token}`;
  }

  lastRequest(): DrawRequest {
    const last = this.requests[this.requests.length - 1];
    if (!last) throw new Error("no randomness request recorded");
    return last;
  }
}

// 100 raw units per ticket; hourly takes 50%, monthly 30%, bonus 10%, house 10%.
export const TEST_TICKET_PRICE = 100n;

export const TEST_TIERS: readonly TierConfig[] = [
  {
    id: "hourly",
    shareBps: 5_000,
    periodSec: 3_600,
    minimumParticipants: 3,
    minimumPot: 100n,
    splitsBps: [10_000],
  },
  {
    id: "monthly",
    shareBps: 3_000,
    periodSec: 30 * 86_400,
    minimumParticipants: 2,
    minimumPot: 0n,
    splitsBps: [7_000, 3_000],
  },
];

export function createTestJackpot(overrides: Partial<JackpotOptions> = {}) {
  const valueLedger = new InMemoryValueLedger();
  const randomness = new ScriptedRandomness();
  const logs: string[] = [];
  const jackpot = new Jackpot({
    admin: ADMIN,
    vault: VAULT,
    valueLedger,
    randomness,
    ticketPrice: TEST_TICKET_PRICE,
    referralBps: 500,
    bonusShareBps: 1_000,
    tiers: TEST_TIERS,
    randomnessTimeoutSec: 600,
    nowSec: 0,
    log: (msg) => logs.push(msg),
    ...overrides,
  });
  return { jackpot, valueLedger, randomness, logs };
}

/** Mint `amount` to `player` and approve the vault to pull it. */
export function fund(ledger: InMemoryValueLedger, player: PublicKey, amount: bigint): void {
  ledger.mint(player, amount);
  ledger.approve(player, VAULT, ledger.allowance(player, VAULT) + amount);
}
