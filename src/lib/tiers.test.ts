import { describe, expect, test } from "vitest";
import { TierStatus, type TierConfig } from "./constants";
import {
  activeTicketWindow,
  checkEligibility,
  createTierState,
  currentPot,
  describeShortfall,
  isDue,
  toTierSnapshot,
} from "./tiers";

const CONFIG: TierConfig = {
  id: "monthly",
  shareBps: 2_000,
  periodSec: 100,
  minimumParticipants: 2,
  minimumPot: 50n,
  splitsBps: [7_000, 3_000],
};

describe("tier accrual", () => {
  test("pot is the share of all deposits minus what was paid", () => {
    const tier = createTierState(CONFIG, 0);
    expect(currentPot(tier, 1_000n)).toBe(200n);
    tier.potPaidToDate = 200n;
    expect(currentPot(tier, 1_000n)).toBe(0n);
    expect(currentPot(tier, 1_555n)).toBe(111n);
  });

  test("pot below zero is an invariant violation", () => {
    const tier = createTierState(CONFIG, 0);
    tier.potPaidToDate = 500n;
    expect(() => currentPot(tier, 1_000n)).toThrow(/pot underflow/);
  });

  test("active window starts after ticketsUsed", () => {
    const tier = createTierState(CONFIG, 0);
    tier.ticketsUsed = 30n;
    expect(activeTicketWindow(tier, 45n)).toEqual({ from: 30n, to: 45n, size: 15n });
  });

  test("isDue compares against lastSettledAt + periodSec", () => {
    const tier = createTierState(CONFIG, 1_000);
    expect(isDue(tier, 1_099)).toBe(false);
    expect(isDue(tier, 1_100)).toBe(true);
  });

  test("eligibility reports the first failing threshold", () => {
    const tier = createTierState(CONFIG, 0);
    const totals = { totalTickets: 10n, totalDeposited: 1_000n };

    tier.windowParticipants = 1;
    expect(checkEligibility(tier, totals)).toEqual({ kind: "participants", have: 1, need: 2 });

    tier.windowParticipants = 2;
    expect(checkEligibility(tier, { totalTickets: 10n, totalDeposited: 200n })).toEqual({
      kind: "pot",
      have: 40n,
      need: 50n,
    });

    tier.ticketsUsed = 10n;
    expect(checkEligibility(tier, totals)).toEqual({ kind: "tickets" });

    tier.ticketsUsed = 0n;
    expect(checkEligibility(tier, totals)).toBeNull();
  });

  test("describeShortfall names the tier and the gap", () => {
    expect(describeShortfall("hourly", { kind: "participants", have: 1, need: 3 })).toBe(
      "hourly: 1 participant(s), need 3"
    );
    expect(describeShortfall("yearly", { kind: "pot", have: 5n, need: 9n })).toBe("yearly: pot 5, need 9");
  });

  test("rejects split tables that do not cover the whole pot", () => {
    expect(() => createTierState({ ...CONFIG, splitsBps: [7_000] }, 0)).toThrow(/sum to 10000/);
  });

  test("snapshot reports pot, window and schedule", () => {
    const tier = createTierState(CONFIG, 500);
    tier.windowParticipants = 4;
    tier.ticketsUsed = 3n;
    const snap = toTierSnapshot(tier, { totalTickets: 8n, totalDeposited: 2_000n });
    expect(snap).toMatchObject({
      id: "monthly",
      status: TierStatus.Accruing,
      pot: 400n,
      activeTickets: 5n,
      windowParticipants: 4,
      nextDueAt: 600,
      roundNumber: 0,
      pendingToken: null,
    });
  });
});
