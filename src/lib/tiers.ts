import { TierStatus, type TierConfig, type TierId, type TierStatusName } from "./constants";
import { assertBps, assertBpsTable, bpsOf } from "./math";
import { JackpotError } from "./errors";

/** Window and pot frozen when randomness was requested. */
export interface PendingDraw {
  token: string;
  requestedAt: number;
  rangeUpperBound: bigint;
  ticketsAtRequest: bigint;
  entriesAtRequest: number;
  potAtRequest: bigint;
}

export interface TierState {
  id: TierId;
  shareBps: number;
  periodSec: number;
  minimumParticipants: number;
  minimumPot: bigint;
  splitsBps: readonly number[];
  status: TierStatusName;
  potPaidToDate: bigint;
  ticketsUsed: bigint;
  entriesUsed: number;
  lastSettledAt: number;
  roundNumber: number;
  /** Distinct buyers with at least one entry after `entriesUsed`. */
  windowParticipants: number;
  pending: PendingDraw | null;
}

export interface TierSnapshot {
  id: TierId;
  status: TierStatusName;
  shareBps: number;
  pot: bigint;
  potPaidToDate: bigint;
  ticketsUsed: bigint;
  entriesUsed: number;
  activeTickets: bigint;
  windowParticipants: number;
  lastSettledAt: number;
  nextDueAt: number;
  roundNumber: number;
  pendingToken: string | null;
}

export type EligibilityShortfall =
  | { kind: "participants"; have: number; need: number }
  | { kind: "pot"; have: bigint; need: bigint }
  | { kind: "tickets" };

export function createTierState(config: TierConfig, nowSec: number): TierState {
  assertBps(config.shareBps, `${config.id}.shareBps`);
  assertBpsTable(config.splitsBps, `${config.id}.splitsBps`);
  if (!Number.isInteger(config.minimumParticipants) || config.minimumParticipants < 0) {
    throw new JackpotError("InvalidInput", `${config.id}.minimumParticipants must be a non-negative integer`);
  }
  if (config.minimumPot < 0n) {
    throw new JackpotError("InvalidInput", `${config.id}.minimumPot must be non-negative`);
  }

  return {
    id: config.id,
    shareBps: config.shareBps,
    periodSec: config.periodSec,
    minimumParticipants: config.minimumParticipants,
    minimumPot: config.minimumPot,
    splitsBps: [...config.splitsBps],
    status: TierStatus.Accruing,
    potPaidToDate: 0n,
    ticketsUsed: 0n,
    entriesUsed: 0,
    lastSettledAt: nowSec,
    roundNumber: 0,
    windowParticipants: 0,
    pending: null,
  };
}

/** Pot = this tier's share of everything ever deposited, minus what it has already paid. */
export function currentPot(tier: TierState, globalTotalDeposited: bigint): bigint {
  const pot = bpsOf(globalTotalDeposited, tier.shareBps) - tier.potPaidToDate;
  if (pot < 0n) {
    throw new Error(`Tier ${tier.id} pot underflow: paid ${tier.potPaidToDate} of ${globalTotalDeposited}`);
  }
  return pot;
}

/** Ticket numbers `(from, to]` not yet consumed by a settlement of this tier. */
export function activeTicketWindow(
  tier: TierState,
  globalTotalTickets: bigint
): { from: bigint; to: bigint; size: bigint } {
  return {
    from: tier.ticketsUsed,
    to: globalTotalTickets,
    size: globalTotalTickets - tier.ticketsUsed,
  };
}

export function isDue(tier: TierState, nowSec: number): boolean {
  return nowSec >= tier.lastSettledAt + tier.periodSec;
}

export function checkEligibility(
  tier: TierState,
  totals: { totalTickets: bigint; totalDeposited: bigint }
): EligibilityShortfall | null {
  if (tier.windowParticipants < tier.minimumParticipants) {
    return { kind: "participants", have: tier.windowParticipants, need: tier.minimumParticipants };
  }
  const pot = currentPot(tier, totals.totalDeposited);
  if (pot < tier.minimumPot) {
    return { kind: "pot", have: pot, need: tier.minimumPot };
  }
  if (activeTicketWindow(tier, totals.totalTickets).size <= 0n) {
    return { kind: "tickets" };
  }
  return null;
}

export function describeShortfall(tierId: TierId, shortfall: EligibilityShortfall): string {
  switch (shortfall.kind) {
    case "participants":
      return `${tierId}: ${shortfall.have} participant(s), need ${shortfall.need}`;
    case "pot":
      return `${tierId}: pot ${shortfall.have}, need ${shortfall.need}`;
    case "tickets":
      return `${tierId}: no unsettled tickets`;
  }
}

export function toTierSnapshot(
  tier: TierState,
  totals: { totalTickets: bigint; totalDeposited: bigint }
): TierSnapshot {
  return {
    id: tier.id,
    status: tier.status,
    shareBps: tier.shareBps,
    pot: currentPot(tier, totals.totalDeposited),
    potPaidToDate: tier.potPaidToDate,
    ticketsUsed: tier.ticketsUsed,
    entriesUsed: tier.entriesUsed,
    activeTickets: activeTicketWindow(tier, totals.totalTickets).size,
    windowParticipants: tier.windowParticipants,
    lastSettledAt: tier.lastSettledAt,
    nextDueAt: tier.lastSettledAt + tier.periodSec,
    roundNumber: tier.roundNumber,
    pendingToken: tier.pending?.token ?? null,
  };
}
