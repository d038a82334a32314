/**
 * Per-tier settlement cycle:
 *
 *   accruing ──request()──▶ awaitingRandomness ──receive()──▶ settling ──▶ accruing
 *
 * `request` freezes the active window and pot and hands the randomness
 * source a correlation token. `receive` is the inbound half of that round
 * trip: it checks the token and proof, draws one winner per split, pays
 * through the host, then advances the tier's watermarks to the frozen
 * window. Deposits made while a tier is awaiting fall into its next round.
 *
 * A tier in `awaitingRandomness` refuses a second request; that state is the
 * guard against double-counting a window or double-spending a pot.
 */
import type { PublicKey } from "@solana/web3.js";
import { TierStatus, type TierId } from "./constants";
import { JackpotError } from "./errors";
import type { EntryLedger } from "./ledger";
import { referralCut, splitByBps } from "./math";
import { correlationToken, deriveSplitDraw, type RandomnessSource } from "./randomness";
import { selectWinner } from "./selector";
import {
  activeTicketWindow,
  checkEligibility,
  currentPot,
  describeShortfall,
  type PendingDraw,
  type TierState,
} from "./tiers";

export type Totals = { totalTickets: bigint; totalDeposited: bigint };

export interface SplitPayout {
  splitIndex: number;
  splitBps: number;
  drawValue: bigint;
  winningTicket: bigint;
  entryIndex: number;
  winner: PublicKey;
  referrer: PublicKey | null;
  amount: bigint;
  winnerAmount: bigint;
  referrerAmount: bigint;
}

export interface SettlementRecord {
  tierId: TierId;
  roundNumber: number;
  token: string;
  drawValue: bigint;
  proof: string;
  pot: bigint;
  ticketsFrom: bigint;
  ticketsTo: bigint;
  entriesFrom: number;
  entriesTo: number;
  requestedAt: number;
  settledAt: number;
  payouts: SplitPayout[];
}

export interface PendingRequestView extends PendingDraw {
  tierId: TierId;
}

/** What the state machine needs from the registry that owns it. */
export interface RoundHost {
  readonly ledger: EntryLedger;
  totals(): Totals;
  randomness(): RandomnessSource;
  referralBps(): number;
  /** Transfer every payout or none of them; throws on failure. */
  pay(tierId: TierId, payouts: readonly SplitPayout[]): void;
  log(msg: string): void;
}

/**
 * Pure payout plan: one independent draw per split from the same frozen
 * window, so one participant can win several splits.
 */
export function planPayouts(args: {
  ledger: EntryLedger;
  tier: TierState;
  pending: PendingDraw;
  drawValue: bigint;
  referralBps: number;
}): SplitPayout[] {
  const { ledger, tier, pending, drawValue, referralBps } = args;
  const amounts = splitByBps(pending.potAtRequest, tier.splitsBps);
  const base = ledger.at(tier.entriesUsed).cumulativeTicketNumber;

  return amounts.map((amount, splitIndex) => {
    const splitDraw = deriveSplitDraw(drawValue, pending.token, splitIndex, pending.rangeUpperBound);
    const entry = selectWinner(ledger, tier.entriesUsed, splitDraw, pending.entriesAtRequest);
    const { winnerAmount, referrerAmount } = referralCut(amount, referralBps, entry.referrer != null);
    return {
      splitIndex,
      splitBps: tier.splitsBps[splitIndex],
      drawValue: splitDraw,
      winningTicket: base + splitDraw + 1n,
      entryIndex: entry.index,
      winner: entry.buyer,
      referrer: entry.referrer,
      amount,
      winnerAmount,
      referrerAmount,
    };
  });
}

export class RoundStateMachine {
  private readonly pendingByToken = new Map<string, TierState>();
  private requestNonce = 0;

  constructor(private readonly host: RoundHost) {}

  request(tier: TierState, nowSec: number): PendingDraw {
    if (tier.status !== TierStatus.Accruing) {
      throw new JackpotError(
        "AlreadyAwaitingRandomness",
        `${tier.id} already has request ${tier.pending?.token.slice(0, 12) ?? "?"}… outstanding`
      );
    }

    const totals = this.host.totals();
    const shortfall = checkEligibility(tier, totals);
    if (shortfall) {
      throw new JackpotError("ThresholdNotMet", describeShortfall(tier.id, shortfall));
    }

    const window = activeTicketWindow(tier, totals.totalTickets);
    const pending: PendingDraw = {
      token: correlationToken(tier.id, tier.roundNumber, this.requestNonce++),
      requestedAt: nowSec,
      rangeUpperBound: window.size,
      ticketsAtRequest: window.to,
      entriesAtRequest: this.host.ledger.length() - 1,
      potAtRequest: currentPot(tier, totals.totalDeposited),
    };

    tier.pending = pending;
    tier.status = TierStatus.AwaitingRandomness;
    this.pendingByToken.set(pending.token, tier);

    try {
      this.host.randomness().requestDraw(pending.rangeUpperBound, pending.token);
    } catch (e) {
      this.forget(tier);
      throw e;
    }

    this.host.log(
      `${tier.id} round #${tier.roundNumber + 1}: randomness requested ` +
      `(tickets=${pending.rangeUpperBound} pot=${pending.potAtRequest} token=${pending.token.slice(0, 12)}…)`
    );
    return pending;
  }

  receive(token: string, drawValue: bigint, proof: string, nowSec: number): SettlementRecord {
    const tier = this.pendingByToken.get(token);
    const pending = tier?.pending;
    if (!tier || !pending || pending.token !== token || tier.status !== TierStatus.AwaitingRandomness) {
      throw new JackpotError("UnrecognizedCorrelationToken", `no outstanding request for token ${token.slice(0, 12)}…`);
    }

    if (!this.host.randomness().verify(token, drawValue, proof, pending.rangeUpperBound)) {
      throw new JackpotError("ProofVerificationFailed", `${tier.id}: proof rejected for token ${token.slice(0, 12)}…`);
    }
    if (drawValue < 0n || drawValue >= pending.rangeUpperBound) {
      throw new JackpotError("InvalidInput", `${tier.id}: draw ${drawValue} outside [0, ${pending.rangeUpperBound})`);
    }

    tier.status = TierStatus.Settling;
    let payouts: SplitPayout[];
    try {
      payouts = planPayouts({
        ledger: this.host.ledger,
        tier,
        pending,
        drawValue,
        referralBps: this.host.referralBps(),
      });
      this.host.pay(tier.id, payouts);
    } catch (e) {
      tier.status = TierStatus.AwaitingRandomness;
      throw e;
    }

    const record: SettlementRecord = {
      tierId: tier.id,
      roundNumber: tier.roundNumber + 1,
      token,
      drawValue,
      proof,
      pot: pending.potAtRequest,
      ticketsFrom: tier.ticketsUsed,
      ticketsTo: pending.ticketsAtRequest,
      entriesFrom: tier.entriesUsed,
      entriesTo: pending.entriesAtRequest,
      requestedAt: pending.requestedAt,
      settledAt: nowSec,
      payouts,
    };

    this.finalize(tier, pending, nowSec);
    this.host.log(
      `✓ ${tier.id} round #${record.roundNumber} settled: pot=${record.pot} ` +
      payouts.map((p) => `${p.winner.toBase58().slice(0, 6)}…=${p.winnerAmount}`).join(" ")
    );
    return record;
  }

  /**
   * Abandon a request whose draw never arrived. Watermarks and pot are left
   * as they were, so the same window is drawn again on the next request; a
   * late answer for the dropped token is rejected as unrecognized.
   */
  reset(tier: TierState, nowSec: number, timeoutSec: number): void {
    const pending = tier.pending;
    if (tier.status !== TierStatus.AwaitingRandomness || !pending) {
      throw new JackpotError("InvalidInput", `${tier.id} has no outstanding randomness request`);
    }
    const age = nowSec - pending.requestedAt;
    if (age < timeoutSec) {
      throw new JackpotError("InvalidInput", `${tier.id} request is ${age}s old, timeout is ${timeoutSec}s`);
    }
    this.forget(tier);
    this.host.log(`⚠ ${tier.id}: randomness request ${pending.token.slice(0, 12)}… reset after ${age}s`);
  }

  pendingRequests(): PendingRequestView[] {
    const out: PendingRequestView[] = [];
    for (const tier of this.pendingByToken.values()) {
      if (tier.pending) out.push({ tierId: tier.id, ...tier.pending });
    }
    return out;
  }

  private finalize(tier: TierState, pending: PendingDraw, nowSec: number): void {
    tier.ticketsUsed = pending.ticketsAtRequest;
    tier.entriesUsed = pending.entriesAtRequest;
    tier.potPaidToDate += pending.potAtRequest;
    tier.lastSettledAt = nowSec;
    tier.roundNumber += 1;
    tier.windowParticipants = this.host.ledger.distinctBuyers(tier.entriesUsed);
    this.forget(tier);
  }

  private forget(tier: TierState): void {
    if (tier.pending) this.pendingByToken.delete(tier.pending.token);
    tier.pending = null;
    tier.status = TierStatus.Accruing;
  }
}
