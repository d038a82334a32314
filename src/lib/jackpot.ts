/**
 * Jackpot registry: owns the entry ledger, every tier, player stats, the
 * bonus pool and the pending-randomness table. All mutating operations are
 * synchronous and either complete or throw with nothing changed.
 */
import { PublicKey } from "@solana/web3.js";
import {
  BPS_DENOMINATOR,
  DEFAULT_BONUS_SHARE_BPS,
  DEFAULT_RANDOMNESS_TIMEOUT_SEC,
  DEFAULT_REFERRAL_BPS,
  DEFAULT_TICKET_PRICE,
  DEFAULT_TIERS,
  NULL_IDENTITY,
  TierStatus,
  type TierConfig,
  type TierId,
} from "./constants";
import {
  applyBonusWithdrawal,
  availableBonus,
  bonusPoolBalance,
  bonusPoolInflow,
  emptyPlayerStats,
  planBonusWithdrawal,
  type BonusPool,
  type PlayerStats,
} from "./bonus";
import { JackpotError } from "./errors";
import { EntryLedger, type Entry } from "./ledger";
import { assertBps, assertWholeBpsShare, bpsOf } from "./math";
import type { RandomnessSource } from "./randomness";
import {
  RoundStateMachine,
  type PendingRequestView,
  type SettlementRecord,
  type SplitPayout,
  type Totals,
} from "./roundMachine";
import {
  createTierState,
  isDue,
  toTierSnapshot,
  type PendingDraw,
  type TierSnapshot,
  type TierState,
} from "./tiers";
import type { ValueLedger } from "./valueLedger";

export interface JackpotOptions {
  admin: PublicKey;
  /** Account that holds deposits and pays every prize. */
  vault: PublicKey;
  valueLedger: ValueLedger;
  randomness: RandomnessSource;
  ticketPrice?: bigint;
  referralBps?: number;
  bonusShareBps?: number;
  tiers?: readonly TierConfig[];
  randomnessTimeoutSec?: number;
  /** Start of the first period for every tier. */
  nowSec?: number;
  log?: (msg: string) => void;
}

export interface TierThresholds {
  minimumParticipants?: number;
  minimumPot?: bigint;
}

export class Jackpot {
  readonly ledger = new EntryLedger();

  private readonly tiers = new Map<TierId, TierState>();
  private readonly players = new Map<string, PlayerStats>();
  private readonly bonusPool: BonusPool;
  private readonly houseShareBps: number;
  private readonly machine: RoundStateMachine;
  private readonly history: SettlementRecord[] = [];
  private readonly vault: PublicKey;
  private readonly log: (msg: string) => void;

  private admin: PublicKey;
  private valueLedger: ValueLedger;
  private randomness: RandomnessSource;
  private ticketPrice: bigint;
  private referralBps: number;
  private randomnessTimeoutSec: number;
  private totalDeposited = 0n;
  private houseWithdrawn = 0n;

  constructor(opts: JackpotOptions) {
    const nowSec = opts.nowSec ?? Math.floor(Date.now() / 1000);
    const tierConfigs = opts.tiers ?? DEFAULT_TIERS;
    const bonusShareBps = opts.bonusShareBps ?? DEFAULT_BONUS_SHARE_BPS;

    assertBps(bonusShareBps, "bonusShareBps");
    let sharesBps = bonusShareBps;
    for (const config of tierConfigs) {
      if (this.tiers.has(config.id)) {
        throw new JackpotError("InvalidInput", `duplicate tier ${config.id}`);
      }
      this.tiers.set(config.id, createTierState(config, nowSec));
      sharesBps += config.shareBps;
    }
    if (sharesBps > Number(BPS_DENOMINATOR)) {
      throw new JackpotError("InvalidInput", `tier and bonus shares sum to ${sharesBps} bps, max 10000`);
    }

    this.admin = opts.admin;
    this.vault = opts.vault;
    this.valueLedger = opts.valueLedger;
    this.randomness = opts.randomness;
    this.ticketPrice = opts.ticketPrice ?? DEFAULT_TICKET_PRICE;
    this.referralBps = opts.referralBps ?? DEFAULT_REFERRAL_BPS;
    this.randomnessTimeoutSec = opts.randomnessTimeoutSec ?? DEFAULT_RANDOMNESS_TIMEOUT_SEC;
    this.bonusPool = { shareBps: bonusShareBps, totalWithdrawn: 0n, ticketsWithdrawn: 0n };
    this.houseShareBps = Number(BPS_DENOMINATOR) - sharesBps;
    this.log = opts.log ?? (() => {});

    this.assertTicketPrice(this.ticketPrice);
    assertBps(this.referralBps, "referralBps");

    this.machine = new RoundStateMachine({
      ledger: this.ledger,
      totals: () => this.totals(),
      randomness: () => this.randomness,
      referralBps: () => this.referralBps,
      pay: (tierId, payouts) => this.payPrizes(tierId, payouts),
      log: (msg) => this.log(msg),
    });
  }

  // ─── Deposits ─────────────────────────────────────────────

  buyTickets(buyer: PublicKey, ticketCount: bigint, referrer: PublicKey | null, nowSec: number): Entry {
    if (ticketCount <= 0n) {
      throw new JackpotError("InvalidInput", "ticketCount must be positive");
    }
    if (buyer.equals(NULL_IDENTITY) || buyer.equals(this.vault)) {
      throw new JackpotError("InvalidInput", `invalid buyer ${buyer.toBase58()}`);
    }
    const ref = referrer && !referrer.equals(NULL_IDENTITY) ? referrer : null;
    if (ref && ref.equals(buyer)) {
      throw new JackpotError("InvalidInput", "buyer cannot refer themselves");
    }

    const amount = ticketCount * this.ticketPrice;
    const balance = this.valueLedger.balanceOf(buyer);
    if (balance < amount) {
      throw new JackpotError("InsufficientBalance", `${buyer.toBase58()} holds ${balance}, needs ${amount}`);
    }
    if (!this.valueLedger.transferFrom(this.vault, buyer, this.vault, amount)) {
      throw new JackpotError("TransferFailed", `deposit of ${amount} from ${buyer.toBase58()} refused`);
    }

    const entry = this.ledger.append(buyer, ref, ticketCount, amount, nowSec);
    this.totalDeposited += amount;

    const player = this.playerRecord(buyer);
    for (const tier of this.tiers.values()) {
      if (player.depositsCount === 0 || player.lastEntryIndex <= tier.entriesUsed) {
        tier.windowParticipants += 1;
      }
    }
    player.totalDeposited += amount;
    player.totalTickets += ticketCount;
    player.depositsCount += 1;
    player.lastEntryIndex = entry.index;

    return entry;
  }

  // ─── Settlement ───────────────────────────────────────────

  requestSettlement(tierId: TierId, nowSec: number): PendingDraw {
    return this.machine.request(this.tier(tierId), nowSec);
  }

  onDrawReceived(token: string, drawValue: bigint, proof: string, nowSec: number): SettlementRecord {
    const record = this.machine.receive(token, drawValue, proof, nowSec);
    this.history.push(record);
    return record;
  }

  resetStuckRequest(caller: PublicKey, tierId: TierId, nowSec: number): void {
    this.assertAdmin(caller);
    this.machine.reset(this.tier(tierId), nowSec, this.randomnessTimeoutSec);
  }

  private payPrizes(tierId: TierId, payouts: readonly SplitPayout[]): void {
    const total = payouts.reduce((sum, p) => sum + p.amount, 0n);
    const vaultBalance = this.valueLedger.balanceOf(this.vault);
    if (vaultBalance < total) {
      throw new JackpotError("InsufficientBalance", `${tierId}: vault holds ${vaultBalance}, prizes need ${total}`);
    }

    this.valueLedger.runAtomic(() => {
      for (const p of payouts) {
        this.transferOut(p.winner, p.winnerAmount, `${tierId} split #${p.splitIndex} prize`);
        if (p.referrer) {
          this.transferOut(p.referrer, p.referrerAmount, `${tierId} split #${p.splitIndex} referral`);
        }
      }
    });

    for (const p of payouts) {
      this.playerRecord(p.winner).totalWon += p.winnerAmount;
      if (p.referrer) this.playerRecord(p.referrer).totalReferralEarned += p.referrerAmount;
    }
  }

  // ─── Bonus ────────────────────────────────────────────────

  availableBonus(player: PublicKey): bigint {
    const stats = this.players.get(player.toBase58());
    if (!stats) return 0n;
    return availableBonus(stats, this.bonusPool, this.totals());
  }

  withdrawBonus(player: PublicKey): bigint {
    const stats = this.players.get(player.toBase58());
    if (!stats) {
      throw new JackpotError("NothingToWithdraw", `${player.toBase58()} has never deposited`);
    }
    const withdrawal = planBonusWithdrawal(stats, this.bonusPool, this.totals());
    this.valueLedger.runAtomic(() => this.transferOut(player, withdrawal.amount, "bonus"));
    applyBonusWithdrawal(stats, this.bonusPool, withdrawal);
    this.log(`✓ bonus ${withdrawal.amount} paid to ${player.toBase58().slice(0, 6)}… (tickets=${withdrawal.ticketDelta})`);
    return withdrawal.amount;
  }

  // ─── Admin ────────────────────────────────────────────────

  setTicketPrice(caller: PublicKey, price: bigint): void {
    this.assertAdmin(caller);
    this.assertTicketPrice(price);
    this.ticketPrice = price;
  }

  setTierThresholds(caller: PublicKey, tierId: TierId, thresholds: TierThresholds): void {
    this.assertAdmin(caller);
    const tier = this.tier(tierId);
    const { minimumParticipants, minimumPot } = thresholds;
    if (minimumParticipants != null && (!Number.isInteger(minimumParticipants) || minimumParticipants < 0)) {
      throw new JackpotError("InvalidInput", "minimumParticipants must be a non-negative integer");
    }
    if (minimumPot != null && minimumPot < 0n) {
      throw new JackpotError("InvalidInput", "minimumPot must be non-negative");
    }
    if (minimumParticipants != null) tier.minimumParticipants = minimumParticipants;
    if (minimumPot != null) tier.minimumPot = minimumPot;
  }

  setReferralBps(caller: PublicKey, bps: number): void {
    this.assertAdmin(caller);
    assertBps(bps, "referralBps");
    this.referralBps = bps;
  }

  /** Swapping the randomness source invalidates proofs for requests already outstanding. */
  setCollaborators(
    caller: PublicKey,
    collaborators: { valueLedger?: ValueLedger; randomness?: RandomnessSource }
  ): void {
    this.assertAdmin(caller);
    if (collaborators.valueLedger) this.valueLedger = collaborators.valueLedger;
    if (collaborators.randomness) this.randomness = collaborators.randomness;
  }

  setRandomnessTimeout(caller: PublicKey, timeoutSec: number): void {
    this.assertAdmin(caller);
    if (!Number.isInteger(timeoutSec) || timeoutSec < 0) {
      throw new JackpotError("InvalidInput", "timeout must be a non-negative integer");
    }
    this.randomnessTimeoutSec = timeoutSec;
  }

  transferAdmin(caller: PublicKey, newAdmin: PublicKey): void {
    this.assertAdmin(caller);
    if (newAdmin.equals(NULL_IDENTITY)) {
      throw new JackpotError("InvalidInput", "admin must not be the null identity");
    }
    this.admin = newAdmin;
    this.log(`admin transferred to ${newAdmin.toBase58()}`);
  }

  withdrawHouse(caller: PublicKey, to: PublicKey): bigint {
    this.assertAdmin(caller);
    const amount = this.houseBalance();
    if (amount <= 0n) throw new JackpotError("NothingToWithdraw", "house balance is zero");
    this.valueLedger.runAtomic(() => this.transferOut(to, amount, "house"));
    this.houseWithdrawn += amount;
    return amount;
  }

  // ─── Views ────────────────────────────────────────────────

  totals(): Totals {
    return { totalTickets: this.ledger.totalTickets(), totalDeposited: this.totalDeposited };
  }

  entries(): readonly Entry[] {
    return this.ledger.slice(0);
  }

  tierSnapshot(tierId: TierId): TierSnapshot {
    return toTierSnapshot(this.tier(tierId), this.totals());
  }

  tierSnapshots(): TierSnapshot[] {
    const totals = this.totals();
    return [...this.tiers.values()].map((tier) => toTierSnapshot(tier, totals));
  }

  tierIds(): TierId[] {
    return [...this.tiers.keys()];
  }

  /** Accruing tiers whose settlement period has elapsed. */
  dueTiers(nowSec: number): TierId[] {
    return [...this.tiers.values()]
      .filter((tier) => tier.status === TierStatus.Accruing && isDue(tier, nowSec))
      .map((tier) => tier.id);
  }

  playerStats(player: PublicKey): Readonly<PlayerStats> | null {
    const stats = this.players.get(player.toBase58());
    return stats ? { ...stats } : null;
  }

  bonusPoolBalance(): bigint {
    return bonusPoolBalance(this.bonusPool, this.totalDeposited);
  }

  bonusPoolInflow(): bigint {
    return bonusPoolInflow(this.bonusPool, this.totalDeposited);
  }

  bonusTicketsWithdrawn(): bigint {
    return this.bonusPool.ticketsWithdrawn;
  }

  houseBalance(): bigint {
    return bpsOf(this.totalDeposited, this.houseShareBps) - this.houseWithdrawn;
  }

  settlements(): readonly SettlementRecord[] {
    return this.history;
  }

  pendingRequests(): PendingRequestView[] {
    return this.machine.pendingRequests();
  }

  getAdmin(): PublicKey {
    return this.admin;
  }

  getVault(): PublicKey {
    return this.vault;
  }

  getTicketPrice(): bigint {
    return this.ticketPrice;
  }

  getReferralBps(): number {
    return this.referralBps;
  }

  getRandomnessTimeout(): number {
    return this.randomnessTimeoutSec;
  }

  // ─── Helpers ──────────────────────────────────────────────

  private tier(tierId: TierId): TierState {
    const tier = this.tiers.get(tierId);
    if (!tier) throw new JackpotError("InvalidInput", `unknown tier ${tierId}`);
    return tier;
  }

  private playerRecord(player: PublicKey): PlayerStats {
    const key = player.toBase58();
    let stats = this.players.get(key);
    if (!stats) {
      stats = emptyPlayerStats();
      this.players.set(key, stats);
    }
    return stats;
  }

  private transferOut(to: PublicKey, amount: bigint, what: string): void {
    if (amount <= 0n) return;
    if (!this.valueLedger.transfer(this.vault, to, amount)) {
      throw new JackpotError("TransferFailed", `${what} of ${amount} to ${to.toBase58()} refused`);
    }
  }

  // Per-ticket bonus inflow must be a whole unit or later deposits can shave
  // earlier holders' entitlement through rounding.
  private assertTicketPrice(price: bigint): void {
    if (price <= 0n) throw new JackpotError("InvalidInput", "ticketPrice must be positive");
    assertWholeBpsShare(price, this.bonusPool.shareBps, "ticketPrice");
  }

  private assertAdmin(caller: PublicKey): void {
    if (!caller.equals(this.admin)) {
      throw new JackpotError("Unauthorized", `${caller.toBase58()} is not the admin`);
    }
  }
}
