/**
 * One pass of the settlement lifecycle per tick:
 *   - request randomness for every due, accruing tier
 *   - collect the oracle's queued requests and deliver each draw once its
 *     delay has passed (transient payout failures retry with backoff)
 *   - archive every settlement
 *   - warn about tiers stuck awaiting randomness, and reset them after the
 *     engine's timeout when auto-reset is on
 */
import type { PublicKey } from "@solana/web3.js";
import {
  errorMessage,
  formatUsdcCompact,
  isJackpotError,
  TierStatus,
  type DrawFulfilment,
  type DrawRequest,
  type Jackpot,
  type SettlementRecord,
  type TierId,
  type TierStatusName,
} from "../../src/index.js";
import type { CrankConfig } from "./constants.js";
import { log as defaultLog, type LogFn } from "./log.js";
import {
  buildRetryScheduleUpdate,
  classifyDrawFailure,
  getStuckThresholdSec,
  isThresholdNotMetMessage,
  shouldAutoReset,
  shouldEmitStuckWarning,
} from "./runtimeLogic.js";

/** Oracle side of the randomness round trip. */
export interface DrawOracle {
  takePending(): DrawRequest[];
  fulfil(request: DrawRequest): DrawFulfilment;
}

export type ArchiveFn = (record: SettlementRecord) => Promise<boolean>;

export interface SettlementCrankOptions {
  jackpot: Jackpot;
  oracle: DrawOracle;
  /** Identity used for admin-only resets. */
  admin: PublicKey;
  config: CrankConfig;
  archive?: ArchiveFn;
  log?: LogFn;
}

type QueuedDraw = {
  request: DrawRequest;
  readyAtMs: number;
  retryCount: number;
  backoffSec: number;
  lastReason?: string;
};

type ObservedTier = { status: TierStatusName; sinceSec: number };

function short(token: string): string {
  return `${token.slice(0, 12)}…`;
}

export class SettlementCrank {
  private readonly jackpot: Jackpot;
  private readonly oracle: DrawOracle;
  private readonly admin: PublicKey;
  private readonly config: CrankConfig;
  private readonly archive: ArchiveFn | null;
  private readonly log: LogFn;

  private readonly queue = new Map<string, QueuedDraw>(); // key: correlation token
  private readonly observed = new Map<TierId, ObservedTier>();
  private readonly stuckWarnedAt = new Map<string, number>(); // key: `${tier}:${status}`
  private readonly waitingReason = new Map<TierId, string>();
  private lastHealthLogAt = 0;
  private settledCount = 0;
  private archiveFailures = 0;

  constructor(opts: SettlementCrankOptions) {
    this.jackpot = opts.jackpot;
    this.oracle = opts.oracle;
    this.admin = opts.admin;
    this.config = opts.config;
    this.archive = opts.archive ?? null;
    this.log = opts.log ?? defaultLog;
  }

  async tick(nowMs: number): Promise<void> {
    const nowSec = Math.floor(nowMs / 1000);
    this.requestDueTiers(nowSec);
    this.collectRequests(nowMs);
    await this.deliverReadyDraws(nowMs);
    this.watchAwaitingTiers(nowSec);
    this.maybeLogHealthSnapshot(nowSec);
  }

  queuedDraws(): number {
    return this.queue.size;
  }

  settled(): number {
    return this.settledCount;
  }

  // ─── Requests ─────────────────────────────────────────────

  private requestDueTiers(nowSec: number): void {
    for (const tierId of this.jackpot.dueTiers(nowSec)) {
      try {
        this.jackpot.requestSettlement(tierId, nowSec);
        this.waitingReason.delete(tierId);
      } catch (e) {
        const msg = errorMessage(e);
        if (!isThresholdNotMetMessage(msg)) {
          this.log(`✗ ${tierId} request failed: ${msg}`);
          continue;
        }
        // Same shortfall is retried every tick; log only when it changes.
        if (this.waitingReason.get(tierId) !== msg) {
          this.waitingReason.set(tierId, msg);
          this.log(`${tierId} due but waiting: ${msg}`);
        }
      }
    }
  }

  private collectRequests(nowMs: number): void {
    for (const request of this.oracle.takePending()) {
      this.queue.set(request.token, {
        request,
        readyAtMs: nowMs + this.config.randomnessDelayMs,
        retryCount: 0,
        backoffSec: this.config.retryBackoffMinSec,
      });
    }
  }

  // ─── Draw delivery ────────────────────────────────────────

  private async deliverReadyDraws(nowMs: number): Promise<void> {
    const nowSec = Math.floor(nowMs / 1000);
    for (const [token, queued] of [...this.queue]) {
      if (nowMs < queued.readyAtMs) continue;

      const { drawValue, proof } = this.oracle.fulfil(queued.request);
      let record: SettlementRecord;
      try {
        record = this.jackpot.onDrawReceived(token, drawValue, proof, nowSec);
      } catch (e) {
        this.handleDrawFailure(token, queued, e, nowSec);
        continue;
      }

      this.queue.delete(token);
      this.settledCount++;
      await this.archiveSettlement(record);
    }
  }

  private handleDrawFailure(token: string, queued: QueuedDraw, error: unknown, nowSec: number): void {
    const failure = classifyDrawFailure(errorMessage(error), isJackpotError(error) && error.fatal);
    switch (failure.kind) {
      case "stale":
        this.queue.delete(token);
        this.log(`draw ${short(token)} dropped: request no longer outstanding`);
        return;
      case "fatal":
        this.queue.delete(token);
        this.log(`✗ draw ${short(token)} fatal: ${failure.message}`);
        return;
      case "retry": {
        const update = buildRetryScheduleUpdate({
          nowSec,
          reason: failure.message,
          minDelaySec: this.config.retryBackoffMinSec,
          maxDelaySec: this.config.retryBackoffMaxSec,
          currentDelaySec: queued.backoffSec,
          retryCount: queued.retryCount,
        });
        queued.backoffSec = update.nextDelaySec;
        queued.readyAtMs = update.nextAttemptAtSec * 1000;
        queued.retryCount = update.nextRetryCount;
        queued.lastReason = update.lastReason;
        this.log(`↻ draw ${short(token)} retry in ${update.nextDelaySec}s (${update.lastReason})`);
        return;
      }
    }
  }

  private async archiveSettlement(record: SettlementRecord): Promise<void> {
    if (!this.archive) return;
    const key = `${record.tierId}-${record.roundNumber}`;
    try {
      if (!(await this.archive(record))) {
        this.archiveFailures++;
        this.log(`⚠ settlement ${key} not archived`);
      }
    } catch (e) {
      this.archiveFailures++;
      this.log(`⚠ settlement ${key} archive error: ${errorMessage(e)}`);
    }
  }

  // ─── Stuck tiers ──────────────────────────────────────────

  private watchAwaitingTiers(nowSec: number): void {
    for (const snap of this.jackpot.tierSnapshots()) {
      this.observeTier(snap.id, snap.status, nowSec);
      if (snap.status !== TierStatus.AwaitingRandomness) continue;

      this.maybeWarnStuckTier(snap.id, snap.status, nowSec);

      const pending = this.jackpot.pendingRequests().find((p) => p.tierId === snap.id);
      if (
        !pending ||
        !shouldAutoReset({
          enabled: this.config.autoResetStuck,
          nowSec,
          requestedAtSec: pending.requestedAt,
          timeoutSec: this.jackpot.getRandomnessTimeout(),
        })
      ) {
        continue;
      }

      try {
        this.jackpot.resetStuckRequest(this.admin, snap.id, nowSec);
        this.queue.delete(pending.token);
        this.observeTier(snap.id, TierStatus.Accruing, nowSec);
      } catch (e) {
        this.log(`✗ ${snap.id} reset failed: ${errorMessage(e)}`);
      }
    }
  }

  private observeTier(tierId: TierId, status: TierStatusName, nowSec: number): void {
    const prev = this.observed.get(tierId);
    if (prev && prev.status === status) return;
    this.observed.set(tierId, { status, sinceSec: nowSec });
    // Reset warning throttle for old status if it changed.
    if (prev) this.stuckWarnedAt.delete(`${tierId}:${prev.status}`);
  }

  private maybeWarnStuckTier(tierId: TierId, status: TierStatusName, nowSec: number): void {
    const threshold = getStuckThresholdSec(status, { awaitingRandomnessSec: this.config.stuckAwaitingSec });
    const obs = this.observed.get(tierId);
    if (!obs) return;

    const key = `${tierId}:${status}`;
    if (
      !shouldEmitStuckWarning({
        nowSec,
        observedStatus: obs.status,
        targetStatus: status,
        observedSinceSec: obs.sinceSec,
        thresholdSec: threshold,
        lastWarnSec: this.stuckWarnedAt.get(key),
        repeatSec: this.config.stuckWarnRepeatSec,
      })
    ) {
      return;
    }
    this.stuckWarnedAt.set(key, nowSec);

    const pending = this.jackpot.pendingRequests().find((p) => p.tierId === tierId);
    const queued = pending ? this.queue.get(pending.token) : undefined;
    const extra =
      (pending ? ` token=${short(pending.token)}` : "") +
      (queued && queued.retryCount > 0 ? ` retry=${queued.retryCount} reason=${queued.lastReason ?? "?"}` : "");

    this.log(`⚠ Stuck tier ${tierId}: status=${status} age=${nowSec - obs.sinceSec}s (threshold=${threshold}s)${extra}`);
  }

  // ─── Health ───────────────────────────────────────────────

  private maybeLogHealthSnapshot(nowSec: number): void {
    if (this.config.healthLogIntervalSec <= 0) return;
    if (nowSec - this.lastHealthLogAt < this.config.healthLogIntervalSec) return;
    this.lastHealthLogAt = nowSec;

    const tiers = this.jackpot
      .tierSnapshots()
      .map((t) => `${t.id}:${t.status}#${t.roundNumber} pot=${formatUsdcCompact(t.pot)} players=${t.windowParticipants}`)
      .join(" ");

    this.log(
      `HEALTH ${tiers} queued_draws=${this.queue.size} settled=${this.settledCount} ` +
      `archive_failures=${this.archiveFailures} bonus_pool=${formatUsdcCompact(this.jackpot.bonusPoolBalance())}`
    );
  }
}
