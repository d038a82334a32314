import { bpsOf, mulDivDown } from "./math";
import { JackpotError } from "./errors";

export interface PlayerStats {
  totalDeposited: bigint;
  totalTickets: bigint;
  totalWon: bigint;
  totalReferralEarned: bigint;
  /** `totalTickets` at the player's last bonus withdrawal. */
  bonusWatermark: bigint;
  totalBonusWithdrawn: bigint;
  depositsCount: number;
  lastEntryIndex: number;
}

export interface BonusPool {
  shareBps: number;
  totalWithdrawn: bigint;
  /** Sum of every withdrawer's ticket delta; shrinks the share denominator. */
  ticketsWithdrawn: bigint;
}

export interface BonusWithdrawal {
  amount: bigint;
  ticketDelta: bigint;
}

export function emptyPlayerStats(): PlayerStats {
  return {
    totalDeposited: 0n,
    totalTickets: 0n,
    totalWon: 0n,
    totalReferralEarned: 0n,
    bonusWatermark: 0n,
    totalBonusWithdrawn: 0n,
    depositsCount: 0,
    lastEntryIndex: 0,
  };
}

export function bonusPoolInflow(pool: BonusPool, totalDeposited: bigint): bigint {
  return bpsOf(totalDeposited, pool.shareBps);
}

export function bonusPoolBalance(pool: BonusPool, totalDeposited: bigint): bigint {
  return bonusPoolInflow(pool, totalDeposited) - pool.totalWithdrawn;
}

/**
 * share = unclaimed player tickets / unclaimed global tickets;
 * available = floor(share × pool balance).
 *
 * A withdrawal removes the player's delta from the denominator and the paid
 * amount from the balance, so the remaining players' shares are rebased on
 * what is actually left. Rounding down keeps the sum of every player's
 * available amount within the balance.
 */
export function availableBonus(
  player: PlayerStats,
  pool: BonusPool,
  totals: { totalTickets: bigint; totalDeposited: bigint }
): bigint {
  const playerTickets = player.totalTickets - player.bonusWatermark;
  if (playerTickets <= 0n) return 0n;
  const unclaimedTickets = totals.totalTickets - pool.ticketsWithdrawn;
  return mulDivDown(bonusPoolBalance(pool, totals.totalDeposited), playerTickets, unclaimedTickets);
}

export function planBonusWithdrawal(
  player: PlayerStats,
  pool: BonusPool,
  totals: { totalTickets: bigint; totalDeposited: bigint }
): BonusWithdrawal {
  const amount = availableBonus(player, pool, totals);
  if (amount <= 0n) {
    throw new JackpotError("NothingToWithdraw", "no bonus available");
  }
  return { amount, ticketDelta: player.totalTickets - player.bonusWatermark };
}

export function applyBonusWithdrawal(
  player: PlayerStats,
  pool: BonusPool,
  withdrawal: BonusWithdrawal
): void {
  player.bonusWatermark += withdrawal.ticketDelta;
  player.totalBonusWithdrawn += withdrawal.amount;
  pool.ticketsWithdrawn += withdrawal.ticketDelta;
  pool.totalWithdrawn += withdrawal.amount;
}
