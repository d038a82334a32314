/**
 * Player and operator actions served next to the crank.
 *
 * Handlers are plain functions over the engine this process hosts and return
 * `{ status, body }`; `server.ts` maps them onto HTTP routes. Amounts travel
 * as decimal strings of raw USDC units.
 */
import { PublicKey } from "@solana/web3.js";
import { isJackpotError, type Jackpot, type JackpotErrorName, type InMemoryValueLedger } from "../../src/index.js";
import type { LogFn } from "./log.js";

export interface ActionContext {
  jackpot: Jackpot;
  /** Custody ledger the engine's vault lives on. */
  valueLedger: InMemoryValueLedger;
  nowSec: () => number;
  log?: LogFn;
}

export interface ActionResult {
  status: number;
  body: unknown;
}

export class ActionError extends Error {
  constructor(
    readonly code: string,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ActionError";
  }
}

const ERROR_STATUS: Record<JackpotErrorName, number> = {
  InvalidInput: 400,
  InsufficientBalance: 400,
  TransferFailed: 409,
  ThresholdNotMet: 409,
  AlreadyAwaitingRandomness: 409,
  UnrecognizedCorrelationToken: 409,
  ProofVerificationFailed: 409,
  NoValidWinner: 500,
  NothingToWithdraw: 404,
  Unauthorized: 403,
};

// ─── Request parsing ──────────────────────────────────────

function field(body: unknown, name: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, name);
}

export function requireAccount(body: unknown, name = "account"): PublicKey {
  const raw = field(body, name);
  if (!raw || typeof raw !== "string") {
    throw new ActionError("MISSING_ACCOUNT", 400, `Missing body.${name}`);
  }
  try {
    return new PublicKey(raw);
  } catch (e) {
    throw new ActionError("INVALID_ACCOUNT", 400, `Invalid ${name} pubkey: ${String(e)}`);
  }
}

export function parseOptionalAccount(body: unknown, name: string): PublicKey | null {
  const raw = field(body, name);
  if (raw == null || raw === "") return null;
  return requireAccount(body, name);
}

/** Positive integer given as a JSON number or a decimal string. */
export function parsePositiveInt(body: unknown, name: string): bigint {
  const raw = field(body, name);
  const text = typeof raw === "number" && Number.isSafeInteger(raw) ? String(raw) : raw;
  if (typeof text !== "string" || !/^\d+$/.test(text.trim()) || BigInt(text.trim()) <= 0n) {
    throw new ActionError("INVALID_AMOUNT", 400, `${name} must be a positive integer`);
  }
  return BigInt(text.trim());
}

// ─── Handlers ─────────────────────────────────────────────

export function roundAction(ctx: ActionContext): ActionResult {
  const { jackpot } = ctx;
  return {
    status: 200,
    body: {
      ticketPrice: jackpot.getTicketPrice().toString(),
      referralBps: jackpot.getReferralBps(),
      bonusPool: jackpot.bonusPoolBalance().toString(),
      tiers: jackpot.tierSnapshots().map((t) => ({
        id: t.id,
        status: t.status,
        round: t.roundNumber,
        pot: t.pot.toString(),
        players: t.windowParticipants,
        activeTickets: t.activeTickets.toString(),
        nextDueAt: t.nextDueAt,
        pendingToken: t.pendingToken,
      })),
    },
  };
}

export function playerAction(ctx: ActionContext, query: unknown): ActionResult {
  const account = requireAccount(query);
  const stats = ctx.jackpot.playerStats(account);
  return {
    status: 200,
    body: {
      account: account.toBase58(),
      balance: ctx.valueLedger.balanceOf(account).toString(),
      availableBonus: ctx.jackpot.availableBonus(account).toString(),
      totalTickets: (stats?.totalTickets ?? 0n).toString(),
      totalDeposited: (stats?.totalDeposited ?? 0n).toString(),
      totalWon: (stats?.totalWon ?? 0n).toString(),
      totalReferralEarned: (stats?.totalReferralEarned ?? 0n).toString(),
    },
  };
}

/** Records USDC that arrived for `account` in custody. */
export function creditAction(ctx: ActionContext, body: unknown): ActionResult {
  const account = requireAccount(body);
  const amount = parsePositiveInt(body, "amount");
  ctx.valueLedger.mint(account, amount);
  ctx.log?.(`credit ${amount} → ${account.toBase58().slice(0, 6)}…`);
  return { status: 200, body: { account: account.toBase58(), balance: ctx.valueLedger.balanceOf(account).toString() } };
}

/**
 * Buys tickets out of the player's custody balance. The vault allowance is
 * granted for exactly the deposit and rolled back with it if the buy fails.
 */
export function joinAction(ctx: ActionContext, body: unknown): ActionResult {
  const account = requireAccount(body);
  const tickets = parsePositiveInt(body, "tickets");
  const referrer = parseOptionalAccount(body, "referrer");
  const { jackpot, valueLedger } = ctx;
  const amount = tickets * jackpot.getTicketPrice();

  const entry = valueLedger.runAtomic(() => {
    valueLedger.approve(account, jackpot.getVault(), amount);
    return jackpot.buyTickets(account, tickets, referrer, ctx.nowSec());
  });
  return {
    status: 200,
    body: {
      entryIndex: entry.index,
      firstTicket: (entry.cumulativeTicketNumber - entry.ticketCount + 1n).toString(),
      lastTicket: entry.cumulativeTicketNumber.toString(),
      deposited: entry.depositAmount.toString(),
      message: `Joined with ${tickets} ticket(s)`,
    },
  };
}

export function claimAction(ctx: ActionContext, body: unknown): ActionResult {
  const account = requireAccount(body);
  const amount = ctx.jackpot.withdrawBonus(account);
  return { status: 200, body: { account: account.toBase58(), claimed: amount.toString() } };
}

/** Sweeps the house share to `to` on the admin's behalf. */
export function houseAction(ctx: ActionContext, body: unknown): ActionResult {
  const to = requireAccount(body, "to");
  const amount = ctx.jackpot.withdrawHouse(ctx.jackpot.getAdmin(), to);
  return { status: 200, body: { to: to.toBase58(), withdrawn: amount.toString() } };
}

// ─── Error envelope ───────────────────────────────────────

export function errorResult(e: unknown): ActionResult {
  if (e instanceof ActionError) {
    return { status: e.status, body: { error: { code: e.code, message: e.message } } };
  }
  if (isJackpotError(e)) {
    return { status: ERROR_STATUS[e.code], body: { error: { code: e.code, message: e.message } } };
  }
  const message = e instanceof Error ? e.message : String(e);
  return { status: 500, body: { error: { code: "INTERNAL_ERROR", message } } };
}

export function runAction(fn: () => ActionResult): ActionResult {
  try {
    return fn();
  } catch (e) {
    return errorResult(e);
  }
}

/** Operator routes are disabled unless an API key is configured. */
export function authorizeOperator(given: string | undefined, apiKey: string | undefined): ActionError | null {
  if (!apiKey) return new ActionError("OPERATOR_DISABLED", 503, "ACTIONS_API_KEY not configured");
  if (given !== apiKey) return new ActionError("UNAUTHORIZED", 401, "Missing or invalid x-api-key");
  return null;
}
