/**
 * Firebase archive: saves settled rounds to Firebase RTDB via REST API.
 * No service account needed; database rules allow write-once to
 * settlements/$key.
 */
import { errorMessage, type SettlementRecord } from "../../src/index.js";

let dbUrl: string | null = null;

export function initFirebase(url = process.env.FIREBASE_DATABASE_URL): boolean {
  if (!url) {
    console.warn("[firebase] FIREBASE_DATABASE_URL not set — archive disabled");
    dbUrl = null;
    return false;
  }
  dbUrl = url.replace(/\/$/, ""); // strip trailing slash
  console.log("[firebase] Connected to", dbUrl);
  return true;
}

export interface ArchivedPayout {
  splitIndex: number;
  splitBps: number;
  winner: string;
  referrer: string | null;
  winningTicket: string;
  amount: string;
  winnerAmount: string;
  referrerAmount: string;
}

/** JSON-safe settlement: raw amounts and ticket numbers as decimal strings. */
export interface ArchivedSettlement {
  tier: string;
  round: number;
  token: string;
  drawValue: string;
  proof: string;
  pot: string;
  ticketsFrom: string;
  ticketsTo: string;
  entriesFrom: number;
  entriesTo: number;
  requestedAt: number;
  settledAt: number;
  payouts: ArchivedPayout[];
  archivedAt: number;
}

export function settlementKey(tier: string, round: number): string {
  return `${tier}-${round}`;
}

export function buildArchivedSettlement(record: SettlementRecord, archivedAt = Date.now()): ArchivedSettlement {
  return {
    tier: record.tierId,
    round: record.roundNumber,
    token: record.token,
    drawValue: record.drawValue.toString(),
    proof: record.proof,
    pot: record.pot.toString(),
    ticketsFrom: record.ticketsFrom.toString(),
    ticketsTo: record.ticketsTo.toString(),
    entriesFrom: record.entriesFrom,
    entriesTo: record.entriesTo,
    requestedAt: record.requestedAt,
    settledAt: record.settledAt,
    payouts: record.payouts.map((p) => ({
      splitIndex: p.splitIndex,
      splitBps: p.splitBps,
      winner: p.winner.toBase58(),
      referrer: p.referrer ? p.referrer.toBase58() : null,
      winningTicket: p.winningTicket.toString(),
      amount: p.amount.toString(),
      winnerAmount: p.winnerAmount.toString(),
      referrerAmount: p.referrerAmount.toString(),
    })),
    archivedAt,
  };
}

/**
 * Save a settlement to Firebase RTDB via REST API (PUT).
 * Write-once: 401/403 means the key already exists and counts as saved.
 */
export async function saveSettlementToFirebase(settlement: ArchivedSettlement): Promise<boolean> {
  if (!dbUrl) return false;
  const key = settlementKey(settlement.tier, settlement.round);
  try {
    const res = await fetch(`${dbUrl}/settlements/${key}.json`, {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(settlement),
    });
    if (res.ok) return true;
    if (res.status === 401 || res.status === 403) return true;
    const text = await res.text();
    console.error(`[firebase] Save settlement ${key} HTTP ${res.status}: ${text}`);
    return false;
  } catch (e) {
    console.error(`[firebase] Save settlement ${key} failed:`, errorMessage(e));
    return false;
  }
}
