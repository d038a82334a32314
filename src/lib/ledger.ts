import { PublicKey } from "@solana/web3.js";
import { NULL_IDENTITY } from "./constants";
import { JackpotError } from "./errors";

export interface Entry {
  readonly index: number;
  /** Running total of tickets sold up to and including this entry. */
  readonly cumulativeTicketNumber: bigint;
  readonly ticketCount: bigint;
  readonly depositAmount: bigint;
  readonly buyer: PublicKey;
  readonly referrer: PublicKey | null;
  readonly timestamp: number;
}

const SENTINEL: Entry = Object.freeze({
  index: 0,
  cumulativeTicketNumber: 0n,
  ticketCount: 0n,
  depositAmount: 0n,
  buyer: NULL_IDENTITY,
  referrer: null,
  timestamp: 0,
});

/**
 * Append-only ticket ledger. Index 0 is a zero sentinel so that a watermark
 * of 0 means "nothing settled yet" without special-casing an empty ledger.
 * Entries are frozen on append and never removed; settlement only moves
 * watermarks over this array.
 */
export class EntryLedger {
  private readonly entries: Entry[] = [SENTINEL];

  append(
    buyer: PublicKey,
    referrer: PublicKey | null,
    ticketCount: bigint,
    depositAmount: bigint,
    timestamp: number
  ): Entry {
    if (ticketCount <= 0n) {
      throw new JackpotError("InvalidInput", "ticketCount must be positive");
    }
    if (depositAmount <= 0n) {
      throw new JackpotError("InvalidInput", "depositAmount must be positive");
    }
    if (buyer.equals(NULL_IDENTITY)) {
      throw new JackpotError("InvalidInput", "buyer must not be the null identity");
    }

    const entry: Entry = Object.freeze({
      index: this.entries.length,
      cumulativeTicketNumber: this.last().cumulativeTicketNumber + ticketCount,
      ticketCount,
      depositAmount,
      buyer,
      referrer: referrer && !referrer.equals(NULL_IDENTITY) ? referrer : null,
      timestamp,
    });
    this.entries.push(entry);
    return entry;
  }

  /** Number of slots including the sentinel; the last real entry is `length() - 1`. */
  length(): number {
    return this.entries.length;
  }

  at(index: number): Entry {
    const entry = this.entries[index];
    if (!entry) {
      throw new JackpotError("InvalidInput", `ledger index ${index} out of range [0, ${this.entries.length})`);
    }
    return entry;
  }

  last(): Entry {
    return this.entries[this.entries.length - 1];
  }

  totalTickets(): bigint {
    return this.last().cumulativeTicketNumber;
  }

  /** Entries in `(from, to]`, i.e. everything after watermark `from`. */
  slice(from: number, to: number = this.entries.length - 1): readonly Entry[] {
    return this.entries.slice(from + 1, to + 1);
  }

  distinctBuyers(from: number, to: number = this.entries.length - 1): number {
    const seen = new Set<string>();
    for (const entry of this.slice(from, to)) {
      seen.add(entry.buyer.toBase58());
    }
    return seen.size;
  }
}
