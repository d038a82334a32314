import type { EntryLedger, Entry } from "./ledger";
import { JackpotError } from "./errors";

/**
 * Resolve a draw to the ledger entry holding the winning ticket.
 *
 * The active window is `(usedOffset, upTo]` in entry indices. The winning
 * ticket number is the watermark's cumulative count plus `drawValue + 1`,
 * and the winner is the first entry whose cumulative count reaches it.
 * An entry with `k` tickets covers exactly `k` consecutive ticket numbers,
 * so under a uniform draw it wins with probability `k / windowSize`.
 *
 * O(log N) over the window.
 */
export function selectWinner(
  ledger: EntryLedger,
  usedOffset: number,
  drawValue: bigint,
  upTo: number = ledger.length() - 1
): Entry {
  if (drawValue < 0n) {
    throw new JackpotError("InvalidInput", `drawValue must be non-negative, got ${drawValue}`);
  }
  if (upTo >= ledger.length() || usedOffset < 0 || usedOffset > upTo) {
    throw new JackpotError(
      "NoValidWinner",
      `window (${usedOffset}, ${upTo}] outside ledger of length ${ledger.length()}`
    );
  }

  const base = ledger.at(usedOffset).cumulativeTicketNumber;
  const winningTicket = base + drawValue + 1n;
  if (winningTicket > ledger.at(upTo).cumulativeTicketNumber) {
    throw new JackpotError(
      "NoValidWinner",
      `winning ticket ${winningTicket} past window end ${ledger.at(upTo).cumulativeTicketNumber}`
    );
  }

  // Lowest index in [usedOffset, upTo] whose cumulative count reaches the ticket.
  let lo = usedOffset;
  let hi = upTo;
  while (lo < hi) {
    const mid = lo + Math.floor((hi - lo) / 2);
    if (ledger.at(mid).cumulativeTicketNumber >= winningTicket) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }

  // The watermark entry is a sentinel for this window, never a winner.
  if (lo === usedOffset) {
    throw new JackpotError("NoValidWinner", `search landed on watermark index ${usedOffset}`);
  }

  const winner = ledger.at(lo);
  const previous = ledger.at(lo - 1);
  if (!(winner.cumulativeTicketNumber >= winningTicket && previous.cumulativeTicketNumber < winningTicket)) {
    throw new JackpotError("NoValidWinner", `ledger out of order around index ${lo}`);
  }
  return winner;
}
