import { BPS_DENOMINATOR } from "./constants";
import { JackpotError } from "./errors";

// All divisions round down. Callers that split a total hand the remainder to
// the last part so nothing is lost to dust.

export function bpsOf(amount: bigint, bps: number): bigint {
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

/**
 * Split `total` by basis points. Every part but the last is rounded down;
 * the last part takes what is left, so the parts always sum to `total`.
 */
export function splitByBps(total: bigint, splitsBps: readonly number[]): bigint[] {
  assertBpsTable(splitsBps, "splitsBps");
  const parts: bigint[] = [];
  let assigned = 0n;
  for (let i = 0; i < splitsBps.length; i++) {
    const part = i === splitsBps.length - 1 ? total - assigned : bpsOf(total, splitsBps[i]);
    parts.push(part);
    assigned += part;
  }
  return parts;
}

/** Referrer receives `floor(amount × referralBps / 10 000)`, winner the rest. */
export function referralCut(
  amount: bigint,
  referralBps: number,
  hasReferrer: boolean
): { winnerAmount: bigint; referrerAmount: bigint } {
  if (!hasReferrer) return { winnerAmount: amount, referrerAmount: 0n };
  const referrerAmount = bpsOf(amount, referralBps);
  return { winnerAmount: amount - referrerAmount, referrerAmount };
}

/** floor(numerator × value / denominator); zero denominator yields zero. */
export function mulDivDown(value: bigint, numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) return 0n;
  return (value * numerator) / denominator;
}

export function assertBps(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > Number(BPS_DENOMINATOR)) {
    throw new JackpotError("InvalidInput", `${label} must be an integer in [0, 10000], got ${value}`);
  }
}

export function assertBpsTable(values: readonly number[], label: string): void {
  if (values.length === 0) {
    throw new JackpotError("InvalidInput", `${label} must not be empty`);
  }
  let sum = 0;
  for (const v of values) {
    assertBps(v, label);
    sum += v;
  }
  if (sum !== Number(BPS_DENOMINATOR)) {
    throw new JackpotError("InvalidInput", `${label} must sum to 10000, got ${sum}`);
  }
}

/** `amount × bps` must divide evenly by 10 000. */
export function assertWholeBpsShare(amount: bigint, bps: number, label: string): void {
  if ((amount * BigInt(bps)) % BPS_DENOMINATOR !== 0n) {
    throw new JackpotError(
      "InvalidInput",
      `${label} ${amount} leaves a fractional ${bps} bps share (${amount * BigInt(bps)} / 10000)`
    );
  }
}
