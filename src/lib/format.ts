import { PublicKey } from "@solana/web3.js";
import { USDC_DECIMALS } from "./constants";

const usdcFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const UNIT = 10n ** BigInt(USDC_DECIMALS);

/** Raw base units → "1,234.56". Truncates below the cent. */
export function formatUsdc(raw: bigint): string {
  const negative = raw < 0n;
  const abs = negative ? -raw : raw;
  const cents = (abs * 100n) / UNIT;
  const value = usdcFormatter.format(Number(cents / 100n)).slice(0, -3);
  const fraction = (cents % 100n).toString().padStart(2, "0");
  return `${negative ? "-" : ""}${value}.${fraction}`;
}

export function formatUsdcCompact(raw: bigint): string {
  const abs = raw < 0n ? -raw : raw;
  if (abs >= 1000n * UNIT) {
    return `${formatUsdc(raw / 1000n)}k`;
  }
  return formatUsdc(raw);
}

/**
 * Shorten an address for log lines: `AbcD...5678`.
 * Returns "—" for the null identity.
 */
export function shortenAddr(addr: PublicKey | string | null): string {
  if (!addr) return "—";
  const s = typeof addr === "string" ? addr : addr.toBase58();
  if (!s || s === PublicKey.default.toBase58()) return "—";
  return `${s.slice(0, 4)}...${s.slice(-4)}`;
}
