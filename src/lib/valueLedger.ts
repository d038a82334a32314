import { PublicKey } from "@solana/web3.js";

/**
 * External fungible-asset ledger (token accounts). Transfers return `false`
 * when refused; the engine turns that into `TransferFailed`.
 */
export interface ValueLedger {
  balanceOf(owner: PublicKey): bigint;
  transfer(from: PublicKey, to: PublicKey, amount: bigint): boolean;
  /** Move `amount` out of `from` using the allowance `from` granted `spender`. */
  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): boolean;
  approve(owner: PublicKey, spender: PublicKey, amount: bigint): boolean;
  allowance(owner: PublicKey, spender: PublicKey): bigint;
  /** Run `fn` so that every transfer it makes is undone if it throws. */
  runAtomic<T>(fn: () => T): T;
}

type LedgerState = {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
};

function allowanceKey(owner: PublicKey, spender: PublicKey): string {
  return `${owner.toBase58()}:${spender.toBase58()}`;
}

/**
 * In-process token ledger for the crank's local mode and for tests.
 * `refuseTransfersTo` lets tests simulate a recipient account that rejects
 * incoming transfers (frozen account, closed ATA).
 */
export class InMemoryValueLedger implements ValueLedger {
  private state: LedgerState = { balances: new Map(), allowances: new Map() };
  private readonly refused = new Set<string>();

  mint(to: PublicKey, amount: bigint): void {
    if (amount < 0n) throw new Error(`Cannot mint negative amount ${amount}`);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  refuseTransfersTo(owner: PublicKey, refuse = true): void {
    if (refuse) this.refused.add(owner.toBase58());
    else this.refused.delete(owner.toBase58());
  }

  balanceOf(owner: PublicKey): bigint {
    return this.state.balances.get(owner.toBase58()) ?? 0n;
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: PublicKey, spender: PublicKey, amount: bigint): boolean {
    if (amount < 0n) return false;
    this.state.allowances.set(allowanceKey(owner, spender), amount);
    return true;
  }

  transfer(from: PublicKey, to: PublicKey, amount: bigint): boolean {
    if (amount < 0n) return false;
    if (this.refused.has(to.toBase58())) return false;
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) return false;
    this.setBalance(from, fromBalance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
    return true;
  }

  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) return false;
    if (!this.transfer(from, to, amount)) return false;
    this.state.allowances.set(allowanceKey(from, spender), allowed - amount);
    return true;
  }

  runAtomic<T>(fn: () => T): T {
    const snapshot: LedgerState = {
      balances: new Map(this.state.balances),
      allowances: new Map(this.state.allowances),
    };
    try {
      return fn();
    } catch (e) {
      this.state = snapshot;
      throw e;
    }
  }

  private setBalance(owner: PublicKey, amount: bigint): void {
    this.state.balances.set(owner.toBase58(), amount);
  }
}
