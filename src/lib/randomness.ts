/**
 * Randomness boundary. The engine asks a source for a draw in
 * `[0, rangeUpperBound)` and later receives it through `onDrawReceived`
 * together with a proof that the source can check.
 */
import { createHash, createHmac, timingSafeEqual } from "crypto";
import BN from "bn.js";
import type { TierId } from "./constants";

export interface RandomnessSource {
  /** Fire-and-forget. The answer comes back through the engine's callback. */
  requestDraw(rangeUpperBound: bigint, token: string): void;
  verify(token: string, drawValue: bigint, proof: string, rangeUpperBound: bigint): boolean;
}

export interface DrawRequest {
  token: string;
  rangeUpperBound: bigint;
}

export interface DrawFulfilment {
  token: string;
  drawValue: bigint;
  proof: string;
}

// ─── Low-level helpers ────────────────────────────────────

const SEED_REQUEST = Buffer.from("draw_request");
const SEED_SPLIT = Buffer.from("split");

export function encodeU32LE(value: number): Buffer {
  return new BN(value).toArrayLike(Buffer, "le", 4);
}

export function encodeU64LE(value: bigint | number): Buffer {
  return new BN(BigInt.asUintN(64, BigInt(value)).toString()).toArrayLike(Buffer, "le", 8);
}

export function decodeU64LE(value: Uint8Array): bigint {
  return BigInt(new BN(value.subarray(0, 8), undefined, "le").toString());
}

function sha256(parts: Uint8Array[]): Buffer {
  const hash = createHash("sha256");
  for (const part of parts) hash.update(part);
  return hash.digest();
}

// ─── Tokens & draws ───────────────────────────────────────

/**
 * Correlation token for one randomness request. `nonce` is the engine-wide
 * request counter, so a tier that is reset and asks again never reuses a token.
 */
export function correlationToken(tierId: TierId, roundNumber: number, nonce: number): string {
  return sha256([
    SEED_REQUEST,
    Buffer.from(tierId, "utf8"),
    encodeU64LE(roundNumber),
    encodeU32LE(nonce),
  ]).toString("hex");
}

/**
 * Draw for the `splitIndex`-th winner of a round. Split 0 is the delivered
 * draw itself; later splits hash it with the token so every split is drawn
 * independently from the same window (with replacement).
 */
export function deriveSplitDraw(
  drawValue: bigint,
  token: string,
  splitIndex: number,
  rangeUpperBound: bigint
): bigint {
  if (splitIndex === 0) return drawValue;
  const digest = sha256([
    SEED_SPLIT,
    Buffer.from(token, "hex"),
    encodeU64LE(drawValue),
    encodeU32LE(splitIndex),
  ]);
  return decodeU64LE(digest.subarray(0, 8)) % rangeUpperBound;
}

// ─── Hash-commit oracle ───────────────────────────────────

/**
 * In-process randomness source. The operator publishes `commitment()`
 * (SHA-256 of the secret seed) up front; each draw's proof is
 * HMAC-SHA256(seed, token), so anyone holding the revealed seed can recheck
 * every past draw. Requests queue until `takePending()` drains them.
 */
export class HashCommitOracle implements RandomnessSource {
  private readonly queue: DrawRequest[] = [];

  constructor(private readonly seed: Buffer) {
    if (seed.length < 16) {
      throw new Error("Oracle seed must be at least 16 bytes");
    }
  }

  static fromSecret(secret: string): HashCommitOracle {
    return new HashCommitOracle(createHash("sha256").update(secret, "utf8").digest());
  }

  commitment(): string {
    return createHash("sha256").update(this.seed).digest("hex");
  }

  proofFor(token: string): string {
    return createHmac("sha256", this.seed).update(token, "utf8").digest("hex");
  }

  drawFor(token: string, rangeUpperBound: bigint): bigint {
    const proof = Buffer.from(this.proofFor(token), "hex");
    return decodeU64LE(proof.subarray(0, 8)) % rangeUpperBound;
  }

  requestDraw(rangeUpperBound: bigint, token: string): void {
    if (rangeUpperBound <= 0n) {
      throw new Error(`Draw range must be positive, got ${rangeUpperBound}`);
    }
    this.queue.push({ token, rangeUpperBound });
  }

  pending(): DrawRequest[] {
    return [...this.queue];
  }

  takePending(): DrawRequest[] {
    return this.queue.splice(0, this.queue.length);
  }

  fulfil(request: DrawRequest): DrawFulfilment {
    return {
      token: request.token,
      drawValue: this.drawFor(request.token, request.rangeUpperBound),
      proof: this.proofFor(request.token),
    };
  }

  verify(token: string, drawValue: bigint, proof: string, rangeUpperBound: bigint): boolean {
    const expected = Buffer.from(this.proofFor(token), "hex");
    const given = Buffer.from(proof, "hex");
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      return false;
    }
    return drawValue === this.drawFor(token, rangeUpperBound);
  }
}
