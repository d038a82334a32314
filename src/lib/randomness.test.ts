import { createHash, createHmac } from "crypto";
import { describe, expect, test } from "vitest";
import {
  HashCommitOracle,
  correlationToken,
  decodeU64LE,
  deriveSplitDraw,
  encodeU32LE,
  encodeU64LE,
} from "./randomness";

describe("correlationToken", () => {
  test("is a 32-byte hex digest that changes with tier, round and nonce", () => {
    const a = correlationToken("hourly", 0, 0);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(correlationToken("hourly", 0, 0)).toBe(a);
    expect(correlationToken("monthly", 0, 0)).not.toBe(a);
    expect(correlationToken("hourly", 1, 0)).not.toBe(a);
    expect(correlationToken("hourly", 0, 1)).not.toBe(a);
  });
});

describe("deriveSplitDraw", () => {
  const token = correlationToken("yearly", 3, 9);

  test("split 0 is the delivered draw", () => {
    expect(deriveSplitDraw(17n, token, 0, 20n)).toBe(17n);
  });

  test("later splits stay in range and are deterministic", () => {
    for (let i = 1; i < 50; i++) {
      const d = deriveSplitDraw(5n, token, i, 13n);
      expect(d).toBeGreaterThanOrEqual(0n);
      expect(d).toBeLessThan(13n);
      expect(deriveSplitDraw(5n, token, i, 13n)).toBe(d);
    }
  });
});

describe("u64 encoding", () => {
  test("little-endian layout", () => {
    expect(Array.from(encodeU64LE(0x0102030405060708n))).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
    expect(decodeU64LE(encodeU64LE(123_456_789n))).toBe(123_456_789n);
    expect(Array.from(encodeU64LE(258))).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(encodeU32LE(0x01020304))).toEqual([4, 3, 2, 1]);
  });
});

describe("HashCommitOracle", () => {
  const oracle = HashCommitOracle.fromSecret("test-secret");
  const seed = createHash("sha256").update("test-secret", "utf8").digest();

  test("commitment is the SHA-256 of the seed", () => {
    expect(oracle.commitment()).toBe(createHash("sha256").update(seed).digest("hex"));
  });

  test("proof is HMAC-SHA256(seed, token) and the draw is its first 8 bytes mod range", () => {
    const token = correlationToken("hourly", 0, 0);
    const mac = createHmac("sha256", seed).update(token, "utf8").digest();
    expect(oracle.proofFor(token)).toBe(mac.toString("hex"));
    expect(oracle.drawFor(token, 1_000n)).toBe(mac.readBigUInt64LE(0) % 1_000n);
  });

  test("queues requests until drained and fulfils them verifiably", () => {
    const local = HashCommitOracle.fromSecret("test-secret");
    const token = correlationToken("monthly", 2, 5);
    local.requestDraw(7n, token);
    expect(local.pending()).toHaveLength(1);

    const snapshot = local.pending();
    snapshot.pop();
    expect(local.pending()).toHaveLength(1);

    const [request] = local.takePending();
    expect(local.pending()).toHaveLength(0);

    const f = local.fulfil(request);
    expect(f.token).toBe(token);
    expect(f.drawValue).toBeLessThan(7n);
    expect(local.verify(f.token, f.drawValue, f.proof, 7n)).toBe(true);
  });

  test("rejects a forged proof, a wrong draw or a different seed", () => {
    const token = correlationToken("decade", 0, 1);
    const { drawValue, proof } = oracle.fulfil({ token, rangeUpperBound: 50n });

    expect(oracle.verify(token, drawValue, "00".repeat(32), 50n)).toBe(false);
    expect(oracle.verify(token, (drawValue + 1n) % 50n, proof, 50n)).toBe(false);
    expect(oracle.verify(token, drawValue, "abcd", 50n)).toBe(false);
    expect(HashCommitOracle.fromSecret("other-secret").verify(token, drawValue, proof, 50n)).toBe(false);
  });

  test("refuses empty ranges and short seeds", () => {
    expect(() => oracle.requestDraw(0n, "ab")).toThrow(/range must be positive/);
    expect(() => new HashCommitOracle(Buffer.alloc(8))).toThrow(/at least 16 bytes/);
  });
});
