/**
 * Jackpot Crank: tier settlement scheduler.
 *
 * Hosts the engine and polls it every POLL_INTERVAL_MS:
 *   - requestSettlement  for every accruing tier whose period has elapsed
 *   - onDrawReceived     once the oracle's draw is ready (RANDOMNESS_DELAY_MS)
 *   - archive            each settlement to Firebase (write-once)
 *   - resetStuckRequest  after RANDOMNESS_TIMEOUT_SEC when AUTO_RESET_STUCK=1
 *
 * Deposits, bonus claims and house sweeps come in through the actions server
 * on ACTIONS_PORT (see server.ts).
 *
 * The admin keypair and the oracle seed stay on the server.
 */
import "dotenv/config";
import { Keypair, PublicKey } from "@solana/web3.js";
import { randomBytes } from "crypto";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import {
  errorMessage,
  formatUsdc,
  HashCommitOracle,
  InMemoryValueLedger,
  Jackpot,
  shortenAddr,
} from "../../src/index.js";
import { loadCrankConfig } from "./constants.js";
import { buildArchivedSettlement, initFirebase, saveSettlementToFirebase } from "./firebase.js";
import { log, scopedLog } from "./log.js";
import { createActionServer } from "./server.js";
import { SettlementCrank } from "./settlementCrank.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// ─── Load admin wallet ──────────────────────────────────────

function loadAdminWallet(): Keypair {
  const walletPath = process.env.CRANK_KEYPAIR_PATH;
  if (!walletPath) {
    console.warn("⚠ CRANK_KEYPAIR_PATH not set, using an ephemeral admin key");
    return Keypair.generate();
  }
  const resolved = path.resolve(__dirname, "..", walletPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Admin wallet not found at ${resolved}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  if (!Array.isArray(raw) || !raw.every((n): n is number => typeof n === "number")) {
    throw new Error(`Admin wallet at ${resolved} is not a secret key byte array`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

function loadOracle(): HashCommitOracle {
  const secret = process.env.ORACLE_SEED;
  if (!secret) {
    console.warn("⚠ ORACLE_SEED not set, using a random seed (draws cannot be re-verified after restart)");
    return new HashCommitOracle(randomBytes(32));
  }
  return HashCommitOracle.fromSecret(secret);
}

// ─── Entry point ────────────────────────────────────────────

async function main() {
  const config = loadCrankConfig();

  console.log("═══════════════════════════════════════════");
  console.log("   Jackpot Settlement Crank");
  console.log("═══════════════════════════════════════════");
  console.log(`Poll:        ${config.pollIntervalMs}ms`);
  console.log(`Ticket:      ${formatUsdc(config.ticketPrice)} USDC`);
  console.log(`Referral:    ${config.referralBps} bps`);
  console.log(`Draw delay:  ${config.randomnessDelayMs}ms`);
  console.log(`Timeout:     ${config.randomnessTimeoutSec}s (auto-reset ${config.autoResetStuck ? "on" : "off"})`);
  console.log(`Health log:  ${config.healthLogIntervalSec}s`);
  console.log(`Stuck warn:  awaiting=${config.stuckAwaitingSec}s repeat=${config.stuckWarnRepeatSec}s`);
  console.log(`Actions:     ${config.actionsPort > 0 ? `port ${config.actionsPort}` : "disabled"}`);
  console.log();

  const admin = loadAdminWallet();
  const vault = process.env.VAULT_PUBKEY
    ? new PublicKey(process.env.VAULT_PUBKEY)
    : await PublicKey.createWithSeed(admin.publicKey, "vault", admin.publicKey);
  const oracle = loadOracle();
  console.log(`Admin:       ${shortenAddr(admin.publicKey)}`);
  console.log(`Vault:       ${shortenAddr(vault)}`);
  console.log(`Oracle:      commitment ${oracle.commitment()}`);

  const valueLedger = new InMemoryValueLedger();
  const jackpot = new Jackpot({
    admin: admin.publicKey,
    vault,
    valueLedger,
    randomness: oracle,
    ticketPrice: config.ticketPrice,
    referralBps: config.referralBps,
    randomnessTimeoutSec: config.randomnessTimeoutSec,
    log: scopedLog("engine"),
  });

  const archiveEnabled = initFirebase();
  const crank = new SettlementCrank({
    jackpot,
    oracle,
    admin: admin.publicKey,
    config,
    archive: archiveEnabled ? (record) => saveSettlementToFirebase(buildArchivedSettlement(record)) : undefined,
    log,
  });

  for (const snap of jackpot.tierSnapshots()) {
    console.log(`Tier:        ${snap.id} share=${snap.shareBps}bps next_due=${new Date(snap.nextDueAt * 1000).toISOString()}`);
  }
  console.log("═══════════════════════════════════════════");
  console.log();

  if (config.actionsPort > 0) {
    const apiKey = process.env.ACTIONS_API_KEY;
    if (!apiKey) console.warn("⚠ ACTIONS_API_KEY not set, join/claim/credit/house routes are disabled");
    const app = createActionServer({ jackpot, valueLedger, nowSec: () => Math.floor(Date.now() / 1000), log: scopedLog("actions") }, apiKey);
    app.listen(config.actionsPort, () => log(`Actions server listening on :${config.actionsPort}`));
  }

  process.on("SIGINT", () => {
    log(`Shutting down (settled=${crank.settled()} queued_draws=${crank.queuedDraws()})`);
    process.exit(0);
  });

  // Run
  const loop = async () => {
    try {
      await crank.tick(Date.now());
    } catch (e) {
      log(`✗ Tick error: ${errorMessage(e)}`);
    }
    setTimeout(() => void loop(), config.pollIntervalMs);
  };

  await loop();
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
