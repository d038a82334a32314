export * from "./lib/constants";
export * from "./lib/errors";
export * from "./lib/math";
export * from "./lib/ledger";
export * from "./lib/selector";
export * from "./lib/tiers";
export * from "./lib/bonus";
export * from "./lib/randomness";
export * from "./lib/valueLedger";
export * from "./lib/roundMachine";
export * from "./lib/jackpot";
export * from "./lib/format";
