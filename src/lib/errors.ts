/**
 * Engine error codes. Numbers follow the 6000-based custom error range so
 * that log lines look the same as on-chain program failures.
 */
export const JackpotErrorCode = {
  InvalidInput: 6000,
  InsufficientBalance: 6001,
  TransferFailed: 6002,
  ThresholdNotMet: 6003,
  AlreadyAwaitingRandomness: 6004,
  UnrecognizedCorrelationToken: 6005,
  ProofVerificationFailed: 6006,
  NoValidWinner: 6007,
  NothingToWithdraw: 6008,
  Unauthorized: 6009,
} as const;

export type JackpotErrorName = keyof typeof JackpotErrorCode;

export class JackpotError extends Error {
  readonly code: JackpotErrorName;
  readonly errorNumber: number;
  /** Set only for ledger invariant violations; never retry these. */
  readonly fatal: boolean;

  constructor(code: JackpotErrorName, detail: string) {
    super(`${code} (${JackpotErrorCode[code]}): ${detail}`);
    this.name = "JackpotError";
    this.code = code;
    this.errorNumber = JackpotErrorCode[code];
    this.fatal = code === "NoValidWinner";
  }
}

export function isJackpotError(
  error: unknown,
  code?: JackpotErrorName
): error is JackpotError {
  if (!(error instanceof JackpotError)) return false;
  return code == null || error.code === code;
}

export function errorMessage(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  return String(error);
}
