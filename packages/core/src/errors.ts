/**
 * errors.ts
 *
 * Every rejected operation throws a ProtocolError. Codes follow the
 * contract convention of numbered `(err uN)` responses so that callers
 * can match on either the kind or the numeric code.
 */

export const ERROR_CODES = {
  Unauthorized:            100,
  ZeroAddress:             101,
  InvalidParameter:        102,
  InsufficientBalance:     103,
  InsufficientAllowance:   104,
  WaitingTimeNotCompleted: 110,
  NoFeesToDistribute:      120,
  BondNotFound:            200,
  AlreadyWithdrawn:        201,
  NotOwner:                202,
  NotMatured:              203,
  InvalidAmount:           205,
  InvalidMaturity:         206,
  InvalidFee:              207,
  AssetTransferFailed:     208,
  ReentrantCall:           209,
} as const;

export type ErrorKind = keyof typeof ERROR_CODES;

export class ProtocolError extends Error {
  readonly kind: ErrorKind;
  readonly code: number;

  constructor(kind: ErrorKind, message?: string) {
    super(message ? `${kind}: ${message}` : kind);
    this.name = "ProtocolError";
    this.kind = kind;
    this.code = ERROR_CODES[kind];
  }
}

/** Raised by loadConfig() for missing or malformed settings. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Short description of any thrown value, for log lines. */
export function describeError(err: unknown): string {
  if (err instanceof ProtocolError) return err.kind;
  if (err instanceof Error) return err.message;
  return String(err);
}
