// Interfaces of the collaborators the ledger core calls synchronously.
// A thrown error or a `false` return aborts the enclosing operation.

import type { Principal } from "./ledger";

/** Custody of a non-native asset. */
export interface AssetTransferProvider {
  transferIn(from: Principal, amount: bigint): boolean;
  transferOut(to: Principal, amount: bigint): boolean;
}

/** Issues and tracks the unique certificates that own bonds. */
export interface CertificateIssuer {
  issue(owner: Principal): bigint;
  ownerOf(certificateId: bigint): Principal | undefined;
}

/** Consumes distributed refraction fees to update per-holder share indexes. */
export interface RewardIndexSink {
  epochRewardShareIndex(amount: bigint): void;
}

/** Source of block time, in unix seconds. */
export interface Clock {
  now(): number;
}
