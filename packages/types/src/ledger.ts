// Types for the fee-bearing ledger

/** Stacks-style principal: "ST…" for accounts, "ST….contract-name" for contracts. */
export type Principal = string;

/** Privileged capabilities checked by each component. */
export type Capability = "admin" | "minter" | "treasury" | "distributor";

/** Aggregate supply figures; sum(balances) === totalSupply === totalMinted - totalBurned. */
export interface SupplyState {
  totalSupply: bigint;
  totalMinted: bigint;
  totalBurned: bigint;
}
