export * from "./bond-registry";
export * from "./certificates";
export * from "./clock";
export * from "./config";
export * from "./constants";
export * from "./errors";
export * from "./events";
export * from "./fee-distributor";
export * from "./ledger";
export * from "./logger";
export * from "./permissions";
export * from "./protocol";
export * from "./runtime";
export * from "./tiers";
export * from "./vesting-minter";
