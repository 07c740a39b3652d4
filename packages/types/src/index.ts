export type * from "./bond";
export type * from "./collaborators";
export type * from "./events";
export type * from "./ledger";
export type * from "./vesting";
