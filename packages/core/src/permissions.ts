import type { Capability, Principal } from "@refract/types";
import { ProtocolError } from "./errors";

/**
 * Capability table injected into every component.
 * Assigning capabilities is an administrative concern outside the core;
 * components only ever call require().
 */
export class PermissionTable {
  private readonly grants = new Map<Capability, Set<Principal>>();

  grant(capability: Capability, principal: Principal): void {
    const holders = this.grants.get(capability) ?? new Set<Principal>();
    holders.add(principal);
    this.grants.set(capability, holders);
  }

  revoke(capability: Capability, principal: Principal): void {
    this.grants.get(capability)?.delete(principal);
  }

  has(principal: Principal, capability: Capability): boolean {
    return this.grants.get(capability)?.has(principal) ?? false;
  }

  require(principal: Principal, capability: Capability): void {
    if (!this.has(principal, capability)) {
      throw new ProtocolError("Unauthorized", `${principal} lacks the ${capability} capability`);
    }
  }
}
