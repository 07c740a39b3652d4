import type { CertificateIssuer, Principal } from "@refract/types";
import type { Snapshotable } from "./runtime";

interface IssuerState {
  nextId: bigint;
  owners: Map<bigint, Principal>;
}

/**
 * In-process certificate collection: ids are handed out sequentially from 0,
 * like a SIP-009 collection's last-token-id counter. Registered with the
 * runtime by createProtocol(), so a reverted deposit also reverts its issue.
 */
export class SequentialCertificateIssuer implements CertificateIssuer, Snapshotable<IssuerState> {
  private nextId = 0n;
  private owners = new Map<bigint, Principal>();

  issue(owner: Principal): bigint {
    const id = this.nextId;
    this.nextId += 1n;
    this.owners.set(id, owner);
    return id;
  }

  ownerOf(certificateId: bigint): Principal | undefined {
    return this.owners.get(certificateId);
  }

  transfer(certificateId: bigint, from: Principal, to: Principal): void {
    const owner = this.owners.get(certificateId);
    if (owner !== from) {
      throw new Error(`Certificate ${certificateId} is not owned by ${from}`);
    }
    this.owners.set(certificateId, to);
  }

  /** Number of certificates issued so far. */
  count(): bigint {
    return this.nextId;
  }

  snapshot(): IssuerState {
    return { nextId: this.nextId, owners: new Map(this.owners) };
  }

  restore(state: IssuerState): void {
    this.nextId = state.nextId;
    this.owners = state.owners;
  }
}
