import { describe, it, expect } from "vitest";
import { Cl } from "@stacks/transactions";
import {
  EventLog,
  ManualClock,
  ProtocolError,
  Runtime,
  createLogger,
  encodeEvent,
  type Snapshotable,
} from "@refract/core";
import { GENESIS, WALLET_1, WALLET_2, errorOf, setup } from "./support";

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

class Counter implements Snapshotable<number> {
  value = 0;
  snapshot(): number {
    return this.value;
  }
  restore(state: number): void {
    this.value = state;
  }
}

function runtimeWithCounter() {
  const runtime = new Runtime(new ManualClock(GENESIS), createLogger("runtime", "silent"));
  const counter = new Counter();
  runtime.register(counter);
  return { runtime, counter };
}

// -----------------------------------------------------------------------

describe("runtime", () => {
  describe("atomic", () => {
    it("keeps the effects of a successful operation", () => {
      const { runtime, counter } = runtimeWithCounter();
      const result = runtime.atomic("increment", () => {
        counter.value += 1;
        return "done";
      });
      expect(result).toBe("done");
      expect(counter.value).toBe(1);
    });

    it("rolls back every effect of a failed operation, nested calls included", () => {
      const { runtime, counter } = runtimeWithCounter();
      counter.value = 10;

      expect(() =>
        runtime.atomic("outer", () => {
          counter.value = 11;
          runtime.atomic("inner", () => {
            counter.value = 12;
          });
          throw new ProtocolError("InvalidParameter");
        })
      ).toThrow(ProtocolError);

      expect(counter.value).toBe(10);
      expect(runtime.inTransaction).toBe(false);
    });

    it("rolls back the outer operation when a nested one fails", () => {
      const { runtime, counter } = runtimeWithCounter();

      expect(() =>
        runtime.atomic("outer", () => {
          counter.value = 1;
          runtime.atomic("inner", () => {
            throw new Error("boom");
          });
        })
      ).toThrow("boom");

      expect(counter.value).toBe(0);
    });
  });

  describe("nonReentrant", () => {
    it("rejects re-entry under the same key", () => {
      const { runtime } = runtimeWithCounter();
      const err = errorOf(() => runtime.nonReentrant("vault", () => runtime.nonReentrant("vault", () => 1)));
      expect(err.kind).toBe("ReentrantCall");
      expect(err.code).toBe(209);
    });

    it("allows different keys and releases the guard afterwards", () => {
      const { runtime } = runtimeWithCounter();
      expect(runtime.nonReentrant("a", () => runtime.nonReentrant("b", () => 2))).toBe(2);
      expect(runtime.nonReentrant("a", () => 3)).toBe(3);
    });

    it("releases the guard when the guarded section throws", () => {
      const { runtime } = runtimeWithCounter();
      expect(() => runtime.nonReentrant("a", () => {
        throw new Error("fail");
      })).toThrow("fail");
      expect(runtime.nonReentrant("a", () => 4)).toBe(4);
    });
  });
});

describe("event log", () => {
  it("drops events emitted by a reverted operation", () => {
    const h = setup();
    h.fund(WALLET_1, 100n);
    const before = h.events.size;

    errorOf(() => h.ledger.transfer(WALLET_1, WALLET_2, 500n));

    expect(h.events.size).toBe(before);
    expect(h.events.last()).toEqual({ type: "mint", at: GENESIS, account: WALLET_1, amount: 100n });
  });

  it("restores to a checkpoint length", () => {
    const log = new EventLog();
    log.emit({ type: "mint", at: 1, account: WALLET_1, amount: 1n });
    const saved = log.snapshot();
    log.emit({ type: "burn", at: 2, account: WALLET_1, amount: 1n });
    log.restore(saved);
    expect(log.all()).toHaveLength(1);
  });

  it("encodes a record as a Clarity tuple", () => {
    const tuple = encodeEvent({ type: "fee-distribution", at: 1_000, amount: 50n, recipient: WALLET_2 });
    const pretty = Cl.prettyPrint(tuple);
    expect(pretty).toContain("amount: u50");
    expect(pretty).toContain('event: "fee-distribution"');
    expect(pretty).toContain(`recipient: "${WALLET_2}"`);
  });

  it("kebab-cases field names and flattens the asset kind", () => {
    const tuple = encodeEvent({
      type: "bond-deposit",
      at: 0,
      certificateId: 3n,
      depositor: WALLET_1,
      principal: 1000n,
      maturityDays: 15,
      bondFeeBps: 0,
      asset: { kind: "external", assetId: "sbtc" },
      refractionIndex: 1150n,
    });
    const pretty = Cl.prettyPrint(tuple);
    expect(pretty).toContain("certificate-id: u3");
    expect(pretty).toContain("refraction-index: u1150");
    expect(pretty).toContain('asset: "external:sbtc"');
  });
});
