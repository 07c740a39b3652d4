/**
 * events.ts
 *
 * Append-only record of emitted events, rolled back with the rest of the
 * state when an operation reverts, plus the Clarity-tuple encoding used to
 * hand records to audit consumers in the same shape a contract `print`s them.
 */

import { Cl, type ClarityValue } from "@stacks/transactions";
import type { AssetKind, ProtocolEvent, ProtocolEventType } from "@refract/types";
import type { Snapshotable } from "./runtime";

export type EventOfType<K extends ProtocolEventType> = Extract<ProtocolEvent, { type: K }>;

export class EventLog implements Snapshotable<number> {
  private readonly entries: ProtocolEvent[] = [];

  emit(event: ProtocolEvent): void {
    this.entries.push(event);
  }

  all(): readonly ProtocolEvent[] {
    return this.entries;
  }

  ofType<K extends ProtocolEventType>(type: K): EventOfType<K>[] {
    return this.entries.filter((event): event is EventOfType<K> => event.type === type);
  }

  last(): ProtocolEvent | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): number {
    return this.entries.length;
  }

  restore(length: number): void {
    this.entries.length = length;
  }
}

// -----------------------------------------------------------------------
// Clarity encoding
// -----------------------------------------------------------------------

export function describeAsset(asset: AssetKind): string {
  return asset.kind === "native" ? "native" : `external:${asset.assetId}`;
}

function isAssetKind(value: unknown): value is AssetKind {
  return typeof value === "object" && value !== null && "kind" in value;
}

/** certificateId → certificate-id */
function toClarityKey(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function toClarityValue(value: unknown): ClarityValue {
  switch (typeof value) {
    case "bigint":
    case "number":
      return Cl.uint(value);
    case "boolean":
      return Cl.bool(value);
    case "string":
      return Cl.stringAscii(value);
  }
  if (isAssetKind(value)) return Cl.stringAscii(describeAsset(value));
  throw new Error(`Cannot encode ${String(value)} as a Clarity value`);
}

/**
 * Encode an event as a Clarity tuple: `type` becomes the `event` field,
 * other keys are kebab-cased, amounts and times become uints, principals
 * ascii strings.
 */
export function encodeEvent(event: ProtocolEvent): ClarityValue {
  const fields: Record<string, ClarityValue> = {};
  for (const [key, value] of Object.entries(event)) {
    fields[key === "type" ? "event" : toClarityKey(key)] = toClarityValue(value);
  }
  return Cl.tuple(fields);
}
