import type { Clock } from "@refract/types";
import { DAY_SECONDS } from "./constants";

/** Clock that only moves when told to, like mining empty blocks. */
export class ManualClock implements Clock {
  private time: number;

  constructor(start: number) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  advance(seconds: number): void {
    if (seconds < 0) throw new Error(`Cannot move the clock backwards by ${seconds}s`);
    this.time += seconds;
  }

  advanceDays(days: number): void {
    this.advance(days * DAY_SECONDS);
  }

  set(time: number): void {
    if (time < this.time) throw new Error(`Cannot move the clock back to ${time}`);
    this.time = time;
  }
}
