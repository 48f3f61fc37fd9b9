import type { AlertSink } from "../../src/alerts.js";
import type { MonotonicClock } from "../../src/core/clock.js";

export const MINUTE = 60000;

export class ManualClock implements MonotonicClock {
  constructor(private current = 1000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export class CountingAlerts implements AlertSink {
  rings = 0;

  ring(): void {
    this.rings += 1;
  }
}
