import { performance } from "perf_hooks";

/** Monotonic time source, in milliseconds. */
export interface MonotonicClock {
  now(): number;
}

export const systemClock: MonotonicClock = {
  now: () => performance.now()
};

export const MAX_SPAN_MS = Number.MAX_SAFE_INTEGER;

export function toSpan(ms: number): number {
  if (Number.isNaN(ms) || ms <= 0) {
    return 0;
  }
  return ms > MAX_SPAN_MS ? MAX_SPAN_MS : ms;
}

export function saturatingAdd(a: number, b: number): number {
  return Math.min(toSpan(a) + toSpan(b), MAX_SPAN_MS);
}

/** Shifts an instant, or returns undefined when it would leave the representable range. Instants may be negative. */
export function checkedAdd(instant: number, span: number): number | undefined {
  const shifted = instant + toSpan(span);
  return shifted > MAX_SPAN_MS ? undefined : shifted;
}

export function checkedSub(instant: number, span: number): number | undefined {
  const shifted = instant - toSpan(span);
  return shifted < -MAX_SPAN_MS ? undefined : shifted;
}

export function durationSince(later: number, earlier: number): number {
  const diff = later - earlier;
  return diff > 0 ? diff : 0;
}
