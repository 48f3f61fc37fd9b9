import { silentAlerts, type AlertSink } from "../alerts.js";
import type { RunningPhase, TimerPhase, TimerView } from "../types.js";
import { checkedAdd, checkedSub, durationSince, saturatingAdd, systemClock, toSpan, type MonotonicClock } from "./clock.js";
import { formatRemaining } from "./format.js";

export const MIN_WORK_MS = 5 * 60 * 1000;
export const REST_FRACTION = 5;

interface IntervalTimerOptions {
  clock?: MonotonicClock;
  alerts?: AlertSink;
}

/**
 * Work/rest interval timer driven by a single absolute deadline.
 *
 * The host calls `update()` on its own cadence; nothing here schedules work.
 * Every method is total: bad spans are clamped and invalid transitions are ignored.
 */
export class IntervalTimer {
  private readonly clock: MonotonicClock;
  private readonly alerts: AlertSink;
  private work: number;
  private rest: number;
  private deadline: number;
  private phase: TimerPhase = { kind: "inactive" };

  constructor(workMs: number, options: IntervalTimerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.alerts = options.alerts ?? silentAlerts;
    this.work = toSpan(workMs);
    this.rest = this.work / REST_FRACTION;
    this.deadline = this.deadlineIn(this.work);
  }

  get workMs(): number {
    return this.work;
  }

  get restMs(): number {
    return this.rest;
  }

  currentPhase(): TimerPhase {
    return { ...this.phase };
  }

  start(): void {
    switch (this.phase.kind) {
      case "inactive":
        if (this.work === 0) {
          return;
        }
        this.deadline = this.deadlineIn(this.work);
        this.phase = { kind: "working" };
        return;
      case "paused":
        this.resume();
        return;
      default:
        return;
    }
  }

  stop(): void {
    if (this.phase.kind === "working" || this.phase.kind === "resting") {
      this.phase = { kind: "paused", pausedAt: this.clock.now(), resumeTo: this.phase.kind };
    }
  }

  pause(): void {
    this.stop();
  }

  resume(): void {
    if (this.phase.kind !== "paused") {
      return;
    }
    const pausedFor = durationSince(this.clock.now(), this.phase.pausedAt);
    this.deadline = checkedAdd(this.deadline, pausedFor) ?? this.deadline;
    this.phase = { kind: this.phase.resumeTo };
  }

  togglePause(): void {
    switch (this.phase.kind) {
      case "working":
      case "resting":
        this.stop();
        return;
      case "paused":
      case "inactive":
        this.start();
        return;
    }
  }

  reset(): void {
    this.phase = { kind: "inactive" };
  }

  /** Ends the current phase now and begins the next one. */
  flip(): void {
    switch (this.phase.kind) {
      case "working":
        this.enter("resting");
        break;
      case "resting":
        this.enter("working");
        break;
      case "paused":
        this.enter(this.phase.resumeTo === "working" ? "resting" : "working");
        break;
      case "inactive":
        if (this.work === 0) {
          return;
        }
        this.enter("working");
        break;
    }
    this.ring();
  }

  /** Flips at most once, and only when the running phase has run out. */
  update(): boolean {
    if (this.phase.kind !== "working" && this.phase.kind !== "resting") {
      return false;
    }
    if (this.remainingMs() > 0) {
      return false;
    }
    this.flip();
    return true;
  }

  tick(): boolean {
    return this.update();
  }

  remainingMs(): number {
    switch (this.phase.kind) {
      case "inactive":
        return this.work;
      case "paused":
        return durationSince(this.deadline, this.phase.pausedAt);
      case "working":
      case "resting":
        return durationSince(this.deadline, this.clock.now());
    }
  }

  increaseDuration(deltaMs: number): void {
    const delta = toSpan(deltaMs);
    this.setWork(saturatingAdd(this.work, delta));
    if (this.phase.kind !== "inactive") {
      this.deadline = checkedAdd(this.deadline, delta) ?? this.deadline;
    }
  }

  decreaseDuration(deltaMs: number): void {
    const delta = toSpan(deltaMs);
    this.setWork(Math.max(this.work - delta, MIN_WORK_MS));
    if (this.phase.kind !== "inactive") {
      this.deadline = checkedSub(this.deadline, delta) ?? this.deadline;
    }
  }

  format(): string {
    return formatRemaining(this.remainingMs());
  }

  snapshot(): TimerView {
    const remainingMs = this.remainingMs();
    return {
      phase: this.phase.kind,
      ...(this.phase.kind === "paused" ? { resumeTo: this.phase.resumeTo } : {}),
      workMs: this.work,
      restMs: this.rest,
      remainingMs,
      display: formatRemaining(remainingMs)
    };
  }

  private setWork(workMs: number): void {
    this.work = workMs;
    this.rest = workMs / REST_FRACTION;
  }

  private enter(next: RunningPhase): void {
    this.deadline = this.deadlineIn(next === "working" ? this.work : this.rest);
    this.phase = { kind: next };
  }

  private deadlineIn(span: number): number {
    const now = this.clock.now();
    return checkedAdd(now, span) ?? now;
  }

  private ring(): void {
    try {
      this.alerts.ring();
    } catch (error) {
      console.error("Alert sink failed", error);
    }
  }
}
