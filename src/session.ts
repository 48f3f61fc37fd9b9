import { EventEmitter } from "events";
import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import type { AlertSink } from "./alerts.js";
import type { MonotonicClock } from "./core/clock.js";
import { IntervalTimer } from "./core/intervalTimer.js";
import type { AlertRecord, TimerView } from "./types.js";

interface PomodoroSessionOptions {
  workMs: number;
  tickMs?: number;
  clock?: MonotonicClock;
  wallClock?: () => Date;
}

type SessionEvents = {
  tick: (timer: TimerView) => void;
  alert: (alert: AlertRecord) => void;
};

const DEFAULT_TICK_MS = 1000;
const MAX_ALERTS = 20;

/**
 * Single owner of an {@link IntervalTimer}. Polls it on a fixed cadence and
 * fans its alerts out to subscribers.
 */
export class PomodoroSession implements AlertSink {
  readonly timer: IntervalTimer;
  private readonly emitter = new EventEmitter();
  private readonly tickMs: number;
  private readonly wallClock: () => Date;
  private readonly alerts: AlertRecord[] = [];
  private interval: NodeJS.Timeout | null = null;

  constructor(options: PomodoroSessionOptions) {
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.wallClock = options.wallClock ?? (() => new Date());
    this.timer = new IntervalTimer(options.workMs, { clock: options.clock, alerts: this });
    // One listener per connected MCP session, plus one per in-flight command.
    this.emitter.setMaxListeners(0);
  }

  on<T extends keyof SessionEvents>(event: T, listener: SessionEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  get polling(): boolean {
    return this.interval !== null;
  }

  poll(): TimerView {
    this.timer.update();
    const snapshot = this.timer.snapshot();
    this.emitter.emit("tick", snapshot);
    return snapshot;
  }

  startPolling(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => {
      this.poll();
    }, this.tickMs);
    this.interval.unref();
  }

  stopPolling(): void {
    if (!this.interval) {
      return;
    }
    clearInterval(this.interval);
    this.interval = null;
  }

  ring(): void {
    const phase = this.timer.currentPhase();
    if (phase.kind !== "working" && phase.kind !== "resting") {
      return;
    }
    const record: AlertRecord = {
      id: uuid(),
      phase: phase.kind,
      at: formatISO(this.wallClock())
    };
    this.alerts.push(record);
    if (this.alerts.length > MAX_ALERTS) {
      this.alerts.splice(0, this.alerts.length - MAX_ALERTS);
    }
    this.emitter.emit("alert", record);
  }

  /** Retained alerts raised after the one with `sinceId`, oldest first. An unknown id returns them all. */
  recentAlerts(sinceId?: string): AlertRecord[] {
    const index = sinceId ? this.alerts.findIndex(alert => alert.id === sinceId) : -1;
    return this.alerts.slice(index + 1);
  }
}
