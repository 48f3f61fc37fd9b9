import { z } from "zod";
import { formatRemaining } from "../core/format.js";
import type { IntervalTimer } from "../core/intervalTimer.js";
import type { PomodoroSession } from "../session.js";
import type { AlertRecord, TimerUpdateResult, TimerView } from "../types.js";

const DEFAULT_STEP_MS = 5 * 60000;

export const adjustmentInput = z
  .object({
    minutes: z.number().int().min(0).max(600).default(0),
    seconds: z.number().int().min(0).max(59).default(0)
  })
  .refine(value => value.minutes > 0 || value.seconds > 0, {
    message: "Adjustments must change the timer by at least one second."
  });

export type Adjustment = z.input<typeof adjustmentInput>;

interface PomodoroToolsetOptions {
  stepMs?: number;
}

export class PomodoroToolset {
  private readonly session: PomodoroSession;
  private readonly stepMs: number;

  constructor(session: PomodoroSession, options: PomodoroToolsetOptions = {}) {
    this.session = session;
    this.stepMs = options.stepMs ?? DEFAULT_STEP_MS;
  }

  status(): TimerUpdateResult {
    const { timer, alerts } = this.run(() => undefined);
    return {
      timer,
      message: describeTimer(timer),
      alerts: alerts.length > 0 ? alerts : this.session.recentAlerts()
    };
  }

  start(): TimerUpdateResult {
    return this.apply(timer => timer.start(), timer =>
      timer.phase === "inactive"
        ? "The work duration is zero, so there is nothing to start."
        : `Started. ${describeTimer(timer)}`
    );
  }

  pause(): TimerUpdateResult {
    return this.apply(timer => timer.pause(), timer =>
      timer.phase === "paused" ? `Paused with ${timer.display} left.` : `Nothing to pause. ${describeTimer(timer)}`
    );
  }

  resume(): TimerUpdateResult {
    return this.apply(timer => timer.resume(), timer =>
      timer.phase === "paused" || timer.phase === "inactive"
        ? `Nothing to resume. ${describeTimer(timer)}`
        : `Resumed. ${describeTimer(timer)}`
    );
  }

  toggle(): TimerUpdateResult {
    return this.apply(timer => timer.togglePause(), describeTimer);
  }

  reset(): TimerUpdateResult {
    return this.apply(timer => timer.reset(), timer => `Reset. Next work session lasts ${timer.display}.`);
  }

  flip(): TimerUpdateResult {
    return this.apply(timer => timer.flip(), timer => `Flipped. ${describeTimer(timer)}`);
  }

  increase(by?: Adjustment): TimerUpdateResult {
    const deltaMs = this.toDeltaMs(by);
    return this.apply(timer => timer.increaseDuration(deltaMs), timer =>
      `Work is now ${formatRemaining(timer.workMs)}, rest ${formatRemaining(timer.restMs)}. ${describeTimer(timer)}`
    );
  }

  decrease(by?: Adjustment): TimerUpdateResult {
    const deltaMs = this.toDeltaMs(by);
    return this.apply(timer => timer.decreaseDuration(deltaMs), timer =>
      `Work is now ${formatRemaining(timer.workMs)}, rest ${formatRemaining(timer.restMs)}. ${describeTimer(timer)}`
    );
  }

  private apply(
    command: (timer: IntervalTimer) => void,
    message: (timer: TimerView) => string
  ): TimerUpdateResult {
    const { timer, alerts } = this.run(command);
    return { timer, message: message(timer), alerts };
  }

  private run(command: (timer: IntervalTimer) => void): { timer: TimerView; alerts: AlertRecord[] } {
    const alerts: AlertRecord[] = [];
    const unsubscribe = this.session.on("alert", alert => {
      alerts.push(alert);
    });
    try {
      this.session.poll();
      command(this.session.timer);
      return { timer: this.session.timer.snapshot(), alerts };
    } finally {
      unsubscribe();
    }
  }

  private toDeltaMs(by?: Adjustment): number {
    if (!by) {
      return this.stepMs;
    }
    const parsed = adjustmentInput.parse(by);
    return parsed.minutes * 60000 + parsed.seconds * 1000;
  }
}

export function describeTimer(timer: TimerView): string {
  switch (timer.phase) {
    case "inactive":
      return `Ready to work for ${timer.display}.`;
    case "working":
      return `Working, ${timer.display} left.`;
    case "resting":
      return `Resting, ${timer.display} left.`;
    case "paused":
      return `Paused during ${timer.resumeTo === "resting" ? "rest" : "work"} with ${timer.display} left.`;
  }
}
