import { addMilliseconds, formatISO } from "date-fns";
import type { AlertRecord, TimerView } from "../types.js";

type TimerAction = "start_timer" | "pause_timer" | "resume_timer";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  cta?: {
    label: string;
    action: TimerAction;
  };
  accessibilityLabel: string;
}

export interface PipWidget {
  surface: "picture_in_picture";
  title: string;
  remaining: string;
  phase: TimerView["phase"];
  endsAt?: string;
  cta?: {
    label: string;
    action: "pause_timer" | "resume_timer";
  };
  dismissOnComplete: boolean;
}

export type TimerStructuredContent = {
  app: string;
  inlineCard: InlineCard;
  pictureInPicture?: PipWidget;
  alerts?: Array<{
    id: string;
    label: string;
    at: string;
  }>;
};

export const APP_NAME = "Pomodoro";

export function buildInlineCard(timer: TimerView): InlineCard {
  return {
    surface: "inline_card",
    heading: heading(timer),
    body: statusCopy(timer),
    ...(timer.phase === "paused" ? { badge: "Paused" } : {}),
    cta: callToAction(timer),
    accessibilityLabel: `${heading(timer)}, ${statusCopy(timer)}`
  };
}

export function buildPip(timer: TimerView, now: Date = new Date()): PipWidget | undefined {
  if (timer.phase === "inactive") {
    return undefined;
  }
  const cta = callToAction(timer);
  return {
    surface: "picture_in_picture",
    title: heading(timer),
    remaining: timer.display,
    phase: timer.phase,
    endsAt: timer.phase === "paused" ? undefined : formatISO(addMilliseconds(now, timer.remainingMs)),
    cta: cta && cta.action !== "start_timer" ? { label: cta.label, action: cta.action } : undefined,
    dismissOnComplete: false
  };
}

export function buildTimerStructuredContent(input: {
  timer: TimerView;
  alerts?: AlertRecord[];
  now?: Date;
}): TimerStructuredContent {
  const { timer, alerts = [], now } = input;
  return {
    app: APP_NAME,
    inlineCard: buildInlineCard(timer),
    pictureInPicture: buildPip(timer, now),
    alerts: alerts.length > 0
      ? alerts.map(alert => ({
        id: alert.id,
        label: alert.phase === "working" ? "Back to work" : "Time for a break",
        at: alert.at
      }))
      : undefined
  };
}

function heading(timer: TimerView): string {
  const phase = timer.phase === "paused" ? timer.resumeTo : timer.phase;
  switch (phase) {
    case "working":
      return "Focus";
    case "resting":
      return "Break";
    default:
      return "Pomodoro";
  }
}

function callToAction(timer: TimerView): InlineCard["cta"] {
  switch (timer.phase) {
    case "inactive":
      return { label: "Start", action: "start_timer" };
    case "paused":
      return { label: "Resume", action: "resume_timer" };
    default:
      return { label: "Pause", action: "pause_timer" };
  }
}

function statusCopy(timer: TimerView): string {
  switch (timer.phase) {
    case "inactive":
      return `${timer.display} work session ready`;
    case "paused":
      return `Paused with ${timer.display} left`;
    default:
      return `${timer.display} remaining`;
  }
}
