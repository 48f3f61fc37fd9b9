import { test } from "node:test";
import assert from "node:assert/strict";
import { addMilliseconds, formatISO } from "date-fns";
import type { TimerView } from "../src/types.js";
import { buildInlineCard, buildPip, buildTimerStructuredContent } from "../src/ui/builders.js";

const NOW = new Date(Date.UTC(2026, 0, 5, 9, 30, 0));

const idle: TimerView = {
  phase: "inactive",
  workMs: 25 * 60000,
  restMs: 5 * 60000,
  remainingMs: 25 * 60000,
  display: "25:00"
};

const working: TimerView = { ...idle, phase: "working", remainingMs: 12 * 60000, display: "12:00" };

const pausedRest: TimerView = {
  ...idle,
  phase: "paused",
  resumeTo: "resting",
  remainingMs: 4 * 60000,
  display: "4:00"
};

test("idle timers offer to start", () => {
  assert.deepEqual(buildInlineCard(idle), {
    surface: "inline_card",
    heading: "Pomodoro",
    body: "25:00 work session ready",
    cta: { label: "Start", action: "start_timer" },
    accessibilityLabel: "Pomodoro, 25:00 work session ready"
  });
  assert.equal(buildPip(idle, NOW), undefined);
});

test("running timers project their end time", () => {
  assert.deepEqual(buildPip(working, NOW), {
    surface: "picture_in_picture",
    title: "Focus",
    remaining: "12:00",
    phase: "working",
    endsAt: formatISO(addMilliseconds(NOW, 12 * 60000)),
    cta: { label: "Pause", action: "pause_timer" },
    dismissOnComplete: false
  });
});

test("paused timers are labelled by the phase they will resume", () => {
  const card = buildInlineCard(pausedRest);
  assert.equal(card.heading, "Break");
  assert.equal(card.badge, "Paused");
  assert.equal(card.body, "Paused with 4:00 left");
  assert.deepEqual(card.cta, { label: "Resume", action: "resume_timer" });

  const pip = buildPip(pausedRest, NOW);
  assert.equal(pip?.endsAt, undefined);
  assert.deepEqual(pip?.cta, { label: "Resume", action: "resume_timer" });
});

test("structured content lists the alerts raised", () => {
  const content = buildTimerStructuredContent({
    timer: working,
    now: NOW,
    alerts: [
      { id: "alert-1", phase: "resting", at: "2026-01-05T09:00:00Z" },
      { id: "alert-2", phase: "working", at: "2026-01-05T09:05:00Z" }
    ]
  });

  assert.equal(content.app, "Pomodoro");
  assert.deepEqual(content.alerts, [
    { id: "alert-1", label: "Time for a break", at: "2026-01-05T09:00:00Z" },
    { id: "alert-2", label: "Back to work", at: "2026-01-05T09:05:00Z" }
  ]);
  assert.equal(buildTimerStructuredContent({ timer: idle }).alerts, undefined);
});
