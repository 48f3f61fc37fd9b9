import { test } from "node:test";
import assert from "node:assert/strict";
import { ZodError } from "zod";
import { PomodoroSession } from "../src/session.js";
import { PomodoroToolset } from "../src/tools/pomodoroTool.js";
import { ManualClock, MINUTE } from "./support/manualClock.js";

function createToolset(workMs = 25 * MINUTE) {
  const clock = new ManualClock();
  const session = new PomodoroSession({ workMs, clock });
  const toolset = new PomodoroToolset(session);
  return { clock, session, toolset };
}

test("status describes an idle timer", () => {
  const { toolset } = createToolset();

  const result = toolset.status();

  assert.equal(result.timer.phase, "inactive");
  assert.equal(result.message, "Ready to work for 25:00.");
  assert.deepEqual(result.alerts, []);
});

test("start begins a work session", () => {
  const { toolset } = createToolset();

  const result = toolset.start();

  assert.equal(result.timer.phase, "working");
  assert.equal(result.message, "Started. Working, 25:00 left.");
});

test("start with a zero work duration explains why nothing happened", () => {
  const { toolset } = createToolset(0);

  const result = toolset.start();

  assert.equal(result.timer.phase, "inactive");
  assert.equal(result.message, "The work duration is zero, so there is nothing to start.");
});

test("pause and resume keep the remaining time", () => {
  const { clock, toolset } = createToolset();

  toolset.start();
  clock.advance(10 * MINUTE);
  const paused = toolset.pause();
  assert.equal(paused.timer.phase, "paused");
  assert.equal(paused.message, "Paused with 15:00 left.");

  clock.advance(3 * MINUTE);
  const resumed = toolset.resume();
  assert.equal(resumed.timer.phase, "working");
  assert.equal(resumed.message, "Resumed. Working, 15:00 left.");
});

test("pause and resume outside their phases report the current state", () => {
  const { toolset } = createToolset();

  assert.equal(toolset.pause().message, "Nothing to pause. Ready to work for 25:00.");
  assert.equal(toolset.resume().message, "Nothing to resume. Ready to work for 25:00.");
});

test("toggle switches between running and paused", () => {
  const { toolset } = createToolset();

  assert.equal(toolset.toggle().message, "Working, 25:00 left.");
  assert.equal(toolset.toggle().message, "Paused during work with 25:00 left.");
});

test("commands poll first so an expired phase flips before they apply", () => {
  const { clock, toolset } = createToolset();

  toolset.start();
  clock.advance(25 * MINUTE);
  const result = toolset.status();

  assert.equal(result.timer.phase, "resting");
  assert.equal(result.message, "Resting, 5:00 left.");
  assert.equal(result.alerts.length, 1);
  assert.equal(result.alerts[0].phase, "resting");
});

test("status falls back to the recent alerts when nothing new happened", () => {
  const { toolset } = createToolset();

  const flipped = toolset.flip();
  assert.equal(flipped.message, "Flipped. Working, 25:00 left.");
  assert.equal(flipped.alerts.length, 1);

  const status = toolset.status();
  assert.deepEqual(status.alerts, flipped.alerts);
});

test("increase uses the default five minute step", () => {
  const { toolset } = createToolset();

  const result = toolset.increase();

  assert.equal(result.timer.workMs, 30 * MINUTE);
  assert.equal(result.message, "Work is now 30:00, rest 6:00. Ready to work for 30:00.");
});

test("decrease saturates at the five minute floor", () => {
  const { toolset } = createToolset();

  const result = toolset.decrease({ minutes: 60 });

  assert.equal(result.timer.workMs, 5 * MINUTE);
  assert.equal(result.timer.restMs, MINUTE);
  assert.equal(result.message, "Work is now 5:00, rest 1:00. Ready to work for 5:00.");
});

test("adjusting a running session shifts its remaining time", () => {
  const { clock, toolset } = createToolset();

  toolset.start();
  clock.advance(10 * MINUTE);
  const result = toolset.increase({ minutes: 2, seconds: 30 });

  assert.equal(result.timer.remainingMs, 17 * MINUTE + 30 * 1000);
  assert.equal(result.timer.display, "17:30");
});

test("a custom step applies when no adjustment is given", () => {
  const clock = new ManualClock();
  const session = new PomodoroSession({ workMs: 25 * MINUTE, clock });
  const toolset = new PomodoroToolset(session, { stepMs: MINUTE });

  assert.equal(toolset.decrease().timer.workMs, 24 * MINUTE);
});

test("adjustments must change the timer", () => {
  const { toolset } = createToolset();

  assert.throws(() => toolset.increase({ minutes: 0, seconds: 0 }), ZodError);
  assert.throws(() => toolset.decrease({ seconds: 75 }), ZodError);
});

test("reset returns to the configured work session", () => {
  const { toolset } = createToolset();

  toolset.start();
  const result = toolset.reset();

  assert.equal(result.timer.phase, "inactive");
  assert.equal(result.message, "Reset. Next work session lasts 25:00.");
});
