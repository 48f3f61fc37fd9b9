import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  POMODORO_WORK_MINUTES: z.coerce.number().positive().max(24 * 60).default(25),
  POMODORO_STEP_MINUTES: z.coerce.number().positive().max(120).default(5),
  POMODORO_TICK_MS: z.coerce.number().int().min(50).max(60000).default(1000)
});

export interface PomodoroConfig {
  port: number;
  workMs: number;
  stepMs: number;
  tickMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PomodoroConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    workMs: Math.round(parsed.POMODORO_WORK_MINUTES * 60000),
    stepMs: Math.round(parsed.POMODORO_STEP_MINUTES * 60000),
    tickMs: parsed.POMODORO_TICK_MS
  };
}
