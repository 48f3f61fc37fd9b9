import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PomodoroSession } from "./session.js";
import { PomodoroToolset, type Adjustment } from "./tools/pomodoroTool.js";
import type { AlertRecord, TimerUpdateResult } from "./types.js";
import { APP_NAME, buildTimerStructuredContent } from "./ui/builders.js";

export const SERVER_VERSION = "0.1.0";

export interface PomodoroServerContext {
  server: McpServer;
  toolset: PomodoroToolset;
  dispose: () => void;
}

const MAX_ADJUST_SECONDS = 600 * 60;

const ACTIONS = ["status", "start", "pause", "resume", "toggle", "reset", "flip", "increase", "decrease"] as const;

const UNIT_SECONDS: Record<string, number> = { h: 3600, m: 60, s: 1 };
const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(h(?:ours?|rs?)?|m(?:in(?:ute)?s?)?|s(?:ec(?:ond)?s?)?)\b/g;

/** Accepts `m:ss`, bare seconds, or unit phrases such as "1h 5m" and "2 minutes and 10 seconds". */
export function parseDurationSeconds(input: string): number {
  const normalized = input.toLowerCase().replace(/\band\b|,/g, " ").trim();
  if (!normalized) {
    throw new Error("Duration must not be empty.");
  }

  let seconds: number;
  const clockMatch = normalized.match(/^(\d{1,3}):([0-5]\d)$/);
  if (clockMatch) {
    seconds = Number(clockMatch[1]) * 60 + Number(clockMatch[2]);
  } else if (/^\d+(\.\d+)?$/.test(normalized)) {
    seconds = Number(normalized);
  } else {
    const tokens = [...normalized.matchAll(UNIT_PATTERN)];
    if (tokens.length === 0 || normalized.replace(UNIT_PATTERN, "").trim()) {
      throw new Error(`Could not parse duration "${input}".`);
    }
    seconds = tokens.reduce((total, [, amount, unit]) => total + Number(amount) * UNIT_SECONDS[unit.charAt(0)], 0);
  }

  seconds = Math.round(seconds);
  if (seconds <= 0) {
    throw new Error("Duration must be greater than zero seconds.");
  }
  return seconds;
}

const bySchema = z
  .preprocess(value => (typeof value === "string" ? parseDurationSeconds(value) : value), z.number().int().positive().max(MAX_ADJUST_SECONDS))
  .transform((seconds): Adjustment => ({ minutes: Math.floor(seconds / 60), seconds: seconds % 60 }));

const pomodoroInputSchema = z.object({
  action: z.enum(ACTIONS).default("status"),
  by: bySchema.optional()
});

export function createPomodoroServer(session: PomodoroSession, options: { stepMs?: number } = {}): PomodoroServerContext {
  const toolset = new PomodoroToolset(session, { stepMs: options.stepMs });
  const server = new McpServer(
    {
      name: APP_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "pomodoro",
    {
      title: "Pomodoro timer",
      description:
        "Control the work/rest interval timer. Rest lasts one fifth of work. " +
        "Actions: status, start, pause, resume, toggle, reset, flip, increase, decrease.",
      inputSchema: {
        action: z.enum(ACTIONS).optional(),
        by: z
          .union([
            z.number().int().positive().max(MAX_ADJUST_SECONDS),
            z
              .string()
              .min(1)
              .describe('Examples: "5 minutes", "90s", or "1m 30s".')
          ])
          .optional()
          .describe("How much to increase or decrease the work duration by. Defaults to 5 minutes.")
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const parsed = pomodoroInputSchema.parse(input);
      return buildResult(runAction(toolset, parsed.action, parsed.by));
    }
  );

  const dispose = session.on("alert", alert => {
    forwardAlert(server, alert);
  });

  return {
    server,
    toolset,
    dispose
  };
}

function runAction(toolset: PomodoroToolset, action: (typeof ACTIONS)[number], by?: Adjustment): TimerUpdateResult {
  switch (action) {
    case "start":
      return toolset.start();
    case "pause":
      return toolset.pause();
    case "resume":
      return toolset.resume();
    case "toggle":
      return toolset.toggle();
    case "reset":
      return toolset.reset();
    case "flip":
      return toolset.flip();
    case "increase":
      return toolset.increase(by);
    case "decrease":
      return toolset.decrease(by);
    case "status":
    default:
      return toolset.status();
  }
}

function buildResult(result: TimerUpdateResult) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: {
      ...buildTimerStructuredContent({ timer: result.timer, alerts: result.alerts }),
      timer: result.timer
    }
  };
}

function forwardAlert(server: McpServer, alert: AlertRecord): void {
  if (!server.isConnected()) {
    return;
  }
  server.server
    .sendLoggingMessage({
      level: "notice",
      logger: "pomodoro",
      data: {
        message: alert.phase === "working" ? "Break is over, back to work." : "Work session done, take a break.",
        alert
      }
    })
    .catch(error => {
      console.error("Failed to forward alert", error);
    });
}
