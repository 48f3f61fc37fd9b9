#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createPomodoroServer } from "./server.js";
import { PomodoroSession } from "./session.js";

// stdout carries the protocol, so everything here logs to stderr.
async function bootstrap() {
  const config = loadConfig();
  const session = new PomodoroSession({ workMs: config.workMs, tickMs: config.tickMs });
  const { server, dispose } = createPomodoroServer(session, { stepMs: config.stepMs });
  const transport = new StdioServerTransport();

  transport.onclose = () => {
    session.stopPolling();
    dispose();
  };

  await server.connect(transport);
  session.startPolling();
  console.error("Pomodoro MCP server ready on stdio");
}

bootstrap().catch(error => {
  console.error("Failed to start Pomodoro stdio server", error);
  process.exit(1);
});
