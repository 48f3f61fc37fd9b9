import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { createPomodoroServer, type PomodoroServerContext } from "./server.js";
import { PomodoroSession } from "./session.js";

interface McpSession {
  transport: StreamableHTTPServerTransport;
  context: PomodoroServerContext;
}

async function bootstrap() {
  const config = loadConfig();
  const session = new PomodoroSession({ workMs: config.workMs, tickMs: config.tickMs });
  session.startPolling();

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const sessions = new Map<string, McpSession>();

  const closeSession = (sessionId: string) => {
    const existing = sessions.get(sessionId);
    if (!existing) {
      return;
    }
    sessions.delete(sessionId);
    existing.context.dispose();
  };

  const createSession = async (): Promise<McpSession> => {
    const context = createPomodoroServer(session, { stepMs: config.stepMs });
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, { transport, context });
      },
      onsessionclosed: sessionId => {
        closeSession(sessionId);
      }
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        closeSession(sessionId);
      } else {
        context.dispose();
      }
    };

    await context.server.connect(transport);
    return { transport, context };
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id") ?? undefined;

    try {
      if (sessionId) {
        const existing = sessions.get(sessionId);
        if (!existing) {
          res.status(404).json({
            error: "unknown_session",
            message: "Session not found. Start a new session to initialize."
          });
          return;
        }
        await existing.transport.handleRequest(req, res, req.body);
        return;
      }

      const { transport } = await createSession();
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP POST request", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "The Pomodoro server encountered an unexpected error."
        });
      }
    }
  });

  const withSession = (action: string) => async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id") ?? undefined;
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: `Provide an MCP-Session-Id header to ${action}.`
      });
      return;
    }

    const existing = sessions.get(sessionId);
    if (!existing) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return;
    }

    try {
      await existing.transport.handleRequest(req, res);
    } catch (error) {
      console.error(`Error handling MCP ${req.method} request`, error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: `Failed to ${action}.`
        });
      }
    }
  };

  app.get("/mcp", withSession("resume streaming"));
  app.delete("/mcp", withSession("close a session"));

  const serverInstance = app.listen(config.port, () => {
    console.log(`Pomodoro MCP HTTP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log("Shutting down Pomodoro server...");
    session.stopPolling();
    serverInstance.close();
    await Promise.all(
      [...sessions.values()].map(async ({ transport }) => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
}

bootstrap().catch(error => {
  console.error("Failed to start Pomodoro HTTP server", error);
  process.exit(1);
});
