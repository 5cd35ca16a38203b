import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { LifecycleGateway } from "../gateway/lifecycle-gateway.js";
import { registerTools } from "./tools/index.js";

export const MCP_SERVER_INFO = { name: "postroom", version: "0.1.0" } as const;

export function createMcpServer(gateway: LifecycleGateway): McpServer {
  const mcp = new McpServer(MCP_SERVER_INFO);
  registerTools(mcp, gateway);
  return mcp;
}

function sessionIdOf(request: FastifyRequest): string | undefined {
  const header = request.headers["mcp-session-id"];
  return Array.isArray(header) ? header[0] : header;
}

function existingTransport(
  sessions: Map<string, StreamableHTTPServerTransport>,
  request: FastifyRequest,
): StreamableHTTPServerTransport | undefined {
  const sessionId = sessionIdOf(request);
  return sessionId ? sessions.get(sessionId) : undefined;
}

/**
 * Register MCP Streamable HTTP routes on the Fastify instance.
 * Handles POST (requests), GET (SSE stream), DELETE (session cleanup).
 * This is the chat front-end's way into the lifecycle gateway.
 */
export function registerMcpRoutes(app: FastifyInstance, gateway: LifecycleGateway) {
  // Active MCP sessions keyed by session ID, one map per server instance
  const sessions = new Map<string, StreamableHTTPServerTransport>();

  // ─── POST /mcp — Initialize or send requests ────────────
  app.post("/mcp", async (request, reply) => {
    const existing = existingTransport(sessions, request);

    // Existing session — forward request
    if (existing) {
      await existing.handleRequest(request.raw, reply.raw, request.body);
      return reply.hijack();
    }

    // New session — create transport + server
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    const server = createMcpServer(gateway);
    await server.connect(transport);

    await transport.handleRequest(request.raw, reply.raw, request.body);

    // Store session AFTER handleRequest — sessionId is assigned during initialize
    if (transport.sessionId) {
      sessions.set(transport.sessionId, transport);
    }
    return reply.hijack();
  });

  // ─── GET /mcp — SSE stream for server-initiated messages ─
  app.get("/mcp", async (request, reply) => {
    const transport = existingTransport(sessions, request);
    if (!transport) {
      return reply.status(400).send({ error: "Invalid or missing session ID" });
    }

    await transport.handleRequest(request.raw, reply.raw, request.body);
    return reply.hijack();
  });

  // ─── DELETE /mcp — Terminate session ─────────────────────
  app.delete("/mcp", async (request, reply) => {
    const transport = existingTransport(sessions, request);
    const sessionId = sessionIdOf(request);

    if (transport && sessionId) {
      await transport.close();
      sessions.delete(sessionId);
    }

    return reply.status(200).send({ ok: true });
  });

  // Close open sessions with the server
  app.addHook("onClose", async () => {
    const open = [...sessions.values()];
    sessions.clear();
    await Promise.all(open.map((transport) => transport.close()));
  });
}
