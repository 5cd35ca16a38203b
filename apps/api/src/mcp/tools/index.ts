import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DRAFT_STATUSES } from "@postroom/shared";
import { LifecycleError } from "@postroom/lifecycle";
import type { LifecycleGateway } from "../../gateway/lifecycle-gateway.js";
import { errorDetails } from "../../routes/errors.js";

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function textResult(payload: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
  };
}

/**
 * Run a gateway call for a tool. Lifecycle errors become `isError` results the
 * chat client can show; anything else propagates to the SDK.
 */
async function runTool(action: () => Promise<unknown>): Promise<ToolResult> {
  try {
    return textResult(await action());
  } catch (error) {
    if (error instanceof LifecycleError) {
      return {
        isError: true,
        content: [
          {
            type: "text" as const,
            text: JSON.stringify({
              error: error.code,
              message: error.message,
              details: errorDetails(error),
            }),
          },
        ],
      };
    }
    throw error;
  }
}

const draftId = z.string().uuid();

/**
 * Register all MCP tools with the server.
 * Edits made through these tools are attributed to `human-chat`.
 */
export function registerTools(server: McpServer, gateway: LifecycleGateway) {
  // ─── postroom_ping ───────────────────────────────────────
  server.tool(
    "postroom_ping",
    "Health check tool. Returns server status and timestamp.",
    {},
    async () =>
      textResult({
        status: "ok",
        timestamp: new Date().toISOString(),
        version: "0.1.0",
      }),
  );

  // ─── postroom_create_draft ───────────────────────────────
  server.tool(
    "postroom_create_draft",
    "Create a new post draft for a product and generate its text and image.",
    { subject: z.string().trim().min(1) },
    async ({ subject }) => runTool(() => gateway.createAndGenerate(subject)),
  );

  // ─── postroom_get_draft ──────────────────────────────────
  server.tool(
    "postroom_get_draft",
    "Retrieve the current state of a draft by its ID.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.getDraft(draft_id)),
  );

  // ─── postroom_list_drafts ────────────────────────────────
  server.tool(
    "postroom_list_drafts",
    "List drafts, newest first, optionally filtered by status.",
    { status: z.enum(DRAFT_STATUSES).optional() },
    async ({ status }) => runTool(() => gateway.listDrafts(status)),
  );

  // ─── status changes ──────────────────────────────────────
  server.tool(
    "postroom_approve",
    "Approve a draft for publication.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.approve(draft_id)),
  );

  server.tool(
    "postroom_reject",
    "Reject a draft. Rejected drafts can no longer be changed.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.reject(draft_id)),
  );

  server.tool(
    "postroom_publish",
    "Publish an approved draft.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.publish(draft_id)),
  );

  // ─── content ─────────────────────────────────────────────
  server.tool(
    "postroom_edit_text",
    "Replace a draft's text with a manual edit.",
    { draft_id: draftId, text: z.string().min(1) },
    async ({ draft_id, text }) => runTool(() => gateway.editText(draft_id, text, "human-chat")),
  );

  server.tool(
    "postroom_regenerate_text",
    "Ask the AI to rewrite a draft's text, optionally following an instruction.",
    { draft_id: draftId, instruction: z.string().trim().min(1).optional() },
    async ({ draft_id, instruction }) =>
      runTool(() => gateway.regenerateText(draft_id, instruction)),
  );

  server.tool(
    "postroom_regenerate_image",
    "Generate a new image for a draft.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.regenerateImage(draft_id)),
  );

  server.tool(
    "postroom_get_history",
    "List the text edits made to a draft, oldest first.",
    { draft_id: draftId },
    async ({ draft_id }) => runTool(() => gateway.getHistory(draft_id)),
  );

  // ─── postroom_attach_message ─────────────────────────────
  server.tool(
    "postroom_attach_message",
    "Record the chat message currently showing a draft, so updates can be routed to it.",
    { draft_id: draftId, message_ref: z.string().min(1) },
    async ({ draft_id, message_ref }) =>
      runTool(() => gateway.attachExternalRef(draft_id, "chat", message_ref)),
  );
}
