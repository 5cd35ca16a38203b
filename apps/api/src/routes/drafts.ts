import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { DRAFT_STATUSES, FRONTEND_CHANNELS, createApiResponse } from "@postroom/shared";
import type { LifecycleGateway } from "../gateway/lifecycle-gateway.js";

const idParams = z.object({ id: z.string().uuid() });
const listQuery = z.object({ status: z.enum(DRAFT_STATUSES).optional() });
const createBody = z.object({ subject: z.string().trim().min(1) });
const textBody = z.object({ text: z.string().min(1) });
const regenerateTextBody = z.object({ instruction: z.string().trim().min(1).optional() });
const refParams = idParams.extend({ channel: z.enum(FRONTEND_CHANNELS) });
const refBody = z.object({ ref: z.string().min(1).nullable() });
const scheduleBody = z.object({ at: z.string().datetime({ offset: true }) });

/**
 * Dashboard routes. Every edit arriving here is attributed to `human-dashboard`.
 */
export function registerDraftRoutes(app: FastifyInstance, gateway: LifecycleGateway) {
  // ─── Reads ───────────────────────────────────────────────
  app.get("/drafts", async (request) => {
    const { status } = listQuery.parse(request.query);
    return createApiResponse(await gateway.listDrafts(status));
  });

  app.get("/drafts/:id", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.getDraft(id));
  });

  app.get("/drafts/:id/history", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.getHistory(id));
  });

  // ─── Creation ────────────────────────────────────────────
  app.post("/drafts", async (request, reply) => {
    const { subject } = createBody.parse(request.body);
    const draft = await gateway.createAndGenerate(subject);
    return reply.status(201).send(createApiResponse(draft));
  });

  // ─── Status ──────────────────────────────────────────────
  app.post("/drafts/:id/approve", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.approve(id));
  });

  app.post("/drafts/:id/reject", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.reject(id));
  });

  app.post("/drafts/:id/publish", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.publish(id));
  });

  // ─── Content ─────────────────────────────────────────────
  app.put("/drafts/:id/text", async (request) => {
    const { id } = idParams.parse(request.params);
    const { text } = textBody.parse(request.body);
    return createApiResponse(await gateway.editText(id, text, "human-dashboard"));
  });

  app.post("/drafts/:id/regenerate-text", async (request) => {
    const { id } = idParams.parse(request.params);
    const { instruction } = regenerateTextBody.parse(request.body ?? {});
    return createApiResponse(await gateway.regenerateText(id, instruction));
  });

  app.post("/drafts/:id/regenerate-image", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.regenerateImage(id));
  });

  // ─── Scheduling ──────────────────────────────────────────
  app.put("/drafts/:id/schedule", async (request) => {
    const { id } = idParams.parse(request.params);
    const { at } = scheduleBody.parse(request.body);
    return createApiResponse(await gateway.schedulePublication(id, new Date(at)));
  });

  app.delete("/drafts/:id/schedule", async (request) => {
    const { id } = idParams.parse(request.params);
    return createApiResponse(await gateway.cancelSchedule(id));
  });

  // ─── Front-end references ────────────────────────────────
  app.put("/drafts/:id/refs/:channel", async (request) => {
    const { id, channel } = refParams.parse(request.params);
    const { ref } = refBody.parse(request.body);
    return createApiResponse(await gateway.attachExternalRef(id, channel, ref));
  });
}
