import Fastify from "fastify";
import cors from "@fastify/cors";
import { createDb } from "@postroom/db";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "@postroom/lifecycle";
import { ConfigError, type AppConfig } from "./config.js";
import type { DraftStore } from "./store/types.js";
import { MemoryDraftStore } from "./store/memory-draft-store.js";
import { PgDraftStore } from "./store/pg-draft-store.js";
import type { ImageGenerator, TextGenerator } from "./generation/types.js";
import { GeminiTextGenerator } from "./generation/gemini-text-generator.js";
import { ImagenImageGenerator } from "./generation/imagen-image-generator.js";
import { GenerationOrchestrator } from "./generation/orchestrator.js";
import { LifecycleGateway } from "./gateway/lifecycle-gateway.js";
import { PublicationScheduler } from "./scheduler/publication-scheduler.js";
import { registerErrorHandler } from "./routes/errors.js";
import { registerDraftRoutes } from "./routes/drafts.js";
import { registerMcpRoutes } from "./mcp/router.js";

/** Collaborators that tests (or alternative deployments) can swap in. */
export interface ServerDeps {
  store?: DraftStore;
  textGenerator?: TextGenerator;
  imageGenerator?: ImageGenerator;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

function requireApiKey(config: AppConfig): string {
  if (!config.GOOGLE_AI_API_KEY) {
    throw new ConfigError("GOOGLE_AI_API_KEY is required for text and image generation");
  }
  return config.GOOGLE_AI_API_KEY;
}

export async function createServer(config: AppConfig, deps: ServerDeps = {}) {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // ─── Draft Store ─────────────────────────────────────────
  let store = deps.store;
  if (!store) {
    if (config.DATABASE_URL) {
      const db = createDb(config.DATABASE_URL);
      store = new PgDraftStore(db);
      app.addHook("onClose", async () => {
        await db.$client.end();
      });
    } else {
      app.log.warn("DATABASE_URL not set, drafts are kept in memory and lost on restart");
      store = new MemoryDraftStore();
    }
  }

  // ─── Generation ──────────────────────────────────────────
  const textGenerator =
    deps.textGenerator ??
    new GeminiTextGenerator({
      apiKey: requireApiKey(config),
      model: config.GEMINI_MODEL,
      maxLength: config.POST_MAX_LENGTH,
    });
  const imageGenerator =
    deps.imageGenerator ??
    new ImagenImageGenerator({
      apiKey: requireApiKey(config),
      model: config.IMAGEN_MODEL,
      outputDir: config.IMAGE_DIR,
    });

  const orchestrator = new GenerationOrchestrator({
    textGenerator,
    imageGenerator,
    drafts: store,
    log: app.log.child({ component: "orchestrator" }),
    tone: config.POST_TONE,
    timeoutMs: config.GENERATION_TIMEOUT_MS,
    retryPolicy: deps.retryPolicy ?? {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: config.GENERATION_MAX_ATTEMPTS,
    },
    sleep: deps.sleep,
  });

  const gateway = new LifecycleGateway({
    store,
    orchestrator,
    log: app.log.child({ component: "gateway" }),
  });

  // ─── Scheduler ───────────────────────────────────────────
  const scheduler = new PublicationScheduler({
    store,
    gateway,
    log: app.log.child({ component: "scheduler" }),
    intervalMs: config.SCHEDULER_INTERVAL_MS,
  });
  app.addHook("onListen", async () => {
    scheduler.start();
  });
  app.addHook("onClose", async () => {
    await scheduler.stop();
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: [/^http:\/\/localhost:\d+$/, /^http:\/\/127\.0\.0\.1:\d+$/],
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "mcp-session-id"],
    exposedHeaders: ["mcp-session-id"],
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Routes ──────────────────────────────────────────────
  registerErrorHandler(app);
  registerDraftRoutes(app, gateway);
  registerMcpRoutes(app, gateway);

  return app;
}
