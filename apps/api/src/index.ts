import "dotenv/config";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = await createServer(config);

  const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, shutting down`);
    await server.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("Failed to shut down cleanly:", err);
        process.exit(1);
      });
    });
  }

  await server.listen({ port: config.PORT, host: config.HOST });
  server.log.info(`Postroom API server running on ${config.HOST}:${config.PORT}`);
  server.log.info(`MCP endpoint: http://${config.HOST}:${config.PORT}/mcp`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
