/**
 * Cellar Backend — Server Entry Point
 *
 * Starts the HTTP tool server backed by a CellarEngine. This is the main
 * entry point for production. For tests, use app.ts directly with supertest.
 */

import { CellarEngine, createLogger, engineOptionsFromEnv } from "@cellar/engine";
import { loadConfig } from "./config";
import { createApp } from "./app";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const engine = new CellarEngine(engineOptionsFromEnv(), { logger });
  await engine.init();

  const { app, jobs } = createApp(config, engine, logger);

  const server = app.listen(config.port, config.host, () => {
    console.log(`Cellar tool server running on http://${config.host}:${config.port}`);
    console.log(`Environment: ${config.env}`);
  });

  // Graceful shutdown: running installs are cancelled at their next step
  const shutdown = (): void => {
    console.log("Shutting down...");
    server.close();
    jobs
      .shutdown()
      .then(() => {
        engine.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
