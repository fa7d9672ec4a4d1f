// api/src/index.ts
import { config } from "./config.js"; // loads .env first

import express from "express";
import cors from "cors";

import { closePool } from "./db.js";
import { levelTestsRouter } from "./levelTests.js";
import { errorHandler, errorMessage } from "./middleware/errorHandler.js";
import { routinesRouter } from "./routines.js";
import { createServices, type Services } from "./services.js";

export function createApp(services: Services): express.Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(cors({ origin: config.corsOrigin, credentials: true }));

  // health without DB
  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use(routinesRouter(services.orchestrator));
  app.use(levelTestsRouter(services.levelTests));

  app.use((_req, res) => res.status(404).json({ error: "Not found", code: "not_found" }));
  app.use(errorHandler);
  return app;
}

async function main(): Promise<void> {
  const services = await createServices();
  const server = createApp(services).listen(config.port, () => {
    console.log(`api:${config.port} (strategy=${config.generationStrategy}, env=${config.nodeEnv})`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("DB: pool close failed", errorMessage(err));
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((err) => {
    console.error("startup failed:", errorMessage(err));
    process.exit(1);
  });
}
