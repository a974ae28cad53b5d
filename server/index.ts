import express from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { createRuntime } from "./runtime";
import { registerRoutes, errorHandler } from "./routes";
import { log } from "./lib/log";
import { errorMessage } from "./lib/errors";

async function main() {
  const config = loadConfig();
  const runtime = await createRuntime(config);

  const app = express();
  app.set("trust proxy", 1);
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  registerRoutes(app, runtime);
  app.use(errorHandler);

  const httpServer = createServer(app);
  const HOST = process.env.HOST ?? (process.platform === "win32" ? "127.0.0.1" : "0.0.0.0");
  httpServer.listen(config.port, HOST, () => {
    log(`serving on port ${config.port}`);
    runtime.scheduler.start();
    log("Indexer scheduler started", "scheduler");
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down`);
    httpServer.close();
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        log(`Shutdown failed: ${errorMessage(error)}`, "express", "error");
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  log(`Startup failed: ${errorMessage(error)}`, "express", "error");
  process.exit(1);
});
