import type { Express, Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { insertProviderSettingsSchema, providerSettingsBodySchema } from "@shared/schema";
import type { IStorage } from "./storage";
import type { ProviderConfigurationService } from "./lib/providers/configuration";
import type { ProviderRegistry } from "./lib/providers/registry";
import type { IndexerScheduler } from "./lib/scheduler";
import { SECRET_SETTING_FIELDS } from "./lib/providers/settings";
import {
  REDACTED,
  decryptSecrets,
  encryptSecrets,
  redactSecrets,
  type SettingsCipher,
} from "./lib/encryption";
import { InvalidConfigurationError, errorMessage } from "./lib/errors";
import { createLogger } from "./lib/log";

const logger = createLogger("express");

export interface RouteDeps {
  storage: IStorage;
  configuration: ProviderConfigurationService;
  registry: ProviderRegistry;
  scheduler: Pick<IndexerScheduler, "runNow">;
  cipher: SettingsCipher;
}

const apiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100, // 100 requests per minute
  message: { error: "Too many requests. Please slow down." },
  standardHeaders: true,
  legacyHeaders: false,
});

const runLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 5,
  message: { error: "Too many indexer runs requested. Please slow down." },
  standardHeaders: true,
  legacyHeaders: false,
});

const probeBodySchema = z
  .object({
    maxDocuments: z.number().int().min(1).max(20).optional(),
    maxPreviewBytes: z.number().int().min(0).max(4096).optional(),
  })
  .default({});

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

function providerKeyParams(req: Request) {
  return insertProviderSettingsSchema.pick({ providerType: true, providerName: true }).safeParse({
    providerType: req.params.type?.toLowerCase(),
    providerName: req.params.name,
  });
}

/**
 * A client that read settings back from GET sends the redaction marker for
 * secrets it did not change; keep the stored value for those.
 */
function mergeRedactedSecrets(
  incoming: Record<string, unknown>,
  stored: Record<string, unknown> | undefined,
  cipher: SettingsCipher,
): Record<string, unknown> {
  const merged = { ...incoming };
  const previous = stored ? decryptSecrets(stored, cipher) : {};
  for (const field of SECRET_SETTING_FIELDS) {
    if (merged[field] === REDACTED) {
      merged[field] = previous[field];
    }
  }
  return merged;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const { storage, configuration, registry, scheduler, cipher } = deps;

  app.use("/api", apiLimiter);

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  // Providers
  app.get("/api/providers", async (_req, res) => {
    try {
      const [rows, registered] = await Promise.all([storage.listProviderSettings(), storage.getProviders()]);
      const syncByKey = new Map(registered.map((p) => [`${p.providerType}/${p.providerName}`, p.lastSyncAt]));

      res.json(
        rows.map((row) => ({
          providerType: row.providerType,
          providerName: row.providerName,
          enabled: row.settings.enabled !== false,
          settings: redactSecrets(row.settings),
          updatedAt: row.updatedAt,
          lastSyncAt: syncByKey.get(`${row.providerType}/${row.providerName}`) ?? null,
        })),
      );
    } catch (error) {
      logger.error("List providers error", error);
      res.status(500).json({ error: "Failed to list providers" });
    }
  });

  app.put("/api/providers/:type/:name", async (req, res) => {
    const key = providerKeyParams(req);
    if (!key.success) {
      return res.status(400).json({ error: key.error.message });
    }
    const body = providerSettingsBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: body.error.message });
    }

    const { providerType, providerName } = key.data;
    try {
      const existing = await storage.getProviderSettings(providerType, providerName);
      const settings = {
        ...mergeRedactedSecrets(body.data.settings, existing?.settings, cipher),
        name: providerName,
      };
      // Validates against the type's schema; throws for unknown types and bad settings
      registry.resolve(providerType, settings);

      const row = await storage.upsertProviderSettings(providerType, providerName, encryptSecrets(settings, cipher));
      await configuration.reload();
      logger.info(`Provider settings saved for ${providerType}/${providerName}`);

      res.json({
        providerType: row.providerType,
        providerName: row.providerName,
        enabled: row.settings.enabled !== false,
        settings: redactSecrets(row.settings),
        updatedAt: row.updatedAt,
      });
    } catch (error) {
      if (error instanceof InvalidConfigurationError) {
        return res.status(400).json({ error: error.message });
      }
      logger.error("Save provider settings error", error);
      res.status(500).json({ error: "Failed to save provider settings" });
    }
  });

  app.delete("/api/providers/:type/:name", async (req, res) => {
    const key = providerKeyParams(req);
    if (!key.success) {
      return res.status(400).json({ error: key.error.message });
    }
    const { providerType, providerName } = key.data;
    try {
      const deleted = await storage.deleteProviderSettings(providerType, providerName);
      if (!deleted) {
        return res.status(404).json({ error: "Provider not found" });
      }
      await configuration.reload();
      logger.info(`Provider settings deleted for ${providerType}/${providerName}`);
      res.json({ success: true });
    } catch (error) {
      logger.error("Delete provider settings error", error);
      res.status(500).json({ error: "Failed to delete provider settings" });
    }
  });

  app.post("/api/providers/:type/:name/probe", async (req, res) => {
    const key = providerKeyParams(req);
    if (!key.success) {
      return res.status(400).json({ error: key.error.message });
    }
    const request = probeBodySchema.safeParse(req.body ?? {});
    if (!request.success) {
      return res.status(400).json({ error: request.error.message });
    }

    try {
      const snapshot = await configuration.getSnapshot();
      const configured = snapshot.providers.find(
        (p) => p.providerType === key.data.providerType && p.providerName === key.data.providerName,
      );
      if (!configured) {
        return res.status(404).json({ error: "Provider not found" });
      }

      const controller = new AbortController();
      // Client went away before we answered
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });
      const result = await configured.provider.probe(request.data, controller.signal);
      res.json(result);
    } catch (error) {
      logger.error("Probe provider error", error);
      res.status(500).json({ error: "Probe failed" });
    }
  });

  // Indexer
  app.post("/api/indexer/run", runLimiter, (_req, res) => {
    const run = scheduler.runNow();
    if (!run.started) {
      return res.status(409).json({ error: "An indexer run is already in progress", runId: run.runId });
    }
    res.status(202).json({ runId: run.runId });
  });

  app.get("/api/indexer/runs", async (req, res) => {
    const query = runsQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: query.error.message });
    }
    try {
      const runs = await storage.getRecentRuns(query.data.limit);
      res.json(runs);
    } catch (error) {
      logger.error("List runs error", error);
      res.status(500).json({ error: "Failed to list runs" });
    }
  });
}

interface HttpError extends Error {
  status?: number;
  statusCode?: number;
}

export function errorHandler(err: HttpError, _req: Request, res: Response, _next: NextFunction) {
  const status = err.status || err.statusCode || 500;
  const message = err.message || "Internal Server Error";
  if (status >= 500) {
    logger.error(`Unhandled error: ${errorMessage(err)}`);
  }
  res.status(status).json({ message });
}
