import type { AppConfig } from "./config";
import { createDb, type DbHandle } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { bootstrapSchema } from "./lib/bootstrap";
import {
  ProviderConfigurationService,
  createDefaultRegistry,
  seedProviderSettingsFromFile,
  type ProviderRegistry,
} from "./lib/providers";
import { OpenAIEmbedder } from "./lib/embeddings";
import { createTextExtractionService } from "./lib/extraction";
import { createSettingsCipher, type SettingsCipher } from "./lib/encryption";
import { IndexerScheduler } from "./lib/scheduler";
import type { IndexerDeps, IndexerOptions } from "./lib/sync";
import { setLogLevel, log } from "./lib/log";

export interface Runtime {
  config: AppConfig;
  db: DbHandle;
  storage: IStorage;
  registry: ProviderRegistry;
  cipher: SettingsCipher;
  configuration: ProviderConfigurationService;
  deps: IndexerDeps;
  indexerOptions: IndexerOptions;
  scheduler: IndexerScheduler;
  close(): Promise<void>;
}

export function indexerOptionsFromConfig(config: AppConfig): IndexerOptions {
  return {
    chunking: config.chunking,
    documentConcurrency: config.indexer.concurrency,
    maxFiles: config.indexer.maxFiles,
    forceFullReindex: config.indexer.forceFullReindex,
    cleanupOrphans: config.indexer.cleanupOrphans,
  };
}

/**
 * Connects to Postgres, applies the schema, seeds provider settings and
 * wires every component. Shared by the HTTP service and the CLI.
 */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  setLogLevel(config.logLevel);

  const db = createDb(config.databaseUrl);
  await bootstrapSchema(db.pool, config.openai.dimensions);

  const storage = new DatabaseStorage(db.db);
  const registry = createDefaultRegistry();
  const cipher = createSettingsCipher(config.encryptionKey);
  if (!cipher.enabled) {
    log("ENCRYPTION_KEY not set, provider secrets are stored in clear", "providers", "warn");
  }

  if (config.providersFile) {
    const inserted = await seedProviderSettingsFromFile(config.providersFile, storage, registry, cipher);
    log(`Seeded ${inserted} provider(s) from ${config.providersFile}`, "providers");
  }

  const configuration = new ProviderConfigurationService(storage, registry, cipher);
  const deps: IndexerDeps = {
    store: storage,
    embedder: new OpenAIEmbedder({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.embedModel,
      dimensions: config.openai.dimensions,
      batchSize: config.openai.batchSize,
    }),
    extraction: createTextExtractionService(),
  };
  const indexerOptions = indexerOptionsFromConfig(config);
  const scheduler = new IndexerScheduler(configuration, deps, {
    intervalMinutes: config.indexer.intervalMinutes,
    runOnStartup: config.indexer.runOnStartup,
    indexer: indexerOptions,
  });

  return {
    config,
    db,
    storage,
    registry,
    cipher,
    configuration,
    deps,
    indexerOptions,
    scheduler,
    async close() {
      await scheduler.stop();
      await db.pool.end();
    },
  };
}
