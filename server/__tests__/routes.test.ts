import { describe, it, expect, beforeAll, afterAll, beforeEach } from "@jest/globals";
import express from "express";
import type { Server } from "http";
import { z } from "zod";
import { registerRoutes, errorHandler, type RouteDeps } from "../routes";
import { MemStorage } from "../memStorage";
import { ProviderConfigurationService } from "../lib/providers/configuration";
import { createDefaultRegistry } from "../lib/providers/registry";
import { MemoryProvider } from "../lib/providers/memory";
import { REDACTED, createSettingsCipher } from "../lib/encryption";
import type { TriggeredRun } from "../lib/scheduler";
import type { IndexRunReport } from "../lib/sync/types";

const cipher = createSettingsCipher("test-key");

class StubScheduler {
  next: TriggeredRun | null = null;

  runNow(): TriggeredRun {
    if (!this.next) throw new Error("no run prepared");
    return this.next;
  }
}

function triggered(runId: string, started: boolean): TriggeredRun {
  return { runId, started, completion: new Promise<IndexRunReport>(() => undefined) };
}

describe("API routes", () => {
  let server: Server;
  let baseUrl: string;
  let store: MemStorage;
  let configuration: ProviderConfigurationService;
  const scheduler = new StubScheduler();
  const memory = new MemoryProvider("notes").put({ documentId: "n1", filename: "n1.txt", content: "alpha beta" });

  beforeAll(async () => {
    const registry = createDefaultRegistry().register(
      "memory",
      z.object({ name: z.string(), enabled: z.boolean().default(true) }),
      () => memory,
    );
    store = new MemStorage();
    configuration = new ProviderConfigurationService(store, registry, cipher);
    const deps: RouteDeps = { storage: store, configuration, registry, scheduler, cipher };

    const app = express();
    app.use(express.json());
    registerRoutes(app, deps);
    app.use(errorHandler);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(async () => {
    for (const row of await store.listProviderSettings()) {
      await store.deleteProviderSettings(row.providerType, row.providerName);
    }
  });

  function request(method: string, path: string, body?: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("should answer health checks", async () => {
    const response = await request("GET", "/api/health");
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("should save settings with secrets encrypted and redacted", async () => {
    const response = await request("PUT", "/api/providers/S3/archive", {
      settings: { bucketName: "archive-bucket", accessKeyId: "test-access", secretAccessKey: "test-secret" },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      providerType: "s3",
      providerName: "archive",
      enabled: true,
      settings: { name: "archive", bucketName: "archive-bucket", secretAccessKey: REDACTED },
    });

    const stored = (await store.getProviderSettings("s3", "archive"))?.settings.secretAccessKey;
    expect(typeof stored === "string" ? cipher.decrypt(stored) : stored).toBe("test-secret");
    expect(stored).not.toBe("test-secret");

    const list = await (await request("GET", "/api/providers")).json();
    expect(list).toEqual([
      {
        providerType: "s3",
        providerName: "archive",
        enabled: true,
        settings: {
          name: "archive",
          bucketName: "archive-bucket",
          accessKeyId: "test-access",
          secretAccessKey: REDACTED,
        },
        updatedAt: expect.any(String),
        lastSyncAt: null,
      },
    ]);
  });

  it("should keep the stored secret when the redaction marker comes back", async () => {
    await request("PUT", "/api/providers/s3/archive", {
      settings: { bucketName: "archive-bucket", accessKeyId: "test-access", secretAccessKey: "test-secret" },
    });

    const response = await request("PUT", "/api/providers/s3/archive", {
      settings: { bucketName: "archive-bucket", accessKeyId: "test-access", secretAccessKey: REDACTED, region: "eu-west-1" },
    });

    expect(response.status).toBe(200);
    const row = await store.getProviderSettings("s3", "archive");
    const stored = row?.settings.secretAccessKey;
    expect(typeof stored === "string" ? cipher.decrypt(stored) : stored).toBe("test-secret");
    expect(row?.settings.region).toBe("eu-west-1");
  });

  it("should reject invalid settings and unknown types", async () => {
    const invalid = await request("PUT", "/api/providers/local/handbook", { settings: { rootPath: " " } });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({
      error: "Invalid local provider settings: rootPath: local provider requires a non-empty root path",
    });

    const unknown = await request("PUT", "/api/providers/ftp/legacy", { settings: {} });
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({
      error: "Unknown provider type 'ftp'. Known types: local, memory, onedrive, s3",
    });

    const noBody = await request("PUT", "/api/providers/local/handbook", { rootPath: "/srv" });
    expect(noBody.status).toBe(400);
    expect(await store.listProviderSettings()).toEqual([]);
  });

  it("should delete settings and drop the provider from the snapshot", async () => {
    await request("PUT", "/api/providers/memory/notes", { settings: {} });
    expect((await configuration.getSnapshot()).providers.map((p) => p.providerName)).toEqual(["notes"]);

    const deleted = await request("DELETE", "/api/providers/memory/notes");
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ success: true });
    expect((await configuration.getSnapshot()).providers).toEqual([]);

    const missing = await request("DELETE", "/api/providers/memory/notes");
    expect(missing.status).toBe(404);
  });

  it("should probe a configured provider", async () => {
    await request("PUT", "/api/providers/memory/notes", { settings: {} });

    const response = await request("POST", "/api/providers/memory/notes/probe", { maxPreviewBytes: 4 });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      message: "Provider memory/notes responded successfully (1 documents).",
      documents: [{ documentId: "n1", filename: "n1.txt", sizeBytes: 10, bytesRead: 4 }],
    });

    const missing = await request("POST", "/api/providers/memory/other/probe", {});
    expect(missing.status).toBe(404);
  });

  it("should start a run or report the one in progress", async () => {
    scheduler.next = triggered("run-1", true);
    const started = await request("POST", "/api/indexer/run");
    expect(started.status).toBe(202);
    expect(await started.json()).toEqual({ runId: "run-1" });

    scheduler.next = triggered("run-1", false);
    const busy = await request("POST", "/api/indexer/run");
    expect(busy.status).toBe(409);
    expect(await busy.json()).toEqual({ error: "An indexer run is already in progress", runId: "run-1" });
  });

  it("should list recent runs newest first", async () => {
    for (const [id, startedAt] of [
      ["older", "2024-01-01T00:00:00Z"],
      ["newer", "2024-01-02T00:00:00Z"],
    ]) {
      await store.recordRun({
        id,
        status: "completed",
        exitCode: 0,
        startedAt: new Date(startedAt),
        finishedAt: new Date(startedAt),
        durationMs: 0,
        reportJson: {},
      });
    }

    const response = await request("GET", "/api/indexer/runs?limit=1");
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([
      expect.objectContaining({ id: "newer", status: "completed", startedAt: "2024-01-02T00:00:00.000Z" }),
    ]);

    expect((await request("GET", "/api/indexer/runs?limit=0")).status).toBe(400);
  });
});
