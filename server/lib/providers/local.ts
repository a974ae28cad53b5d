import fs from "fs";
import path from "path";
import { createHash } from "crypto";
import type { Readable } from "stream";
import fg from "fast-glob";
import type { DocumentProvider, ProbeRequest, ProbeResult, ProviderDocument, ProviderMetadata } from "./types";
import type { LocalProviderSettings } from "./settings";
import { getMimeType } from "./mime";
import { probeProvider } from "./probe";
import {
  DocumentNotFoundError,
  ProviderUnavailableError,
  errorCode,
  errorMessage,
  isAbortError,
  throwIfAborted,
} from "../errors";
import { createLogger } from "../log";

const logger = createLogger("providers");

/**
 * Stable id for a file below the root: content edits change the etag, never
 * the id. Separators are normalized so the same tree hashes identically on
 * every platform.
 */
export function localDocumentId(relativePath: string): string {
  const normalized = relativePath.split(path.sep).join("/");
  const digest = createHash("sha256").update(normalized, "utf8").digest("hex");
  return `local_${digest.slice(0, 16)}`;
}

export function localEtag(stats: { mtimeMs: number; size: number }): string {
  return `"${Math.trunc(stats.mtimeMs)}-${stats.size}"`;
}

export class LocalProvider implements DocumentProvider {
  readonly providerType = "local";
  readonly providerName: string;
  readonly enabled: boolean;
  private readonly settings: LocalProviderSettings;
  private readonly rootPath: string;
  private pathsById = new Map<string, string>();

  constructor(settings: LocalProviderSettings) {
    this.settings = settings;
    this.providerName = settings.name;
    this.enabled = settings.enabled;
    this.rootPath = path.resolve(settings.rootPath);
  }

  async listDocuments(signal?: AbortSignal): Promise<ProviderDocument[]> {
    throwIfAborted(signal);
    await this.assertRootExists();

    let files: string[];
    try {
      const patterns = this.settings.fileExtensions.map((ext) =>
        this.settings.recursive ? `**/*${ext}` : `*${ext}`,
      );
      files = await fg(patterns, {
        cwd: this.rootPath,
        onlyFiles: true,
        dot: false,
        caseSensitiveMatch: false,
        followSymbolicLinks: false,
      });
    } catch (error) {
      throw new ProviderUnavailableError(
        `Failed to list documents from local provider '${this.providerName}': ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const documents: ProviderDocument[] = [];
    const pathsById = new Map<string, string>();

    for (const relativePath of Array.from(new Set(files)).sort()) {
      throwIfAborted(signal);
      if (this.isExcluded(relativePath)) {
        logger.debug(`Excluding file: ${relativePath}`);
        continue;
      }

      let stats: fs.Stats;
      try {
        stats = await fs.promises.stat(path.join(this.rootPath, relativePath));
      } catch {
        // Removed between glob and stat; the next listing settles it
        continue;
      }

      const documentId = localDocumentId(relativePath);
      pathsById.set(documentId, relativePath);
      documents.push({
        documentId,
        filename: path.posix.basename(relativePath),
        providerType: this.providerType,
        providerName: this.providerName,
        etag: localEtag(stats),
        lastModified: stats.mtime,
        sizeBytes: stats.size,
        mimeType: getMimeType(path.extname(relativePath)),
        relativePath,
      });
    }

    this.pathsById = pathsById;
    logger.info(`Found ${documents.length} documents in local provider '${this.providerName}'`);
    return documents;
  }

  async downloadDocument(documentId: string, signal?: AbortSignal): Promise<Readable> {
    let relativePath = this.pathsById.get(documentId);
    if (!relativePath) {
      await this.listDocuments(signal);
      relativePath = this.pathsById.get(documentId);
    }
    if (!relativePath) {
      throw new DocumentNotFoundError(
        documentId,
        `Document with ID ${documentId} not found in local provider '${this.providerName}'`,
      );
    }

    const absolutePath = path.join(this.rootPath, relativePath);
    try {
      const stats = await fs.promises.stat(absolutePath);
      if (!stats.isFile()) throw new DocumentNotFoundError(documentId);
    } catch (error) {
      if (error instanceof DocumentNotFoundError) throw error;
      if (errorCode(error) === "ENOENT") {
        throw new DocumentNotFoundError(documentId, `File no longer exists: ${relativePath}`, { cause: error });
      }
      throw new ProviderUnavailableError(
        `Failed to open ${relativePath} in local provider '${this.providerName}': ${errorMessage(error)}`,
        { cause: error },
      );
    }

    logger.debug(`Opened file stream for: ${relativePath}`);
    return fs.createReadStream(absolutePath, { signal });
  }

  async getMetadata(): Promise<ProviderMetadata> {
    return {
      providerType: this.providerType,
      providerName: this.providerName,
      enabled: this.enabled,
      registeredAt: new Date(),
      additionalInfo: {
        rootPath: this.rootPath,
        recursive: String(this.settings.recursive),
        extensions: this.settings.fileExtensions.join(", "),
      },
    };
  }

  probe(request?: Partial<ProbeRequest>, signal?: AbortSignal): Promise<ProbeResult> {
    return probeProvider(this, request, signal);
  }

  private async assertRootExists() {
    try {
      const stats = await fs.promises.stat(this.rootPath);
      if (stats.isDirectory()) return;
    } catch (error) {
      if (isAbortError(error)) throw error;
    }
    throw new ProviderUnavailableError(
      `Root path of local provider '${this.providerName}' is not a readable directory: ${this.rootPath}`,
    );
  }

  private isExcluded(relativePath: string): boolean {
    const fileName = path.posix.basename(relativePath);
    // Office lock files
    if (fileName.startsWith("~$")) return true;

    const lowered = relativePath.toLowerCase();
    return this.settings.excludePatterns.some((pattern) => lowered.includes(pattern.toLowerCase()));
  }
}

