import { Readable } from "stream";
import type { DocumentProvider, ProbeRequest, ProbeResult, ProviderDocument, ProviderMetadata } from "./types";
import { probeProvider } from "./probe";
import { DocumentNotFoundError, throwIfAborted } from "../errors";

interface StoredDocument {
  document: ProviderDocument;
  content: Buffer;
}

export interface MemoryDocumentInput {
  documentId: string;
  filename: string;
  content: string | Buffer;
  etag?: string;
  lastModified?: Date;
  relativePath?: string;
}

/**
 * Provider over an in-process document set. Failures can be injected per
 * operation, which is how the sync engine's isolation rules are exercised.
 */
export class MemoryProvider implements DocumentProvider {
  readonly providerType: string;
  readonly providerName: string;
  enabled = true;
  listCalls = 0;
  downloadCalls: string[] = [];

  private documents = new Map<string, StoredDocument>();
  private listFailure: Error | null = null;
  private downloadFailures = new Map<string, Error>();
  private listingOverride: ProviderDocument[] | null = null;

  constructor(providerName = "memory", providerType = "memory") {
    this.providerName = providerName;
    this.providerType = providerType;
  }

  put(input: MemoryDocumentInput): this {
    const content = typeof input.content === "string" ? Buffer.from(input.content, "utf8") : input.content;
    this.documents.set(input.documentId, {
      content,
      document: {
        documentId: input.documentId,
        filename: input.filename,
        providerType: this.providerType,
        providerName: this.providerName,
        etag: input.etag,
        lastModified: input.lastModified,
        sizeBytes: content.length,
        relativePath: input.relativePath ?? input.filename,
      },
    });
    return this;
  }

  remove(documentId: string): this {
    this.documents.delete(documentId);
    return this;
  }

  failListing(error: Error | null): this {
    this.listFailure = error;
    return this;
  }

  failDownload(documentId: string, error: Error): this {
    this.downloadFailures.set(documentId, error);
    return this;
  }

  clearFailures(): this {
    this.listFailure = null;
    this.downloadFailures.clear();
    return this;
  }

  /** Serve this exact listing instead of the stored set (duplicates included). */
  overrideListing(listing: ProviderDocument[] | null): this {
    this.listingOverride = listing;
    return this;
  }

  async listDocuments(signal?: AbortSignal): Promise<ProviderDocument[]> {
    throwIfAborted(signal);
    this.listCalls += 1;
    if (this.listFailure) throw this.listFailure;
    if (this.listingOverride) return [...this.listingOverride];
    return Array.from(this.documents.values(), (entry) => entry.document);
  }

  async downloadDocument(documentId: string, signal?: AbortSignal): Promise<Readable> {
    throwIfAborted(signal);
    this.downloadCalls.push(documentId);
    const failure = this.downloadFailures.get(documentId);
    if (failure) throw failure;

    const entry = this.documents.get(documentId);
    if (!entry) throw new DocumentNotFoundError(documentId);
    return Readable.from([entry.content]);
  }

  async getMetadata(): Promise<ProviderMetadata> {
    return {
      providerType: this.providerType,
      providerName: this.providerName,
      enabled: this.enabled,
      registeredAt: new Date(),
      additionalInfo: { documents: String(this.documents.size) },
    };
  }

  probe(request?: Partial<ProbeRequest>, signal?: AbortSignal): Promise<ProbeResult> {
    return probeProvider(this, request, signal);
  }
}
