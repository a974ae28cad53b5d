import type { Readable } from "stream";

export type ProviderType = "local" | "s3" | "onedrive" | (string & {});

/**
 * Normalized descriptor of one remote document. Produced fresh by every
 * listing and never mutated.
 */
export interface ProviderDocument {
  readonly documentId: string;
  readonly filename: string;
  readonly providerType: ProviderType;
  readonly providerName: string;
  readonly etag?: string;
  readonly lastModified?: Date;
  readonly sizeBytes?: number;
  readonly mimeType?: string;
  readonly relativePath?: string;
}

export interface ProviderMetadata {
  providerType: ProviderType;
  providerName: string;
  enabled: boolean;
  registeredAt: Date;
  /** Diagnostics for the admin UI. Never contains secrets. */
  additionalInfo: Record<string, string>;
}

export interface ProbeRequest {
  maxDocuments: number;
  maxPreviewBytes: number;
}

export const DEFAULT_PROBE_REQUEST: ProbeRequest = { maxDocuments: 3, maxPreviewBytes: 256 };

export interface ProbeDocument {
  documentId: string;
  filename: string;
  sizeBytes?: number;
  mimeType?: string;
  bytesRead: number;
}

export interface ProbeResult {
  success: boolean;
  message: string;
  documents: ProbeDocument[];
}

export interface DocumentProvider {
  readonly providerType: ProviderType;
  readonly providerName: string;
  readonly enabled: boolean;

  /** Every matching document, all pages already drained. */
  listDocuments(signal?: AbortSignal): Promise<ProviderDocument[]>;

  /** A freshly opened stream owned by the caller, who must close it. */
  downloadDocument(documentId: string, signal?: AbortSignal): Promise<Readable>;

  getMetadata(signal?: AbortSignal): Promise<ProviderMetadata>;

  /** Connectivity check. Resolves with a negative result instead of throwing. */
  probe(request?: Partial<ProbeRequest>, signal?: AbortSignal): Promise<ProbeResult>;
}
