import path from "path";
import { Readable } from "stream";
import { z } from "zod";
import type { DocumentProvider, ProbeRequest, ProbeResult, ProviderDocument, ProviderMetadata } from "./types";
import type { OneDriveProviderSettings } from "./settings";
import { probeProvider } from "./probe";
import { normalizeExtension } from "../extraction/textExtractionService";
import {
  DocumentNotFoundError,
  InvalidConfigurationError,
  ProviderUnavailableError,
  errorMessage,
  isAbortError,
  throwIfAborted,
} from "../errors";
import { createLogger } from "../log";

const logger = createLogger("providers");

const GRAPH_API = "https://graph.microsoft.com/v1.0";
const LOGIN_HOST = "https://login.microsoftonline.com";
const PAGE_SIZE = 200;
const CHILDREN_QUERY = `$top=${PAGE_SIZE}&$select=id,name,eTag,lastModifiedDateTime,size,file,folder`;
// Refresh the app token this long before Graph says it expires
const TOKEN_EXPIRY_SKEW_MS = 60_000;

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const driveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  eTag: z.string().optional(),
  lastModifiedDateTime: z.string().optional(),
  size: z.number().optional(),
  file: z.object({ mimeType: z.string().optional() }).optional(),
  folder: z.object({ childCount: z.number().optional() }).optional(),
});

const driveItemPageSchema = z.object({
  value: z.array(driveItemSchema),
  "@odata.nextLink": z.string().optional(),
});

const driveSchema = z.object({ id: z.string().optional() });

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

class GraphHttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "GraphHttpError";
  }
}

export class OneDriveProvider implements DocumentProvider {
  readonly providerType = "onedrive";
  readonly providerName: string;
  readonly enabled: boolean;
  private readonly settings: OneDriveProviderSettings;
  private readonly fetchImpl: FetchLike;
  private token: { value: string; expiresAt: number } | null = null;
  private driveId: string | null = null;

  constructor(settings: OneDriveProviderSettings, fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
    this.settings = settings;
    this.providerName = settings.name;
    this.enabled = settings.enabled;
    this.fetchImpl = fetchImpl;
  }

  async listDocuments(signal?: AbortSignal): Promise<ProviderDocument[]> {
    try {
      const driveId = await this.resolveDriveId(signal);
      logger.info(`Listing from OneDrive - Drive: ${driveId}, Path: ${this.settings.folderPath}`);

      const documents: ProviderDocument[] = [];
      await this.listFolder(this.folderChildrenUrl(driveId), "", documents, signal);

      logger.info(`Found ${documents.length} documents in OneDrive provider '${this.providerName}'`);
      return documents;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderUnavailableError(
        `Failed to list documents from OneDrive provider '${this.providerName}': ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async downloadDocument(documentId: string, signal?: AbortSignal): Promise<Readable> {
    try {
      const driveId = await this.resolveDriveId(signal);
      const response = await this.graphRequest(
        `${GRAPH_API}/drives/${encodeURIComponent(driveId)}/items/${encodeURIComponent(documentId)}/content`,
        signal,
      );
      return Readable.from(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      if (error instanceof GraphHttpError && error.status === 404) {
        throw new DocumentNotFoundError(documentId, `OneDrive item ${documentId} no longer exists`, { cause: error });
      }
      throw new ProviderUnavailableError(
        `Failed to download document ${documentId} from OneDrive provider '${this.providerName}': ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async getMetadata(): Promise<ProviderMetadata> {
    return {
      providerType: this.providerType,
      providerName: this.providerName,
      enabled: this.enabled,
      registeredAt: new Date(),
      additionalInfo: {
        accountType: this.settings.accountType,
        folderPath: this.settings.folderPath,
        ...(this.settings.driveId ? { driveId: this.settings.driveId } : {}),
        ...(this.settings.siteId ? { siteId: this.settings.siteId } : {}),
      },
    };
  }

  probe(request?: Partial<ProbeRequest>, signal?: AbortSignal): Promise<ProbeResult> {
    return probeProvider(this, request, signal);
  }

  private folderChildrenUrl(driveId: string): string {
    const folder = this.settings.folderPath.replace(/^\/+|\/+$/g, "");
    const base = `${GRAPH_API}/drives/${encodeURIComponent(driveId)}/root`;
    return folder
      ? `${base}:/${folder.split("/").map(encodeURIComponent).join("/")}:/children?${CHILDREN_QUERY}`
      : `${base}/children?${CHILDREN_QUERY}`;
  }

  private itemChildrenUrl(driveId: string, itemId: string): string {
    return `${GRAPH_API}/drives/${encodeURIComponent(driveId)}/items/${encodeURIComponent(itemId)}/children?${CHILDREN_QUERY}`;
  }

  private async listFolder(
    url: string,
    relativeDir: string,
    documents: ProviderDocument[],
    signal?: AbortSignal,
  ): Promise<void> {
    let next: string | undefined = url;
    while (next) {
      throwIfAborted(signal);
      const response = await this.graphRequest(next, signal);
      const page = driveItemPageSchema.parse(await response.json());

      for (const item of page.value) {
        const relativePath = relativeDir ? `${relativeDir}/${item.name}` : item.name;

        if (item.folder) {
          if (this.settings.recursive && this.driveId) {
            await this.listFolder(this.itemChildrenUrl(this.driveId, item.id), relativePath, documents, signal);
          }
          continue;
        }
        if (!item.file) continue;

        const extension = path.posix.extname(item.name);
        if (!extension || !this.settings.fileExtensions.includes(normalizeExtension(extension))) continue;

        documents.push({
          documentId: item.id,
          filename: item.name,
          providerType: this.providerType,
          providerName: this.providerName,
          etag: item.eTag,
          lastModified: item.lastModifiedDateTime ? new Date(item.lastModifiedDateTime) : undefined,
          sizeBytes: item.size,
          mimeType: item.file.mimeType,
          relativePath,
        });
      }

      next = page["@odata.nextLink"];
    }
  }

  private async resolveDriveId(signal?: AbortSignal): Promise<string> {
    if (this.driveId) return this.driveId;

    if (this.settings.driveId) {
      this.driveId = this.settings.driveId;
      return this.driveId;
    }

    let url: string;
    if (this.settings.accountType === "personal") {
      url = `${GRAPH_API}/me/drive?$select=id`;
    } else if (this.settings.siteId) {
      url = `${GRAPH_API}/sites/${encodeURIComponent(this.settings.siteId)}/drive?$select=id`;
    } else {
      throw new InvalidConfigurationError(
        `For business accounts, either driveId or siteId must be configured for OneDrive provider '${this.providerName}'`,
      );
    }

    const response = await this.graphRequest(url, signal);
    const drive = driveSchema.parse(await response.json());
    if (!drive.id) {
      throw new Error(`Failed to retrieve drive id for OneDrive provider '${this.providerName}'`);
    }
    this.driveId = drive.id;
    return drive.id;
  }

  private async graphRequest(url: string, signal?: AbortSignal): Promise<Response> {
    const accessToken = await this.getAccessToken(signal);
    const response = await this.fetchImpl(url, {
      headers: { Authorization: `Bearer ${accessToken}` },
      signal,
    });

    if (response.status === 401) {
      // Token revoked or expired early; next call fetches a new one
      this.token = null;
    }
    if (!response.ok) {
      throw new GraphHttpError(response.status, `Graph API error: ${response.status}`);
    }
    return response;
  }

  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const { tenantId, clientId, clientSecret } = this.settings;
    if (!tenantId || !clientId || !clientSecret) {
      throw new InvalidConfigurationError(
        `tenantId, clientId and clientSecret are required for OneDrive provider '${this.providerName}'`,
      );
    }

    const body = new URLSearchParams();
    body.set("client_id", clientId);
    body.set("client_secret", clientSecret);
    body.set("scope", "https://graph.microsoft.com/.default");
    body.set("grant_type", "client_credentials");

    const response = await this.fetchImpl(`${LOGIN_HOST}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
      signal,
    });

    if (!response.ok) {
      throw new GraphHttpError(response.status, `Token request failed: ${response.status}`);
    }

    const data = tokenResponseSchema.parse(await response.json());
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + data.expires_in * 1000 - TOKEN_EXPIRY_SKEW_MS,
    };
    return this.token.value;
  }
}
