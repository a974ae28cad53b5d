import path from "path";
import { Readable } from "stream";
import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import type { DocumentProvider, ProbeRequest, ProbeResult, ProviderDocument, ProviderMetadata } from "./types";
import type { S3ProviderSettings } from "./settings";
import { getMimeType } from "./mime";
import { probeProvider } from "./probe";
import { normalizeExtension } from "../extraction/textExtractionService";
import { DocumentNotFoundError, ProviderUnavailableError, errorMessage, isAbortError, throwIfAborted } from "../errors";
import { createLogger } from "../log";

const logger = createLogger("providers");

export interface S3ObjectSummary {
  key: string;
  etag?: string;
  lastModified?: Date;
  size?: number;
}

export interface S3ObjectPage {
  objects: S3ObjectSummary[];
  nextContinuationToken?: string;
}

/**
 * The two bucket operations the provider needs. The SDK-backed source is the
 * production implementation; tests hand in their own.
 */
export interface S3ObjectSource {
  listPage(prefix: string | undefined, continuationToken: string | undefined, signal?: AbortSignal): Promise<S3ObjectPage>;
  getObject(key: string, signal?: AbortSignal): Promise<Readable>;
}

export function createS3ObjectSource(settings: S3ProviderSettings): S3ObjectSource {
  const client = new S3Client({
    region: settings.region,
    endpoint: settings.endpoint,
    forcePathStyle: settings.forcePathStyle,
    // Without explicit credentials the SDK falls back to the default chain
    // (environment, shared config, instance profile)
    credentials:
      !settings.useInstanceProfile && settings.accessKeyId && settings.secretAccessKey
        ? {
            accessKeyId: settings.accessKeyId,
            secretAccessKey: settings.secretAccessKey,
            sessionToken: settings.sessionToken,
          }
        : undefined,
  });

  return {
    async listPage(prefix, continuationToken, signal) {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: settings.bucketName,
          Prefix: prefix || undefined,
          ContinuationToken: continuationToken,
        }),
        { abortSignal: signal },
      );
      return {
        objects: (response.Contents ?? []).flatMap((o) =>
          o.Key ? [{ key: o.Key, etag: o.ETag, lastModified: o.LastModified, size: o.Size }] : [],
        ),
        nextContinuationToken: response.IsTruncated ? response.NextContinuationToken : undefined,
      };
    },

    async getObject(key, signal) {
      const response = await client.send(
        new GetObjectCommand({ Bucket: settings.bucketName, Key: key }),
        { abortSignal: signal },
      );
      if (response.Body instanceof Readable) return response.Body;
      if (!response.Body) throw new Error(`Empty response body for ${key}`);
      return Readable.from(await response.Body.transformToByteArray());
    },
  };
}

function isMissingKey(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  if (error instanceof S3ServiceException) {
    return error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

export class S3Provider implements DocumentProvider {
  readonly providerType = "s3";
  readonly providerName: string;
  readonly enabled: boolean;
  private readonly settings: S3ProviderSettings;
  private readonly source: S3ObjectSource;

  constructor(settings: S3ProviderSettings, source?: S3ObjectSource) {
    this.settings = settings;
    this.providerName = settings.name;
    this.enabled = settings.enabled;
    this.source = source ?? createS3ObjectSource(settings);
  }

  async listDocuments(signal?: AbortSignal): Promise<ProviderDocument[]> {
    const documents: ProviderDocument[] = [];
    const prefix = this.settings.prefix;
    let continuationToken: string | undefined;

    try {
      do {
        throwIfAborted(signal);
        const page = await this.source.listPage(prefix, continuationToken, signal);

        for (const object of page.objects) {
          // Folder placeholders
          if (object.key.endsWith("/")) continue;

          const extension = path.posix.extname(object.key);
          if (!extension || !this.settings.fileExtensions.includes(normalizeExtension(extension))) continue;

          const relativePath = prefix ? object.key.slice(prefix.length).replace(/^\/+/, "") : object.key;
          documents.push({
            documentId: object.key,
            filename: path.posix.basename(object.key),
            providerType: this.providerType,
            providerName: this.providerName,
            etag: object.etag?.replace(/^"+|"+$/g, ""),
            lastModified: object.lastModified,
            sizeBytes: object.size,
            mimeType: getMimeType(extension),
            relativePath,
          });
        }

        continuationToken = page.nextContinuationToken;
      } while (continuationToken);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderUnavailableError(
        `S3 error listing documents from bucket ${this.settings.bucketName}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    logger.info(`Found ${documents.length} documents in S3 provider '${this.providerName}'`);
    return documents;
  }

  async downloadDocument(documentId: string, signal?: AbortSignal): Promise<Readable> {
    try {
      const stream = await this.source.getObject(documentId, signal);
      logger.debug(`Downloaded document from S3: ${documentId}`);
      return stream;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      if (isMissingKey(error)) {
        throw new DocumentNotFoundError(documentId, `S3 object ${documentId} no longer exists`, { cause: error });
      }
      throw new ProviderUnavailableError(
        `S3 error downloading document ${documentId} from bucket ${this.settings.bucketName}: ${errorMessage(error)}`,
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
        bucketName: this.settings.bucketName,
        prefix: this.settings.prefix || "(root)",
        region: this.settings.region,
        authMode: this.settings.useInstanceProfile ? "InstanceProfile" : "AccessKey",
      },
    };
  }

  probe(request?: Partial<ProbeRequest>, signal?: AbortSignal): Promise<ProbeResult> {
    return probeProvider(this, request, signal);
  }
}
