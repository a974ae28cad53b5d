import type { DocumentProvider, ProbeDocument, ProbeRequest, ProbeResult } from "./types";
import { DEFAULT_PROBE_REQUEST } from "./types";
import { errorMessage, isAbortError } from "../errors";
import { createLogger } from "../log";

const logger = createLogger("providers");
const MAX_PREVIEW_BYTES = 4096;

/**
 * List, then read a few preview bytes from the first documents. Shared by
 * every provider variant; never rejects.
 */
export async function probeProvider(
  provider: DocumentProvider,
  request: Partial<ProbeRequest> = {},
  signal?: AbortSignal,
): Promise<ProbeResult> {
  const { maxDocuments, maxPreviewBytes } = { ...DEFAULT_PROBE_REQUEST, ...request };
  const previewLimit = Math.max(0, Math.min(maxPreviewBytes, MAX_PREVIEW_BYTES));

  try {
    const documents = await provider.listDocuments(signal);
    if (documents.length === 0) {
      return {
        success: true,
        message: "No matching files were found, but the provider is reachable.",
        documents: [],
      };
    }

    const sampled: ProbeDocument[] = [];
    for (const doc of documents.slice(0, Math.max(0, maxDocuments))) {
      const stream = await provider.downloadDocument(doc.documentId, signal);
      let bytesRead = 0;
      try {
        for await (const chunk of stream) {
          const size = Buffer.isBuffer(chunk) ? chunk.length : Buffer.byteLength(String(chunk));
          bytesRead = Math.min(previewLimit, bytesRead + size);
          if (bytesRead >= previewLimit) break;
        }
      } finally {
        stream.destroy();
      }
      sampled.push({
        documentId: doc.documentId,
        filename: doc.filename,
        sizeBytes: doc.sizeBytes,
        mimeType: doc.mimeType,
        bytesRead,
      });
    }

    return {
      success: true,
      message: `Provider ${provider.providerType}/${provider.providerName} responded successfully (${documents.length} documents).`,
      documents: sampled,
    };
  } catch (error) {
    if (isAbortError(error, signal)) {
      return { success: false, message: "Probe cancelled", documents: [] };
    }
    logger.error(`Probe failed for provider ${provider.providerType}/${provider.providerName}`, error);
    return { success: false, message: errorMessage(error), documents: [] };
  }
}
