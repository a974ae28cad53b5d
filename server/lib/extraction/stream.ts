import type { Readable } from "stream";
import { throwIfAborted } from "../errors";

/** Drain a stream into one Buffer, checking the signal between chunks. */
export async function readStreamToBuffer(stream: Readable, signal?: AbortSignal): Promise<Buffer> {
  const parts: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      throwIfAborted(signal);
      parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } finally {
    stream.destroy();
  }
  return Buffer.concat(parts);
}
