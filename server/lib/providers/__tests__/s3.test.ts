import { describe, it, expect } from "@jest/globals";
import { Readable } from "stream";
import { NoSuchKey } from "@aws-sdk/client-s3";
import { S3Provider, type S3ObjectPage, type S3ObjectSource } from "../s3";
import { s3SettingsSchema } from "../settings";
import { DocumentNotFoundError, ProviderUnavailableError } from "../../errors";

const MODIFIED = new Date("2024-05-01T12:00:00.000Z");

class FakeBucket implements S3ObjectSource {
  listCalls: (string | undefined)[] = [];
  listError: Error | null = null;
  objects = new Map<string, string>();

  constructor(private readonly pages: S3ObjectPage[]) {}

  async listPage(prefix: string | undefined, token: string | undefined): Promise<S3ObjectPage> {
    this.listCalls.push(token);
    if (this.listError) throw this.listError;
    const index = token ? Number(token) : 0;
    return this.pages[index];
  }

  async getObject(key: string): Promise<Readable> {
    const body = this.objects.get(key);
    if (body === undefined) {
      throw new NoSuchKey({ message: "The specified key does not exist.", $metadata: { httpStatusCode: 404 } });
    }
    return Readable.from([Buffer.from(body)]);
  }
}

function settings(overrides: Record<string, unknown> = {}) {
  return s3SettingsSchema.parse({
    name: "bucket-docs",
    bucketName: "test-bucket",
    prefix: "docs/",
    accessKeyId: "test-key",
    secretAccessKey: "test-secret",
    fileExtensions: ["pdf", ".TXT"],
    ...overrides,
  });
}

describe("S3Provider", () => {
  it("should follow continuation tokens and filter by extension", async () => {
    const bucket = new FakeBucket([
      {
        objects: [
          { key: "docs/", size: 0 },
          { key: "docs/a.pdf", etag: '"abc123"', lastModified: MODIFIED, size: 10 },
          { key: "docs/image.png", etag: '"zzz"', size: 5 },
        ],
        nextContinuationToken: "1",
      },
      { objects: [{ key: "docs/sub/b.txt", etag: '"def456"', size: 3 }] },
    ]);

    const docs = await new S3Provider(settings(), bucket).listDocuments();

    expect(bucket.listCalls).toEqual([undefined, "1"]);
    expect(docs).toEqual([
      {
        documentId: "docs/a.pdf",
        filename: "a.pdf",
        providerType: "s3",
        providerName: "bucket-docs",
        etag: "abc123",
        lastModified: MODIFIED,
        sizeBytes: 10,
        mimeType: "application/pdf",
        relativePath: "a.pdf",
      },
      {
        documentId: "docs/sub/b.txt",
        filename: "b.txt",
        providerType: "s3",
        providerName: "bucket-docs",
        etag: "def456",
        lastModified: undefined,
        sizeBytes: 3,
        mimeType: "text/plain",
        relativePath: "sub/b.txt",
      },
    ]);
  });

  it("should wrap listing failures as provider unavailable", async () => {
    const bucket = new FakeBucket([]);
    bucket.listError = new Error("AccessDenied");

    const listing = new S3Provider(settings(), bucket).listDocuments();

    await expect(listing).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(listing).rejects.toThrow("S3 error listing documents from bucket test-bucket: AccessDenied");
  });

  it("should map a missing key to DocumentNotFoundError", async () => {
    const provider = new S3Provider(settings(), new FakeBucket([]));

    const error = await provider.downloadDocument("docs/gone.pdf").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentNotFoundError);
    expect(error).toMatchObject({ documentId: "docs/gone.pdf", kind: "document_not_found" });
  });

  it("should return the object body", async () => {
    const bucket = new FakeBucket([]);
    bucket.objects.set("docs/a.txt", "body");
    const stream = await new S3Provider(settings(), bucket).downloadDocument("docs/a.txt");

    const chunks: Buffer[] = [];
    for await (const chunk of stream) chunks.push(Buffer.from(chunk));
    expect(Buffer.concat(chunks).toString()).toBe("body");
  });

  it("should describe the bucket without credentials", async () => {
    const metadata = await new S3Provider(settings(), new FakeBucket([])).getMetadata();

    expect(metadata.additionalInfo).toEqual({
      bucketName: "test-bucket",
      prefix: "docs/",
      region: "us-east-1",
      authMode: "AccessKey",
    });
  });
});

describe("s3SettingsSchema", () => {
  it("should require credentials unless an instance profile is used", () => {
    expect(s3SettingsSchema.safeParse({ name: "x", bucketName: "b" }).success).toBe(false);
    expect(s3SettingsSchema.safeParse({ name: "x", bucketName: "b", useInstanceProfile: true }).success).toBe(true);
  });

  it("should not validate disabled providers beyond the basics", () => {
    expect(s3SettingsSchema.safeParse({ name: "x", enabled: false }).success).toBe(true);
  });

  it("should normalize and de-duplicate extensions", () => {
    expect(settings({ fileExtensions: ["PDF", ".pdf", "txt"] }).fileExtensions).toEqual([".pdf", ".txt"]);
  });
});
