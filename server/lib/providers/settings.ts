import { z } from "zod";
import { normalizeExtension } from "../extraction/textExtractionService";

const extensionList = z
  .array(z.string().trim().min(1))
  .min(1, "at least one file extension filter is required")
  .transform((list) => Array.from(new Set(list.map(normalizeExtension))));

const baseFields = {
  name: z.string().trim().min(1, "provider name is required"),
  enabled: z.boolean().default(true),
};

export const localSettingsSchema = z.object({
  ...baseFields,
  rootPath: z.string().trim().min(1, "local provider requires a non-empty root path"),
  fileExtensions: extensionList.default([".docx", ".pdf", ".txt"]),
  recursive: z.boolean().default(true),
  excludePatterns: z.array(z.string().trim().min(1)).default([]),
});

export const s3SettingsSchema = z
  .object({
    ...baseFields,
    bucketName: z.string().trim().default(""),
    prefix: z.string().trim().optional(),
    region: z.string().trim().min(1).default("us-east-1"),
    endpoint: z.string().url().optional(),
    forcePathStyle: z.boolean().default(false),
    accessKeyId: z.string().trim().optional(),
    secretAccessKey: z.string().trim().optional(),
    sessionToken: z.string().trim().optional(),
    useInstanceProfile: z.boolean().default(false),
    fileExtensions: extensionList.default([".docx", ".pdf", ".txt"]),
  })
  .superRefine((s, ctx) => {
    if (!s.enabled) return;
    if (!s.bucketName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["bucketName"],
        message: "S3 provider requires a bucket name when enabled",
      });
    }
    if (!s.useInstanceProfile && (!s.accessKeyId || !s.secretAccessKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["accessKeyId"],
        message: "S3 provider requires accessKeyId and secretAccessKey when not using instance profile",
      });
    }
  });

export const oneDriveSettingsSchema = z
  .object({
    ...baseFields,
    accountType: z.enum(["personal", "business"]).default("business"),
    tenantId: z.string().trim().optional(),
    clientId: z.string().trim().optional(),
    clientSecret: z.string().trim().optional(),
    siteId: z.string().trim().optional(),
    driveId: z.string().trim().optional(),
    folderPath: z.string().trim().default("/Shared Documents/Docs"),
    recursive: z.boolean().default(true),
    fileExtensions: extensionList.default([".docx"]),
  })
  .superRefine((s, ctx) => {
    if (!s.enabled) return;
    if (!s.tenantId || !s.clientId || !s.clientSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["clientId"],
        message: "OneDrive provider requires tenantId, clientId and clientSecret when enabled",
      });
    }
    if (s.accountType === "business" && !s.driveId && !s.siteId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["driveId"],
        message: "Business OneDrive provider requires either driveId or siteId",
      });
    }
  });

export type BaseProviderSettings = { name: string; enabled: boolean };
export type LocalProviderSettings = z.infer<typeof localSettingsSchema>;
export type S3ProviderSettings = z.infer<typeof s3SettingsSchema>;
export type OneDriveProviderSettings = z.infer<typeof oneDriveSettingsSchema>;

/** Fields encrypted at rest and redacted from admin responses. */
export const SECRET_SETTING_FIELDS = ["secretAccessKey", "sessionToken", "clientSecret"] as const;
