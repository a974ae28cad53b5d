import { z } from "zod";
import type { DocumentProvider, ProviderType } from "./types";
import {
  localSettingsSchema,
  oneDriveSettingsSchema,
  s3SettingsSchema,
  type BaseProviderSettings,
} from "./settings";
import { LocalProvider } from "./local";
import { S3Provider } from "./s3";
import { OneDriveProvider } from "./onedrive";
import { InvalidConfigurationError } from "../errors";

export type ProviderFactory<S> = (settings: S) => DocumentProvider;

/** Validated settings bound to the factory that turns them into a live provider. */
export interface ResolvedProvider {
  readonly providerType: ProviderType;
  readonly settings: Readonly<BaseProviderSettings & Record<string, unknown>>;
  create(): DocumentProvider;
}

interface Registration {
  parse(raw: unknown): ResolvedProvider;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Maps a provider type to its settings schema and factory. Adding a new
 * source is one `register` call; nothing else switches on the type string.
 */
export class ProviderRegistry {
  private registrations = new Map<string, Registration>();

  register<S extends BaseProviderSettings & Record<string, unknown>>(
    providerType: ProviderType,
    schema: z.ZodType<S, z.ZodTypeDef, unknown>,
    factory: ProviderFactory<S>,
  ): this {
    const key = providerType.toLowerCase();
    if (this.registrations.has(key)) {
      throw new InvalidConfigurationError(`Provider type '${providerType}' is already registered`);
    }
    this.registrations.set(key, {
      parse: (raw) => {
        const result = schema.safeParse(raw);
        if (!result.success) {
          throw new InvalidConfigurationError(
            `Invalid ${providerType} provider settings: ${formatIssues(result.error)}`,
          );
        }
        const settings: S = result.data;
        Object.freeze(settings);
        return {
          providerType: key,
          settings,
          create: () => factory(settings),
        };
      },
    });
    return this;
  }

  has(providerType: string): boolean {
    return this.registrations.has(providerType.toLowerCase());
  }

  types(): string[] {
    return Array.from(this.registrations.keys()).sort();
  }

  resolve(providerType: string, raw: unknown): ResolvedProvider {
    const registration = this.registrations.get(providerType.toLowerCase());
    if (!registration) {
      throw new InvalidConfigurationError(
        `Unknown provider type '${providerType}'. Known types: ${this.types().join(", ")}`,
      );
    }
    return registration.parse(raw);
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register("local", localSettingsSchema, (settings) => new LocalProvider(settings))
    .register("s3", s3SettingsSchema, (settings) => new S3Provider(settings))
    .register("onedrive", oneDriveSettingsSchema, (settings) => new OneDriveProvider(settings));
}
