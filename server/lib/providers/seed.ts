import fs from "fs/promises";
import { z } from "zod";
import type { ProviderSettingsStore } from "../../storage";
import type { ProviderRegistry } from "./registry";
import { encryptSecrets, type SettingsCipher } from "../encryption";
import { InvalidConfigurationError, errorMessage } from "../errors";
import { createLogger } from "../log";

const logger = createLogger("providers");

const seedFileSchema = z.array(
  z.object({
    type: z.string().trim().min(1),
    settings: z.record(z.unknown()).refine((s) => typeof s.name === "string" && s.name.trim().length > 0, {
      message: "settings.name is required",
    }),
  }),
);

export type ProviderSeed = z.infer<typeof seedFileSchema>[number];

export function parseProviderSeeds(json: string): ProviderSeed[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new InvalidConfigurationError(`Providers file is not valid JSON: ${errorMessage(error)}`);
  }
  const result = seedFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidConfigurationError(
      `Providers file is invalid: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
    );
  }
  return result.data;
}

/**
 * Inserts seed entries whose `(type, name)` does not exist yet. Rows edited
 * through the admin API are never overwritten. Returns the number inserted.
 */
export async function seedProviderSettings(
  seeds: ProviderSeed[],
  store: ProviderSettingsStore,
  registry: ProviderRegistry,
  cipher: SettingsCipher,
): Promise<number> {
  let inserted = 0;
  for (const seed of seeds) {
    const name = String(seed.settings.name).trim();
    const type = seed.type.toLowerCase();
    if (!registry.has(type)) {
      logger.warn(`Ignoring seed for unknown provider type '${seed.type}' (${name})`);
      continue;
    }
    const wrote = await store.insertProviderSettingsIfMissing(type, name, encryptSecrets(seed.settings, cipher));
    if (wrote) {
      inserted++;
      logger.info(`Seeded provider settings ${type}/${name}`);
    }
  }
  return inserted;
}

export async function seedProviderSettingsFromFile(
  filePath: string,
  store: ProviderSettingsStore,
  registry: ProviderRegistry,
  cipher: SettingsCipher,
): Promise<number> {
  const json = await fs.readFile(filePath, "utf8");
  return seedProviderSettings(parseProviderSeeds(json), store, registry, cipher);
}
