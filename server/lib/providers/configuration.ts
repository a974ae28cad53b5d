import type { ProviderSettingsStore } from "../../storage";
import type { DocumentProvider } from "./types";
import type { ProviderRegistry } from "./registry";
import { createSettingsCipher, decryptSecrets, type SettingsCipher } from "../encryption";
import { createLogger } from "../log";

const logger = createLogger("providers");

export interface ConfiguredProvider {
  readonly providerType: string;
  readonly providerName: string;
  readonly enabled: boolean;
  readonly provider: DocumentProvider;
}

/** Immutable view of the provider set at one point in time. */
export interface ConfigurationSnapshot {
  readonly loadedAt: Date;
  readonly providers: readonly ConfiguredProvider[];
  /** Settings rows that failed validation or construction, keyed `type/name`. */
  readonly rejected: readonly { readonly key: string; readonly reason: string }[];
}

export function enabledProviders(snapshot: ConfigurationSnapshot): DocumentProvider[] {
  return snapshot.providers.filter((p) => p.enabled).map((p) => p.provider);
}

/** Snapshot over already-built providers, for one-off runs and tests. */
export function createSnapshot(providers: readonly DocumentProvider[]): ConfigurationSnapshot {
  return Object.freeze({
    loadedAt: new Date(),
    providers: Object.freeze(
      providers.map((provider) =>
        Object.freeze({
          providerType: provider.providerType,
          providerName: provider.providerName,
          enabled: provider.enabled,
          provider,
        }),
      ),
    ),
    rejected: Object.freeze([]),
  });
}

export class ProviderConfigurationService {
  private snapshot: ConfigurationSnapshot | null = null;
  private pending: Promise<ConfigurationSnapshot> | null = null;
  private readonly cipher: SettingsCipher;

  constructor(
    private readonly store: ProviderSettingsStore,
    private readonly registry: ProviderRegistry,
    cipher?: SettingsCipher,
  ) {
    this.cipher = cipher ?? createSettingsCipher(undefined);
  }

  async getSnapshot(): Promise<ConfigurationSnapshot> {
    if (this.snapshot) return this.snapshot;
    return this.reload();
  }

  /**
   * Re-reads every settings row and swaps in a new snapshot. Reloads queue
   * behind one another; a run already holding the old snapshot keeps it.
   */
  reload(): Promise<ConfigurationSnapshot> {
    const previous = this.pending ?? Promise.resolve(null);
    const next = previous
      .catch(() => null)
      .then(() => this.load())
      .then((snapshot) => {
        this.snapshot = snapshot;
        return snapshot;
      });

    this.pending = next;
    const clear = () => {
      if (this.pending === next) this.pending = null;
    };
    next.then(clear, clear);
    return next;
  }

  private async load(): Promise<ConfigurationSnapshot> {
    const rows = await this.store.listProviderSettings();
    const configured: ConfiguredProvider[] = [];
    const rejected: { key: string; reason: string }[] = [];

    for (const row of rows) {
      const key = `${row.providerType}/${row.providerName}`;
      try {
        const raw = { ...decryptSecrets(row.settings, this.cipher), name: row.providerName };
        const resolved = this.registry.resolve(row.providerType, raw);
        const provider = resolved.create();
        configured.push(
          Object.freeze({
            providerType: resolved.providerType,
            providerName: provider.providerName,
            enabled: provider.enabled,
            provider,
          }),
        );
      } catch (error) {
        logger.warn(`Skipping provider ${key}`, error);
        rejected.push(Object.freeze({ key, reason: error instanceof Error ? error.message : String(error) }));
      }
    }

    const enabledCount = configured.filter((p) => p.enabled).length;
    logger.info(`Loaded ${configured.length} provider(s), ${enabledCount} enabled, ${rejected.length} rejected`);

    return Object.freeze({
      loadedAt: new Date(),
      providers: Object.freeze(configured),
      rejected: Object.freeze(rejected),
    });
  }
}
