export * from "./types";
export * from "./settings";
export { LocalProvider, localDocumentId } from "./local";
export { S3Provider, createS3ObjectSource, type S3ObjectSource } from "./s3";
export { OneDriveProvider } from "./onedrive";
export { MemoryProvider } from "./memory";
export { ProviderRegistry, createDefaultRegistry, type ResolvedProvider } from "./registry";
export {
  ProviderConfigurationService,
  enabledProviders,
  createSnapshot,
  type ConfigurationSnapshot,
  type ConfiguredProvider,
} from "./configuration";
export { seedProviderSettingsFromFile, seedProviderSettings, parseProviderSeeds } from "./seed";
export { probeProvider } from "./probe";
