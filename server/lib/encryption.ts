import CryptoJS from "crypto-js";
import { SECRET_SETTING_FIELDS } from "./providers/settings";

export const REDACTED = "********";

export interface SettingsCipher {
  readonly enabled: boolean;
  encrypt(text: string): string;
  decrypt(ciphertext: string): string;
}

/** AES with a passphrase. Without a key values pass through unchanged. */
export function createSettingsCipher(key: string | undefined): SettingsCipher {
  const encryptionKey = key || "";

  return {
    enabled: !!encryptionKey,

    encrypt(text: string): string {
      if (!encryptionKey) {
        return text;
      }
      return CryptoJS.AES.encrypt(text, encryptionKey).toString();
    },

    decrypt(ciphertext: string): string {
      if (!encryptionKey) {
        return ciphertext;
      }
      try {
        const plain = CryptoJS.AES.decrypt(ciphertext, encryptionKey).toString(CryptoJS.enc.Utf8);
        // Values written before a key was configured are stored in clear
        return plain || ciphertext;
      } catch {
        return ciphertext;
      }
    },
  };
}

function mapSecrets(
  settings: Record<string, unknown>,
  fn: (value: string) => string,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...settings };
  for (const field of SECRET_SETTING_FIELDS) {
    const value = result[field];
    if (typeof value === "string" && value.length > 0) {
      result[field] = fn(value);
    }
  }
  return result;
}

export function encryptSecrets(settings: Record<string, unknown>, cipher: SettingsCipher): Record<string, unknown> {
  return mapSecrets(settings, (value) => cipher.encrypt(value));
}

export function decryptSecrets(settings: Record<string, unknown>, cipher: SettingsCipher): Record<string, unknown> {
  return mapSecrets(settings, (value) => cipher.decrypt(value));
}

export function redactSecrets(settings: Record<string, unknown>): Record<string, unknown> {
  return mapSecrets(settings, () => REDACTED);
}
