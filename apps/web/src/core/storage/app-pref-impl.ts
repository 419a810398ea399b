import { z } from "zod";
import type { Logger } from "@/core/logging/logger";
import { AppPrefKeys, type AppPref } from "@/core/storage/app-pref";
import type { EncryptionService } from "@/core/storage/encryption-service";
import type { KeyValueStorage } from "@/core/storage/key-value-storage";

const KEY_SUFFIX = "_app_pref_v1";
const stringListSchema = z.array(z.string());

export function versionedKey(name: string): string {
  return `${name}${KEY_SUFFIX}`;
}

export class AppPrefImpl implements AppPref {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly encryption: Pick<EncryptionService, "encrypt" | "decrypt">,
    private readonly logger?: Logger,
  ) {}

  getToken(): Promise<string> {
    return this.getString(AppPrefKeys.token);
  }

  setToken(token: string): Promise<void> {
    return this.setString(AppPrefKeys.token, token);
  }

  getRefreshToken(): Promise<string> {
    return this.getString(AppPrefKeys.refreshToken);
  }

  setRefreshToken(token: string): Promise<void> {
    return this.setString(AppPrefKeys.refreshToken, token);
  }

  getUserId(): Promise<string> {
    return this.getString(AppPrefKeys.userId);
  }

  setUserId(userId: string): Promise<void> {
    return this.setString(AppPrefKeys.userId, userId);
  }

  getLoginStatus(): Promise<boolean> {
    return this.getBoolean(AppPrefKeys.loginStatus);
  }

  setLoginStatus(loggedIn: boolean): Promise<void> {
    return this.setBoolean(AppPrefKeys.loginStatus, loggedIn);
  }

  getThemeMode(): Promise<string> {
    return this.getString(AppPrefKeys.themeMode, "dark");
  }

  setThemeMode(mode: string): Promise<void> {
    return this.setString(AppPrefKeys.themeMode, mode);
  }

  getLocale(): Promise<string> {
    return this.getString(AppPrefKeys.locale, "en");
  }

  setLocale(locale: string): Promise<void> {
    return this.setString(AppPrefKeys.locale, locale);
  }

  isOnboardingCompleted(): Promise<boolean> {
    return this.getBoolean(AppPrefKeys.onboardingCompleted);
  }

  setOnboardingCompleted(done: boolean): Promise<void> {
    return this.setBoolean(AppPrefKeys.onboardingCompleted, done);
  }

  async getString(key: string, fallback = ""): Promise<string> {
    const raw = this.storage.getItem(versionedKey(key));
    if (raw === null) {
      return fallback;
    }
    try {
      return await this.encryption.decrypt(raw);
    } catch (error) {
      this.logger?.warn({ key, err: error }, "preference could not be decrypted, using default");
      return fallback;
    }
  }

  async setString(key: string, value: string): Promise<void> {
    this.storage.setItem(versionedKey(key), await this.encryption.encrypt(value));
  }

  async getNumber(key: string, fallback = 0): Promise<number> {
    const raw = this.storage.getItem(versionedKey(key));
    const parsed = raw === null ? Number.NaN : Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  async setNumber(key: string, value: number): Promise<void> {
    this.storage.setItem(versionedKey(key), String(value));
  }

  async getBoolean(key: string, fallback = false): Promise<boolean> {
    const raw = this.storage.getItem(versionedKey(key));
    if (raw === "true") {
      return true;
    }
    if (raw === "false") {
      return false;
    }
    return fallback;
  }

  async setBoolean(key: string, value: boolean): Promise<void> {
    this.storage.setItem(versionedKey(key), value ? "true" : "false");
  }

  async getStringList(key: string): Promise<string[]> {
    const raw = await this.getString(key);
    if (!raw) {
      return [];
    }
    try {
      const parsed = stringListSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : [];
    } catch (error) {
      this.logger?.warn({ key, err: error }, "preference list is not valid JSON, using empty list");
      return [];
    }
  }

  setStringList(key: string, values: string[]): Promise<void> {
    return this.setString(key, JSON.stringify(values));
  }

  async remove(key: string): Promise<void> {
    this.storage.removeItem(versionedKey(key));
  }

  async clearSession(): Promise<void> {
    for (const key of [AppPrefKeys.token, AppPrefKeys.refreshToken, AppPrefKeys.userId, AppPrefKeys.loginStatus]) {
      this.storage.removeItem(versionedKey(key));
    }
  }

  async clear(): Promise<void> {
    this.storage
      .keys()
      .filter((key) => key.endsWith(KEY_SUFFIX))
      .forEach((key) => this.storage.removeItem(key));
  }
}
