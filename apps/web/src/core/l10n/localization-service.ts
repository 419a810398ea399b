import type { Logger } from "@/core/logging/logger";
import type { AppPref } from "@/core/storage/app-pref";

export const supportedLocales = ["en", "ur"] as const;
export type LocaleCode = (typeof supportedLocales)[number];
export const defaultLocale: LocaleCode = "en";

const localeNames: Record<LocaleCode, string> = {
  en: "English",
  ur: "اردو",
};

export function isSupportedLocale(code: string): code is LocaleCode {
  return supportedLocales.some((locale) => locale === code);
}

export class LocalizationService {
  readonly supportedLocales = supportedLocales;
  readonly defaultLocale = defaultLocale;

  constructor(
    private readonly pref: AppPref,
    private readonly logger?: Logger,
  ) {}

  async getSavedLocale(): Promise<LocaleCode> {
    try {
      const saved = await this.pref.getLocale();
      return isSupportedLocale(saved) ? saved : defaultLocale;
    } catch (error) {
      this.logger?.warn({ err: error }, "saved locale unavailable");
      return defaultLocale;
    }
  }

  async setLocale(code: LocaleCode): Promise<void> {
    await this.pref.setLocale(code);
  }

  getLocaleName(code: string): string {
    return isSupportedLocale(code) ? localeNames[code] : code;
  }

  isRtl(code: string): boolean {
    return code === "ur";
  }
}
