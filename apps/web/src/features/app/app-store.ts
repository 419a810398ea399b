import { createStore, type StoreApi } from "zustand/vanilla";
import { defaultLocale, isSupportedLocale, type LocaleCode, type LocalizationService } from "@/core/l10n/localization-service";
import type { Logger } from "@/core/logging/logger";
import type { AppPref } from "@/core/storage/app-pref";
import { parseThemeMode, type ThemeMode } from "@/core/theme/theme";

export type AppState = {
  themeMode: ThemeMode;
  locale: LocaleCode;
  loaded: boolean;
  load: () => Promise<void>;
  changeTheme: (mode: ThemeMode) => Promise<void>;
  changeLocale: (code: string) => Promise<void>;
};

export type AppStore = StoreApi<AppState>;

export function createAppStore(pref: AppPref, localization: LocalizationService, logger: Logger): AppStore {
  const store = createStore<AppState>((set) => ({
    themeMode: "dark",
    locale: defaultLocale,
    loaded: false,

    load: async () => {
      try {
        const [theme, locale] = await Promise.all([pref.getThemeMode(), localization.getSavedLocale()]);
        set({ themeMode: parseThemeMode(theme), locale, loaded: true });
      } catch (error) {
        logger.warn({ err: error }, "app preferences unavailable, keeping defaults");
        set({ loaded: true });
      }
    },

    changeTheme: async (mode) => {
      try {
        await pref.setThemeMode(mode);
      } catch (error) {
        logger.error({ err: error, mode }, "theme mode not saved");
      }
      set({ themeMode: mode });
    },

    changeLocale: async (code) => {
      if (!isSupportedLocale(code)) {
        logger.warn({ code }, "unsupported locale ignored");
        return;
      }
      try {
        await localization.setLocale(code);
      } catch (error) {
        logger.error({ err: error, code }, "locale not saved");
      }
      set({ locale: code });
    },
  }));
  // actions never reject; storage failures are logged
  void store.getState().load();
  return store;
}
