import i18next, { type i18n } from "i18next";
import { initReactI18next } from "react-i18next";
import en from "@/core/l10n/messages/en.json";
import ur from "@/core/l10n/messages/ur.json";

export const resources = {
  en: { translation: en },
  ur: { translation: ur },
} as const;

export function createI18n(locale: string): i18n {
  const instance = i18next.createInstance();
  void instance.use(initReactI18next).init({
    resources,
    lng: locale,
    fallbackLng: "en",
    initImmediate: false,
    interpolation: {
      escapeValue: false,
    },
  });
  return instance;
}
