export type ThemeMode = "light" | "dark" | "system";
export type ResolvedTheme = "light" | "dark";

export const themeModes: readonly ThemeMode[] = ["light", "dark", "system"];

export function parseThemeMode(raw: string | null | undefined, fallback: ThemeMode = "dark"): ThemeMode {
  const value = raw?.trim().toLowerCase();
  if (value === "light" || value === "dark" || value === "system") {
    return value;
  }
  return fallback;
}

export function resolveTheme(mode: ThemeMode, prefersDark: boolean): ResolvedTheme {
  if (mode === "system") {
    return prefersDark ? "dark" : "light";
  }
  return mode;
}
