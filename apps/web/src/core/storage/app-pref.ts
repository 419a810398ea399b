export const AppPrefKeys = {
  token: "auth_token",
  refreshToken: "refresh_token",
  userId: "user_id",
  loginStatus: "login_status",
  themeMode: "theme_mode",
  locale: "app_locale",
  onboardingCompleted: "onboarding_completed",
  tasks: "tasks_cache",
  notes: "notes_cache",
} as const;

export interface AppPref {
  getToken(): Promise<string>;
  setToken(token: string): Promise<void>;
  getRefreshToken(): Promise<string>;
  setRefreshToken(token: string): Promise<void>;
  getUserId(): Promise<string>;
  setUserId(userId: string): Promise<void>;
  getLoginStatus(): Promise<boolean>;
  setLoginStatus(loggedIn: boolean): Promise<void>;
  getThemeMode(): Promise<string>;
  setThemeMode(mode: string): Promise<void>;
  getLocale(): Promise<string>;
  setLocale(locale: string): Promise<void>;
  isOnboardingCompleted(): Promise<boolean>;
  setOnboardingCompleted(done: boolean): Promise<void>;

  getString(key: string, fallback?: string): Promise<string>;
  setString(key: string, value: string): Promise<void>;
  getNumber(key: string, fallback?: number): Promise<number>;
  setNumber(key: string, value: number): Promise<void>;
  getBoolean(key: string, fallback?: boolean): Promise<boolean>;
  setBoolean(key: string, value: boolean): Promise<void>;
  getStringList(key: string): Promise<string[]>;
  setStringList(key: string, values: string[]): Promise<void>;

  remove(key: string): Promise<void>;
  /** Drops token, refresh token, user id and login status. */
  clearSession(): Promise<void>;
  clear(): Promise<void>;
}
