// @vitest-environment node
import { AppPrefKeys } from "@/core/storage/app-pref";
import { AppPrefImpl, versionedKey } from "@/core/storage/app-pref-impl";
import { DecryptionError, EncryptionService } from "@/core/storage/encryption-service";
import { MemoryStorage } from "@/core/storage/key-value-storage";
import { silentLogger } from "../helpers/fakes";

describe("encryption service", () => {
  it("round-trips text with a fresh iv each time", async () => {
    const service = new EncryptionService("test-secret");
    const first = await service.encrypt("token-abc");
    const second = await service.encrypt("token-abc");

    expect(first).not.toBe(second);
    expect(first.split(".")).toHaveLength(2);
    await expect(service.decrypt(first)).resolves.toBe("token-abc");
  });

  it("rejects malformed or foreign values", async () => {
    const service = new EncryptionService("test-secret");
    await expect(service.decrypt("no-separator")).rejects.toThrow("malformed encrypted value");
    await expect(service.decrypt("a.b.c")).rejects.toThrow(DecryptionError);
    await expect(service.decrypt("%%%.%%%")).rejects.toThrow("encrypted value is not base64");

    const encrypted = await service.encrypt("hello");
    await expect(new EncryptionService("other-secret").decrypt(encrypted)).rejects.toThrow("unable to decrypt value");
  });
});

describe("app preferences", () => {
  function setup() {
    const storage = new MemoryStorage();
    const pref = new AppPrefImpl(storage, new EncryptionService("test-secret"), silentLogger);
    return { storage, pref };
  }

  it("stores strings encrypted under versioned keys", async () => {
    const { storage, pref } = setup();
    await pref.setToken("token-abc");

    const raw = storage.getItem("auth_token_app_pref_v1");
    expect(raw).not.toBeNull();
    expect(raw).not.toContain("token-abc");
    await expect(pref.getToken()).resolves.toBe("token-abc");
  });

  it("returns defaults for missing values", async () => {
    const { pref } = setup();
    await expect(pref.getToken()).resolves.toBe("");
    await expect(pref.getThemeMode()).resolves.toBe("dark");
    await expect(pref.getLocale()).resolves.toBe("en");
    await expect(pref.getLoginStatus()).resolves.toBe(false);
    await expect(pref.getNumber("launch_count", 3)).resolves.toBe(3);
    await expect(pref.getStringList("recent")).resolves.toEqual([]);
  });

  it("falls back when a stored value cannot be decrypted", async () => {
    const { storage, pref } = setup();
    storage.setItem(versionedKey(AppPrefKeys.locale), "garbage");
    await expect(pref.getLocale()).resolves.toBe("en");
  });

  it("keeps numbers, booleans and lists", async () => {
    const { storage, pref } = setup();
    await pref.setNumber("launch_count", 7);
    await pref.setOnboardingCompleted(true);
    await pref.setStringList("recent", ["a", "b"]);

    expect(storage.getItem("launch_count_app_pref_v1")).toBe("7");
    await expect(pref.getNumber("launch_count")).resolves.toBe(7);
    await expect(pref.isOnboardingCompleted()).resolves.toBe(true);
    await expect(pref.getStringList("recent")).resolves.toEqual(["a", "b"]);
  });

  it("clears only the session, or every preference it owns", async () => {
    const { storage, pref } = setup();
    storage.setItem("unrelated", "keep");
    await pref.setToken("token-abc");
    await pref.setRefreshToken("refresh-abc");
    await pref.setUserId("user_1");
    await pref.setLoginStatus(true);
    await pref.setThemeMode("light");

    await pref.clearSession();
    await expect(pref.getToken()).resolves.toBe("");
    await expect(pref.getLoginStatus()).resolves.toBe(false);
    await expect(pref.getThemeMode()).resolves.toBe("light");

    await pref.clear();
    expect(storage.keys()).toEqual(["unrelated"]);
  });
});
