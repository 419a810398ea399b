import { act, fireEvent, render, screen, waitFor } from "@testing-library/react";
import { I18nextProvider } from "react-i18next";
import { describe, expect, it, vi } from "vitest";
import { LocatorProvider } from "@/core/di/locator-context";
import type { ServiceRegistry } from "@/core/di/registry";
import { ServiceLocator } from "@/core/di/service-locator";
import { err, ok, type Result } from "@/core/functional/result";
import { createI18n } from "@/core/l10n/i18n";
import type { LoginEntity } from "@/features/auth/domain/login";
import { createAuthStore, type AuthUseCases } from "@/features/auth/presentation/auth-store";
import { LoginClient } from "@/features/auth/presentation/LoginClient";

const { replace } = vi.hoisted(() => ({ replace: vi.fn() }));

vi.mock("next/navigation", () => ({
  useRouter: () => ({
    push: vi.fn(),
    refresh: vi.fn(),
    replace,
  }),
  usePathname: () => "/login",
}));

const entity: LoginEntity = { token: "test-token", userId: "user_1", email: "ada@example.com" };

function renderLogin(useCases: AuthUseCases, callbackUrl?: string) {
  const locator = new ServiceLocator<ServiceRegistry>();
  locator.registerSingleton("authStore", createAuthStore(useCases));
  render(
    <LocatorProvider locator={locator}>
      <I18nextProvider i18n={createI18n("en")}>
        <LoginClient callbackUrl={callbackUrl} />
      </I18nextProvider>
    </LocatorProvider>,
  );
}

describe("login flow", () => {
  it("validates, asks for the code, then redirects", async () => {
    const useCases: AuthUseCases = {
      login: { execute: vi.fn().mockResolvedValue(ok(entity)) },
      verifyOtp: {
        execute: vi.fn().mockResolvedValueOnce(err("Invalid verification code")).mockResolvedValueOnce(ok(entity)),
      },
      logout: { execute: vi.fn() },
      isAuthenticated: { execute: vi.fn() },
    };
    renderLogin(useCases, "/products");

    fireEvent.click(screen.getByRole("button", { name: "Sign in" }));
    expect(screen.getByText("Email is required")).toBeInTheDocument();
    expect(screen.getByText("Password is required")).toBeInTheDocument();
    expect(useCases.login.execute).not.toHaveBeenCalled();

    fireEvent.change(screen.getByLabelText("Email"), { target: { value: "ada@example.com" } });
    fireEvent.change(screen.getByLabelText("Password"), { target: { value: "Secret123" } });
    fireEvent.click(screen.getByRole("button", { name: "Sign in" }));

    await waitFor(() => expect(screen.getByRole("heading", { name: "Verification code" })).toBeInTheDocument());
    expect(useCases.login.execute).toHaveBeenCalledWith({ email: "ada@example.com", password: "Secret123" });

    fireEvent.change(screen.getByLabelText("Verification code"), { target: { value: "000000" } });
    fireEvent.click(screen.getByRole("button", { name: "Verify" }));
    await waitFor(() => expect(screen.getByRole("alert")).toHaveTextContent("Invalid verification code"));
    expect(replace).not.toHaveBeenCalled();

    fireEvent.change(screen.getByLabelText("Verification code"), { target: { value: "123456" } });
    fireEvent.click(screen.getByRole("button", { name: "Verify" }));
    await waitFor(() => expect(replace).toHaveBeenCalledWith("/products"));
  });

  it("shows the login error and stays on the credentials step", async () => {
    const useCases: AuthUseCases = {
      login: { execute: vi.fn().mockResolvedValue(err("Invalid email or password")) },
      verifyOtp: { execute: vi.fn() },
      logout: { execute: vi.fn() },
      isAuthenticated: { execute: vi.fn() },
    };
    renderLogin(useCases);

    fireEvent.change(screen.getByLabelText("Email"), { target: { value: "ada@example.com" } });
    fireEvent.change(screen.getByLabelText("Password"), { target: { value: "Secret123" } });
    fireEvent.click(screen.getByRole("button", { name: "Sign in" }));

    await waitFor(() => expect(screen.getByRole("alert")).toHaveTextContent("Invalid email or password"));
    expect(screen.getByRole("heading", { name: "Welcome back" })).toBeInTheDocument();
  });

  it("disables the submit button while the login is in flight", async () => {
    let resolveLogin: (value: Result<LoginEntity>) => void = () => undefined;
    const useCases: AuthUseCases = {
      login: { execute: vi.fn(() => new Promise<Result<LoginEntity>>((resolve) => (resolveLogin = resolve))) },
      verifyOtp: { execute: vi.fn() },
      logout: { execute: vi.fn() },
      isAuthenticated: { execute: vi.fn() },
    };
    renderLogin(useCases);

    fireEvent.change(screen.getByLabelText("Email"), { target: { value: "ada@example.com" } });
    fireEvent.change(screen.getByLabelText("Password"), { target: { value: "Secret123" } });
    fireEvent.click(screen.getByRole("button", { name: "Sign in" }));

    await waitFor(() => expect(screen.getByRole("button", { name: "Loading..." })).toBeDisabled());

    act(() => resolveLogin(ok(entity)));
    await waitFor(() => expect(screen.getByRole("button", { name: "Verify" })).toBeEnabled());
  });
});
