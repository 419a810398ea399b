import { LoginClient } from "@/features/auth/presentation/LoginClient";

type LoginPageProps = {
  searchParams?: Promise<Record<string, string | string[] | undefined>>;
};

export default async function LoginPage({ searchParams }: LoginPageProps) {
  const resolved = searchParams ? await searchParams : undefined;
  const callbackRaw = resolved?.callbackUrl;
  const callbackUrl = Array.isArray(callbackRaw) ? callbackRaw[0] : callbackRaw;
  const normalizedCallbackUrl = callbackUrl && callbackUrl.startsWith("/") ? callbackUrl : "/dashboard";

  return <LoginClient callbackUrl={normalizedCallbackUrl} />;
}
