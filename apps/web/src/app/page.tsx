import { SplashClient } from "@/features/splash/SplashClient";

export default function SplashPage() {
  return <SplashClient />;
}
