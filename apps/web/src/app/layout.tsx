import type { Metadata } from "next";
import { IBM_Plex_Mono, Manrope } from "next/font/google";
import { AppHeader } from "@/app/app-header";
import { Providers } from "@/app/providers";
import "@/app/globals.css";

const sans = Manrope({ subsets: ["latin"], variable: "--font-sans" });
const mono = IBM_Plex_Mono({ subsets: ["latin"], variable: "--font-mono", weight: ["400", "500", "700"] });

export const metadata: Metadata = {
  title: "Sample Architecture",
  description: "Layered sample app: offline-first products, login, theming and localization",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark" suppressHydrationWarning>
      <body className={`${sans.variable} ${mono.variable} font-sans text-ink dark:text-cream`}>
        <Providers>
          <main>
            <AppHeader />
            {children}
          </main>
        </Providers>
      </body>
    </html>
  );
}
