import type { ButtonHTMLAttributes, PropsWithChildren } from "react";
import clsx from "clsx";

type Props = PropsWithChildren<ButtonHTMLAttributes<HTMLButtonElement>> & {
  variant?: "primary" | "secondary" | "ghost" | "danger";
  loading?: boolean;
};

const styles: Record<NonNullable<Props["variant"]>, string> = {
  primary: "bg-ink text-cream hover:bg-[#1b232b] border border-ink dark:bg-cream dark:text-ink dark:border-cream",
  secondary: "bg-mint text-ink hover:bg-[#b7ebbc] border border-[#95d89a]",
  ghost: "bg-transparent text-ink hover:bg-white/60 border border-white/30 dark:text-cream dark:hover:bg-white/10",
  danger: "bg-coral text-white hover:bg-[#e76d47] border border-[#d55f3a]",
};

export function Button({ children, className, variant = "primary", loading = false, disabled, ...props }: Props) {
  return (
    <button
      className={clsx(
        "rounded-xl2 px-4 py-2 text-sm font-semibold transition disabled:cursor-not-allowed disabled:opacity-50",
        styles[variant],
        className,
      )}
      disabled={disabled || loading}
      aria-busy={loading || undefined}
      {...props}
    >
      {children}
    </button>
  );
}
