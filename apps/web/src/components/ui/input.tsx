import clsx from "clsx";
import type { InputHTMLAttributes } from "react";

type Props = InputHTMLAttributes<HTMLInputElement> & {
  label: string;
  error?: string | null;
};

export function Input({ label, error, className, id, ...props }: Props) {
  const inputId = id ?? props.name;
  const errorId = error && inputId ? `${inputId}-error` : undefined;
  return (
    <div className="block">
      <label className="mb-1 block text-xs font-semibold text-ink/70 dark:text-cream/70" htmlFor={inputId}>
        {label}
      </label>
      <input
        {...props}
        id={inputId}
        aria-invalid={error ? true : undefined}
        aria-describedby={errorId}
        className={clsx(
          "w-full rounded-xl2 border border-[#d8d2c7] bg-white/80 px-3 py-2 text-sm text-ink outline-none transition focus:border-ink focus:ring-2 focus:ring-ink/20 dark:border-white/20 dark:bg-white/10 dark:text-cream",
          error && "border-coral",
          className,
        )}
      />
      {error ? (
        <span id={errorId} className="mt-1 block text-xs text-coral">
          {error}
        </span>
      ) : null}
    </div>
  );
}
