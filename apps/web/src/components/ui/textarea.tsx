import clsx from "clsx";
import type { TextareaHTMLAttributes } from "react";

type Props = TextareaHTMLAttributes<HTMLTextAreaElement> & {
  label: string;
};

export function Textarea({ label, className, id, ...props }: Props) {
  const textareaId = id ?? props.name;
  return (
    <div className="block">
      <label className="mb-1 block text-xs font-semibold text-ink/70 dark:text-cream/70" htmlFor={textareaId}>
        {label}
      </label>
      <textarea
        {...props}
        id={textareaId}
        className={clsx(
          "w-full rounded-xl2 border border-[#d8d2c7] bg-white/80 px-3 py-2 text-sm text-ink outline-none transition focus:border-ink focus:ring-2 focus:ring-ink/20 dark:border-white/20 dark:bg-white/10 dark:text-cream",
          className,
        )}
      />
    </div>
  );
}
