"use client";

import Link from "next/link";
import { useTranslation } from "react-i18next";
import { Card } from "@/components/ui/card";

export function ExamplesClient() {
  const { t } = useTranslation();
  const examples = [
    { href: "/examples/tasks", title: t("examples.tasks"), hint: t("examples.tasksHint") },
    { href: "/examples/notes", title: t("examples.notes"), hint: t("examples.notesHint") },
  ];

  return (
    <div className="mx-auto max-w-3xl space-y-4 px-4 py-6">
      <h1 className="text-2xl font-bold">{t("examples.title")}</h1>
      {examples.map((example) => (
        <Link key={example.href} href={example.href} className="block">
          <Card className="transition hover:-translate-y-0.5">
            <h2 className="font-semibold">{example.title}</h2>
            <p className="mt-1 text-sm text-ink/70 dark:text-cream/70">{example.hint}</p>
          </Card>
        </Link>
      ))}
    </div>
  );
}
