"use client";

import { type FormEvent, useEffect, useState } from "react";
import { useTranslation } from "react-i18next";
import { useStore } from "zustand";
import { Button } from "@/components/ui/button";
import { Card } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { useService } from "@/core/di/locator-context";
import { Validators } from "@/core/utils/validators";

export function TasksView() {
  const { t } = useTranslation();
  const viewModel = useService("taskViewModel");
  const tasks = useStore(viewModel, (s) => s.tasks);
  const isLoading = useStore(viewModel, (s) => s.isLoading);
  const errorMessage = useStore(viewModel, (s) => s.errorMessage);
  const [title, setTitle] = useState("");
  const [description, setDescription] = useState("");
  const [titleError, setTitleError] = useState<string | null>(null);

  useEffect(() => {
    void viewModel.getState().loadTasks();
  }, [viewModel]);

  async function submit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    const error = Validators.text(title, { fieldName: "Title", maxLength: 120 });
    setTitleError(error);
    if (error) {
      return;
    }
    if (await viewModel.getState().createTask({ title: title.trim(), description: description.trim() })) {
      setTitle("");
      setDescription("");
    }
  }

  return (
    <div className="mx-auto max-w-3xl space-y-4 px-4 py-6">
      <h1 className="text-2xl font-bold">{t("tasks.title")}</h1>
      <Card>
        <form className="space-y-3" noValidate onSubmit={submit}>
          <Input label={t("tasks.newTitle")} name="title" value={title} onChange={(e) => setTitle(e.target.value)} error={titleError} />
          <Textarea
            label={t("tasks.newDescription")}
            name="description"
            rows={3}
            value={description}
            onChange={(e) => setDescription(e.target.value)}
          />
          <Button type="submit" loading={isLoading}>
            {t("tasks.add")}
          </Button>
        </form>
      </Card>
      {errorMessage ? (
        <p role="alert" className="rounded-xl2 bg-coral/20 px-3 py-2 text-sm">
          {errorMessage}
        </p>
      ) : null}
      {!isLoading && tasks.length === 0 ? <p className="text-sm">{t("tasks.empty")}</p> : null}
      <ul className="space-y-2">
        {tasks.map((task) => (
          <li key={task.id}>
            <Card>
              <div className="flex items-center justify-between">
                <h3 className={task.isCompleted ? "font-semibold line-through" : "font-semibold"}>{task.title}</h3>
                <time className="text-xs text-ink/60 dark:text-cream/60" dateTime={task.createdAt}>
                  {new Date(task.createdAt).toLocaleDateString()}
                </time>
              </div>
              {task.description ? <p className="mt-1 text-sm">{task.description}</p> : null}
            </Card>
          </li>
        ))}
      </ul>
    </div>
  );
}
