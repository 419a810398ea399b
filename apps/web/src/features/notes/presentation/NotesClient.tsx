"use client";

import { type FormEvent, useEffect, useState } from "react";
import { useTranslation } from "react-i18next";
import { useStore } from "zustand";
import { Button } from "@/components/ui/button";
import { Card } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { useService } from "@/core/di/locator-context";

export function NotesClient() {
  const { t } = useTranslation();
  const store = useService("notesStore");
  const notes = useStore(store, (s) => s.notes);
  const status = useStore(store, (s) => s.status);
  const createStatus = useStore(store, (s) => s.createStatus);
  const errorMessage = useStore(store, (s) => s.errorMessage);
  const [title, setTitle] = useState("");
  const [content, setContent] = useState("");

  useEffect(() => {
    void store.getState().loadNotes();
  }, [store]);

  async function submit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    if (await store.getState().createNote({ title, content })) {
      setTitle("");
      setContent("");
    }
  }

  return (
    <div className="mx-auto max-w-3xl space-y-4 px-4 py-6">
      <h1 className="text-2xl font-bold">{t("notes.title")}</h1>
      <Card>
        <form className="space-y-3" noValidate onSubmit={submit}>
          <Input label={t("notes.newTitle")} name="title" value={title} onChange={(e) => setTitle(e.target.value)} />
          <Textarea label={t("notes.newContent")} name="content" rows={4} value={content} onChange={(e) => setContent(e.target.value)} />
          <Button type="submit" loading={createStatus === "submitting"}>
            {t("notes.add")}
          </Button>
        </form>
      </Card>
      {errorMessage ? (
        <p role="alert" className="rounded-xl2 bg-coral/20 px-3 py-2 text-sm">
          {errorMessage}
        </p>
      ) : null}
      {status === "loading" ? <p className="text-sm">{t("loading")}</p> : null}
      {status === "empty" ? <p className="text-sm">{t("notes.empty")}</p> : null}
      <ul className="space-y-2">
        {notes.map((note) => (
          <li key={note.id}>
            <Card>
              <h3 className="font-semibold">{note.title}</h3>
              {note.content ? <p className="mt-1 whitespace-pre-wrap text-sm">{note.content}</p> : null}
              <time className="mt-2 block text-xs text-ink/60 dark:text-cream/60" dateTime={note.createdAt.toISOString()}>
                {note.createdAt.toLocaleString()}
              </time>
            </Card>
          </li>
        ))}
      </ul>
    </div>
  );
}
