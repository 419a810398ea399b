import { z } from "zod";
import type { Note } from "@/features/notes/domain/note";

export const noteModelSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string().default(""),
  isCompleted: z.boolean().default(false),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const noteListSchema = z.array(noteModelSchema);

export type NoteModel = z.infer<typeof noteModelSchema>;

export function toNote(model: NoteModel): Note {
  const note: Note = {
    id: model.id,
    title: model.title,
    content: model.content,
    isCompleted: model.isCompleted,
    createdAt: new Date(model.createdAt),
  };
  if (model.updatedAt) {
    note.updatedAt = new Date(model.updatedAt);
  }
  return note;
}
