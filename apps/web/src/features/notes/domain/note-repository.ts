import type { Result } from "@/core/functional/result";
import type { CreateNoteParams, Note } from "@/features/notes/domain/note";

export interface NoteRepository {
  getNotes(): Promise<Result<Note[]>>;
  createNote(params: CreateNoteParams): Promise<Result<Note>>;
}
