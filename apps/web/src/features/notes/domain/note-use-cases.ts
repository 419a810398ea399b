import { err, type Result } from "@/core/functional/result";
import type { UseCase, UseCaseNoParams } from "@/core/functional/use-case";
import type { CreateNoteParams, Note } from "@/features/notes/domain/note";
import type { NoteRepository } from "@/features/notes/domain/note-repository";

export class GetNotesUseCase implements UseCaseNoParams<Note[]> {
  constructor(private readonly repository: NoteRepository) {}

  execute(): Promise<Result<Note[]>> {
    return this.repository.getNotes();
  }
}

export class CreateNoteUseCase implements UseCase<Note, CreateNoteParams> {
  constructor(private readonly repository: NoteRepository) {}

  async execute(params: CreateNoteParams): Promise<Result<Note>> {
    const title = params.title.trim();
    if (!title) {
      return err("Title is required");
    }
    return this.repository.createNote({ title, content: params.content.trim() });
  }
}
