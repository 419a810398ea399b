import { err, ok, type Result } from "@/core/functional/result";
import type { Logger } from "@/core/logging/logger";
import { getErrorMessage } from "@/core/utils/error-handler";
import { toNote } from "@/features/notes/data/note-model";
import type { NoteLocalDataSource } from "@/features/notes/data/note-local-data-source";
import type { NoteRemoteDataSource } from "@/features/notes/data/note-remote-data-source";
import type { CreateNoteParams, Note } from "@/features/notes/domain/note";
import type { NoteRepository } from "@/features/notes/domain/note-repository";

export class NoteRepositoryImpl implements NoteRepository {
  constructor(
    private readonly remote: NoteRemoteDataSource,
    private readonly local: NoteLocalDataSource,
    private readonly logger: Logger,
  ) {}

  async getNotes(): Promise<Result<Note[]>> {
    try {
      const models = await this.remote.getNotes();
      await this.local.saveNotes(models);
      return ok(models.map(toNote));
    } catch (error) {
      this.logger.warn({ err: error }, "remote notes failed, reading local copy");
    }
    try {
      const models = await this.local.getNotes();
      return ok(models.map(toNote));
    } catch (error) {
      return err(`Failed to load notes: ${getErrorMessage(error)}`);
    }
  }

  async createNote(params: CreateNoteParams): Promise<Result<Note>> {
    try {
      const model = await this.remote.createNote(params);
      await this.local.saveNote(model);
      return ok(toNote(model));
    } catch (error) {
      return err(`Failed to create note: ${getErrorMessage(error)}`);
    }
  }
}
