import type { Locator } from "@/core/di/registry";
import { createLogger } from "@/core/logging/logger";
import { NoteLocalDataSourceImpl } from "@/features/notes/data/note-local-data-source";
import { NoteRemoteDataSourceImpl } from "@/features/notes/data/note-remote-data-source";
import { NoteRepositoryImpl } from "@/features/notes/data/note-repository-impl";
import { CreateNoteUseCase, GetNotesUseCase } from "@/features/notes/domain/note-use-cases";
import { createNotesStore } from "@/features/notes/presentation/notes-store";

export function initNotesInjector(sl: Locator): void {
  sl.registerLazySingleton("noteRemoteDataSource", () => new NoteRemoteDataSourceImpl(sl.get("apiClient")));
  sl.registerLazySingleton("noteLocalDataSource", () => new NoteLocalDataSourceImpl(sl.get("appPref")));
  sl.registerLazySingleton(
    "noteRepository",
    () =>
      new NoteRepositoryImpl(sl.get("noteRemoteDataSource"), sl.get("noteLocalDataSource"), createLogger(sl.get("logger"), "notes")),
  );
  sl.registerLazySingleton("getNotesUseCase", () => new GetNotesUseCase(sl.get("noteRepository")));
  sl.registerLazySingleton("createNoteUseCase", () => new CreateNoteUseCase(sl.get("noteRepository")));
  sl.registerFactory("notesStore", () => createNotesStore(sl.get("getNotesUseCase"), sl.get("createNoteUseCase")));
}
