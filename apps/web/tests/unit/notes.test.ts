import { vi } from "vitest";
import { err, ok } from "@/core/functional/result";
import { NoteLocalDataSourceImpl } from "@/features/notes/data/note-local-data-source";
import type { NoteModel } from "@/features/notes/data/note-model";
import type { NoteRemoteDataSource } from "@/features/notes/data/note-remote-data-source";
import { NoteRepositoryImpl } from "@/features/notes/data/note-repository-impl";
import type { Note } from "@/features/notes/domain/note";
import type { NoteRepository } from "@/features/notes/domain/note-repository";
import { CreateNoteUseCase, GetNotesUseCase } from "@/features/notes/domain/note-use-cases";
import { createNotesStore } from "@/features/notes/presentation/notes-store";
import { createPlainPref, silentLogger } from "../helpers/fakes";

function model(id: string, title = `Note ${id}`): NoteModel {
  return { id, title, content: "", isCompleted: false, createdAt: "2026-02-01T08:30:00.000Z" };
}

function note(id: string, title = `Note ${id}`): Note {
  return { id, title, content: "", isCompleted: false, createdAt: new Date("2026-02-01T08:30:00.000Z") };
}

describe("note repository", () => {
  function setup(remote: Partial<NoteRemoteDataSource> = {}) {
    const local = new NoteLocalDataSourceImpl(createPlainPref());
    const remoteSource: NoteRemoteDataSource = {
      getNotes: vi.fn().mockResolvedValue([model("1")]),
      createNote: vi.fn().mockResolvedValue(model("2", "Groceries")),
      ...remote,
    };
    return { local, repository: new NoteRepositoryImpl(remoteSource, local, silentLogger) };
  }

  it("maps remote notes to entities and caches them", async () => {
    const { repository, local } = setup();

    await expect(repository.getNotes()).resolves.toEqual({ ok: true, value: [note("1")] });
    await expect(local.getNotes()).resolves.toEqual([model("1")]);
  });

  it("reads the cache when the remote call fails", async () => {
    const { repository, local } = setup({ getNotes: vi.fn().mockRejectedValue(new Error("offline")) });
    await local.saveNotes([model("5")]);

    await expect(repository.getNotes()).resolves.toEqual({ ok: true, value: [note("5")] });
  });

  it("replaces a cached note with the same id", async () => {
    const { repository, local } = setup({ createNote: vi.fn().mockResolvedValue(model("1", "Updated")) });
    await local.saveNotes([model("1"), model("4")]);

    await repository.createNote({ title: "Updated", content: "" });

    expect((await local.getNotes()).map((n) => n.title)).toEqual(["Note 4", "Updated"]);
  });

  it("prefixes create failures", async () => {
    const { repository } = setup({ createNote: vi.fn().mockRejectedValue(new Error("Note title is required")) });
    await expect(repository.createNote({ title: "x", content: "" })).resolves.toEqual({
      ok: false,
      error: "Failed to create note: Note title is required",
    });
  });
});

describe("note use cases", () => {
  it("rejects blank titles and trims input", async () => {
    const repository: NoteRepository = {
      getNotes: vi.fn(),
      createNote: vi.fn().mockResolvedValue(ok(note("1"))),
    };
    const createNote = new CreateNoteUseCase(repository);

    await expect(createNote.execute({ title: "   ", content: "body" })).resolves.toEqual({ ok: false, error: "Title is required" });
    expect(repository.createNote).not.toHaveBeenCalled();

    await createNote.execute({ title: " Groceries ", content: " milk " });
    expect(repository.createNote).toHaveBeenCalledWith({ title: "Groceries", content: "milk" });
  });
});

describe("notes store", () => {
  it("reports empty and loaded states", async () => {
    const getNotes = { execute: vi.fn().mockResolvedValueOnce(ok([])).mockResolvedValueOnce(ok([note("1")])) };
    const store = createNotesStore(getNotes, { execute: vi.fn() });

    await store.getState().loadNotes();
    expect(store.getState().status).toBe("empty");

    await store.getState().loadNotes();
    expect(store.getState()).toMatchObject({ status: "success", notes: [note("1")] });
  });

  it("prepends created notes and keeps errors", async () => {
    const repository: NoteRepository = {
      getNotes: vi.fn().mockResolvedValue(ok([note("1")])),
      createNote: vi.fn().mockResolvedValueOnce(ok(note("2"))).mockResolvedValueOnce(err("Failed to create note: offline")),
    };
    const store = createNotesStore(new GetNotesUseCase(repository), new CreateNoteUseCase(repository));
    await store.getState().loadNotes();

    await expect(store.getState().createNote({ title: "Second", content: "" })).resolves.toBe(true);
    expect(store.getState().notes.map((n) => n.id)).toEqual(["2", "1"]);
    expect(store.getState().createStatus).toBe("success");

    await expect(store.getState().createNote({ title: "Third", content: "" })).resolves.toBe(false);
    expect(store.getState()).toMatchObject({ createStatus: "error", errorMessage: "Failed to create note: offline" });
  });
});
