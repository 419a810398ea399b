import { createStore, type StoreApi } from "zustand/vanilla";
import type { StateStatus } from "@/core/functional/state-status";
import type { CreateNoteParams, Note } from "@/features/notes/domain/note";
import type { CreateNoteUseCase, GetNotesUseCase } from "@/features/notes/domain/note-use-cases";

export type NotesState = {
  notes: Note[];
  status: StateStatus;
  createStatus: StateStatus;
  errorMessage: string | null;
  loadNotes: () => Promise<void>;
  createNote: (params: CreateNoteParams) => Promise<boolean>;
};

export type NotesStore = StoreApi<NotesState>;

export function createNotesStore(
  getNotes: Pick<GetNotesUseCase, "execute">,
  createNote: Pick<CreateNoteUseCase, "execute">,
): NotesStore {
  return createStore<NotesState>((set, get) => ({
    notes: [],
    status: "idle",
    createStatus: "idle",
    errorMessage: null,

    loadNotes: async () => {
      set({ status: "loading", errorMessage: null });
      const result = await getNotes.execute();
      if (!result.ok) {
        set({ status: "error", errorMessage: result.error });
        return;
      }
      set({ notes: result.value, status: result.value.length === 0 ? "empty" : "success" });
    },

    createNote: async (params) => {
      set({ createStatus: "submitting", errorMessage: null });
      const result = await createNote.execute(params);
      if (!result.ok) {
        set({ createStatus: "error", errorMessage: result.error });
        return false;
      }
      set({ notes: [result.value, ...get().notes], createStatus: "success", status: "success" });
      return true;
    },
  }));
}
