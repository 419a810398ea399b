import { AppPrefKeys, type AppPref } from "@/core/storage/app-pref";
import { noteListSchema, type NoteModel } from "@/features/notes/data/note-model";

export interface NoteLocalDataSource {
  getNotes(): Promise<NoteModel[]>;
  saveNotes(notes: NoteModel[]): Promise<void>;
  saveNote(note: NoteModel): Promise<void>;
}

export class NoteLocalDataSourceImpl implements NoteLocalDataSource {
  constructor(private readonly pref: AppPref) {}

  async getNotes(): Promise<NoteModel[]> {
    const raw = await this.pref.getString(AppPrefKeys.notes);
    return raw ? noteListSchema.parse(JSON.parse(raw)) : [];
  }

  async saveNotes(notes: NoteModel[]): Promise<void> {
    await this.pref.setString(AppPrefKeys.notes, JSON.stringify(notes));
  }

  async saveNote(note: NoteModel): Promise<void> {
    const notes = await this.getNotes();
    await this.saveNotes([...notes.filter((n) => n.id !== note.id), note]);
  }
}
