import type { ApiClient } from "@/core/network/api-client";
import { AppUrls } from "@/core/network/app-urls";
import { noteListSchema, noteModelSchema, type NoteModel } from "@/features/notes/data/note-model";
import type { CreateNoteParams } from "@/features/notes/domain/note";

export interface NoteRemoteDataSource {
  getNotes(): Promise<NoteModel[]>;
  createNote(params: CreateNoteParams): Promise<NoteModel>;
}

export class NoteRemoteDataSourceImpl implements NoteRemoteDataSource {
  constructor(private readonly client: ApiClient) {}

  async getNotes(): Promise<NoteModel[]> {
    return noteListSchema.parse(await this.client.get(AppUrls.notes));
  }

  async createNote(params: CreateNoteParams): Promise<NoteModel> {
    return noteModelSchema.parse(await this.client.post(AppUrls.notes, params));
  }
}
