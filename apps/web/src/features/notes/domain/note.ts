export type Note = {
  id: string;
  title: string;
  content: string;
  createdAt: Date;
  updatedAt?: Date;
  isCompleted: boolean;
};

export type CreateNoteParams = {
  title: string;
  content: string;
};
