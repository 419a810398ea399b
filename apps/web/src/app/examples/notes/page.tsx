import { NotesClient } from "@/features/notes/presentation/NotesClient";

export default function NotesPage() {
  return <NotesClient />;
}
