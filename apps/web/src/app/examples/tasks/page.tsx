import { TasksView } from "@/features/tasks/view/TasksView";

export default function TasksPage() {
  return <TasksView />;
}
