import { DashboardClient } from "@/features/dashboard/DashboardClient";

export default function DashboardPage() {
  return <DashboardClient />;
}
