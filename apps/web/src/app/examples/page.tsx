import { ExamplesClient } from "@/features/examples/ExamplesClient";

export default function ExamplesPage() {
  return <ExamplesClient />;
}
