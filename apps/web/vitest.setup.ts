import "fake-indexeddb/auto";
import "@testing-library/jest-dom/vitest";
import { cleanup } from "@testing-library/react";
import { afterEach } from "vitest";

afterEach(() => {
  cleanup();
  // node-environment suites have no window
  if (typeof window !== "undefined") {
    window.localStorage.clear();
  }
});
