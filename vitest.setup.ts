import { afterEach, vi } from "vitest";

// Console spies and other mocks never leak between tests
afterEach(() => {
  vi.restoreAllMocks();
});
