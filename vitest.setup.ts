import { vi } from "vitest";

// Keep stderr quiet; the server logs every diagnostic through console.error
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
