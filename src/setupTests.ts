/**
 * Global test setup for Vitest
 */

vi.mock("./util/logger.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./util/logger.js")>();
  return {
    ...actual,
    logger: {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    }
  };
});

afterEach(() => {
  vi.clearAllMocks();
});
