import { afterEach, vi } from "vitest";
import { resetConfig } from "../src/config.js";
import { setLogLevel } from "../src/utils/logger.js";

afterEach(() => {
  resetConfig();
  setLogLevel(undefined);
  vi.restoreAllMocks();
});
