/**
 * Vitest Global Setup
 *
 * Runs before each test file. Keeps pino quiet unless a test asks otherwise
 * and resets the config cache so vi.stubEnv() calls are picked up.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
