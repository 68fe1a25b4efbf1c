/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test so vi.stubEnv() values set in a
 * test (or at file level) are picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LLM_PROVIDER = process.env.LLM_PROVIDER ?? "fixtures";
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
