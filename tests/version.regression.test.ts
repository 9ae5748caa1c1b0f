import { describe, it, expect } from "vitest";
import { TOOL_VERSION } from "../src/version.js";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

describe("Version SSOT", () => {
  it("exports package.json version from version SSOT", () => {
    const pkgPath = new URL("../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8"));
    const expectedVersion =
      typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;

    expect(TOOL_VERSION).toBe(expectedVersion);
    expect(TOOL_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
