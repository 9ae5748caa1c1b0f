import { describe, it, expect } from "vitest";
import * as api from "../../src/index.js";

describe("package entry point", () => {
  it("exposes the extractor pipeline", () => {
    expect(typeof api.extractPreview).toBe("function");
    expect(typeof api.runCli).toBe("function");
    expect(api.PLATFORM_YAML_KEY).toBe("platform.yaml");
  });

  it("builds a preview from a decoded document", () => {
    const doc = api.parseYamlDocument("server: {name: demo}\ntoolkits: {trino: {}}\n", "inline.yaml");
    const preview = api.buildPreview(api.unwrapConfigMap(doc, "inline.yaml"));

    expect(api.PreviewData.parse(preview).tool_result).toMatchObject({
      name: "demo",
      toolkits: ["trino"],
      toolkit_descriptions: null,
    });
  });
});
