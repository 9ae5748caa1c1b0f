import { describe, it, expect } from "vitest";
import {
  isConfigMap,
  parseYamlDocument,
  unwrapConfigMap,
} from "../../src/preview/envelope.js";
import { getIn, isMapping } from "../../src/preview/lookup.js";
import { LoadError } from "../../src/utils/errors.js";

function load(source: string): unknown {
  return parseYamlDocument(source, "config.yaml");
}

describe("parseYamlDocument", () => {
  it("decodes mappings as ordered Maps", () => {
    const doc = load("toolkits:\n  zeta: {}\n  10: {}\n  alpha: {}\n");
    const toolkits = getIn(doc, ["toolkits"]);

    expect(isMapping(toolkits)).toBe(true);
    expect(isMapping(toolkits) ? [...toolkits.keys()] : []).toEqual(["zeta", 10, "alpha"]);
  });

  it("returns null for an empty document", () => {
    expect(load("")).toBeNull();
    expect(load("# only a comment\n")).toBeNull();
  });

  it("lets later duplicate keys win", () => {
    expect(getIn(load("server:\n  name: first\n  name: second\n"), ["server", "name"])).toBe("second");
  });

  it("throws LoadError for malformed YAML", () => {
    expect(() => load("server: [unclosed\n")).toThrow(LoadError);
    expect(() => load("server: [unclosed\n")).toThrow(/^Invalid YAML in config\.yaml: /);
  });

  it("rejects multi-document streams", () => {
    expect(() => load("a: 1\n---\nb: 2\n")).toThrow(LoadError);
  });

  it("records the file path on the error", () => {
    try {
      parseYamlDocument("key: [", "deploy/platform.yaml", "(embedded)");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LoadError);
      if (err instanceof LoadError) {
        expect(err.path).toBe("deploy/platform.yaml");
        expect(err.message).toMatch(/^Invalid YAML in deploy\/platform\.yaml \(embedded\): /);
        expect(err.cause).toBeDefined();
      }
    }
  });
});

describe("isConfigMap", () => {
  it("matches only kind ConfigMap on a mapping", () => {
    expect(isConfigMap(load("kind: ConfigMap\n"))).toBe(true);
    expect(isConfigMap(load("kind: configmap\n"))).toBe(false);
    expect(isConfigMap(load("kind: Secret\n"))).toBe(false);
    expect(isConfigMap(load("server:\n  name: demo\n"))).toBe(false);
    expect(isConfigMap(load("- kind: ConfigMap\n"))).toBe(false);
    expect(isConfigMap(null)).toBe(false);
  });
});

describe("unwrapConfigMap", () => {
  it("returns non-ConfigMap documents unchanged", () => {
    const doc = load("kind: Secret\ndata:\n  platform.yaml: \"server:\\n  name: x\\n\"\n");
    expect(unwrapConfigMap(doc, "config.yaml")).toBe(doc);
  });

  it("decodes the embedded platform.yaml", () => {
    const doc = load("kind: ConfigMap\ndata:\n  platform.yaml: \"server:\\n  name: x\\n\"\n");
    expect(getIn(unwrapConfigMap(doc, "config.yaml"), ["server", "name"])).toBe("x");
  });

  it("decodes a block-literal platform.yaml", () => {
    const doc = load(
      [
        "apiVersion: v1",
        "kind: ConfigMap",
        "metadata:",
        "  name: platform-config",
        "data:",
        "  platform.yaml: |",
        "    api_version: v1",
        "    server:",
        "      name: acme-data",
        "",
      ].join("\n")
    );
    const inner = unwrapConfigMap(doc, "config.yaml");

    expect(getIn(inner, ["server", "name"])).toBe("acme-data");
    expect(getIn(inner, ["api_version"])).toBe("v1");
  });

  it.each([
    ["no data section", "kind: ConfigMap\n"],
    ["null data section", "kind: ConfigMap\ndata:\n"],
    ["no platform.yaml key", "kind: ConfigMap\ndata:\n  other.yaml: \"a: 1\"\n"],
    ["empty platform.yaml", "kind: ConfigMap\ndata:\n  platform.yaml: \"\"\n"],
    ["whitespace platform.yaml", "kind: ConfigMap\ndata:\n  platform.yaml: \"  \\n\"\n"],
  ])("yields an empty mapping for %s", (_label, source) => {
    const inner = unwrapConfigMap(load(source), "config.yaml");

    expect(isMapping(inner)).toBe(true);
    expect(isMapping(inner) ? inner.size : -1).toBe(0);
  });

  it("throws LoadError when platform.yaml is not a string", () => {
    const doc = load("kind: ConfigMap\ndata:\n  platform.yaml:\n    server:\n      name: x\n");
    expect(() => unwrapConfigMap(doc, "config.yaml")).toThrow(
      'ConfigMap data["platform.yaml"] in config.yaml must be a string'
    );
  });

  it("throws LoadError when the embedded document is malformed", () => {
    const doc = load("kind: ConfigMap\ndata:\n  platform.yaml: \"server: [\"\n");
    expect(() => unwrapConfigMap(doc, "config.yaml")).toThrow(
      /^Invalid YAML in config\.yaml \(data\["platform\.yaml"\]\): /
    );
  });

  it("unwraps one level only", () => {
    const nested = "kind: ConfigMap\ndata:\n  platform.yaml: \"server: {name: deep}\"\n";
    const outer = load(
      `kind: ConfigMap\ndata:\n  platform.yaml: ${JSON.stringify(nested)}\n`
    );
    const inner = unwrapConfigMap(outer, "config.yaml");

    expect(isConfigMap(inner)).toBe(true);
    expect(getIn(inner, ["server", "name"])).toBeUndefined();
  });
});
