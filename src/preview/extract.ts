/**
 * Preview extraction
 *
 * Maps a decoded platform config onto the `platform_info` preview document.
 * Pure and total: any decoded value is accepted, and every section that is
 * missing or of the wrong shape reads as empty.
 */

import {
  DEFAULT_API_VERSION,
  LATEST_API_VERSION,
  listSupportedVersions,
} from "./config-version.js";
import {
  getIn,
  getMapping,
  getString,
  getStringList,
  isMapping,
  isTruthy,
  type KeyPath,
  type YamlMapping,
} from "./lookup.js";
import type { BrandingT, ConfigVersionInfoT, FeaturesT, PreviewDataT } from "./types.js";

/** Config of the bundled platform-info MCP App, source of the branding fields */
export const PLATFORM_INFO_CONFIG_PATH: KeyPath = ["mcpapps", "apps", "platform-info", "config"];

export interface ToolkitSummary {
  names: string[];
  descriptions: Record<string, string> | null;
}

/**
 * Toolkit names in source order, plus the descriptions of those toolkits that
 * carry a non-blank one.
 */
export function collectToolkits(doc: unknown): ToolkitSummary {
  const toolkits = getMapping(doc, ["toolkits"]);
  const names: string[] = [];
  const described: Array<[string, string]> = [];

  for (const [key, cfg] of toolkits) {
    const name = String(key);
    names.push(name);

    const description = isMapping(cfg) ? cfg.get("description") : undefined;
    if (typeof description === "string" && description.trim() !== "") {
      described.push([name, description]);
    }
  }

  return {
    names,
    descriptions: described.length > 0 ? Object.fromEntries(described) : null,
  };
}

export function buildFeatures(
  injection: YamlMapping,
  audit: YamlMapping,
  knowledge: YamlMapping
): FeaturesT {
  return {
    semantic_enrichment:
      isTruthy(injection.get("trino_semantic_enrichment")) ||
      isTruthy(injection.get("s3_semantic_enrichment")),
    query_enrichment: isTruthy(injection.get("datahub_query_enrichment")),
    storage_enrichment: isTruthy(injection.get("datahub_storage_enrichment")),
    audit_logging: isTruthy(audit.get("enabled")),
    knowledge_capture: isTruthy(knowledge.get("enabled")),
  };
}

export function buildConfigVersion(doc: unknown): ConfigVersionInfoT {
  return {
    api_version: getString(doc, ["api_version"], DEFAULT_API_VERSION),
    latest_version: LATEST_API_VERSION,
    supported_versions: listSupportedVersions(),
  };
}

export function buildBranding(platformInfo: YamlMapping): BrandingT {
  return {
    brand_name: getString(platformInfo, ["brand_name"]),
    brand_url: getString(platformInfo, ["brand_url"]),
    logo_svg: getString(platformInfo, ["logo_svg"]),
  };
}

export function buildPreview(doc: unknown): PreviewDataT {
  const root: YamlMapping = isMapping(doc) ? doc : new Map();

  const server = getMapping(root, ["server"]);
  const injection = getMapping(root, ["injection"]);
  const audit = getMapping(root, ["audit"]);
  const knowledge = getMapping(root, ["knowledge"]);
  const platformInfo = getMapping(root, PLATFORM_INFO_CONFIG_PATH);
  const toolkits = collectToolkits(root);

  return {
    tool_result: {
      name: getString(server, ["name"]),
      version: getString(server, ["version"]),
      description: getString(server, ["description"]),
      tags: getStringList(server, ["tags"]),
      agent_instructions: getString(server, ["agent_instructions"]),
      toolkits: toolkits.names,
      toolkit_descriptions: toolkits.descriptions,
      features: buildFeatures(injection, audit, knowledge),
      config_version: buildConfigVersion(root),
    },
    branding: buildBranding(platformInfo),
  };
}

/** True when the working document carries the platform-info app config at all. */
export function hasPlatformInfoConfig(doc: unknown): boolean {
  return isMapping(getIn(doc, PLATFORM_INFO_CONFIG_PATH));
}
