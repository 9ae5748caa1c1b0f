/**
 * Preview Data Schema
 *
 * The JSON document consumed by the MCP Apps test-harness in place of a live
 * `platform_info` tool call. Every key is always present; key order here is
 * the order written to disk.
 */

import { z } from "zod";

// ============================================================================
// tool_result
// ============================================================================

/**
 * Enabled platform features derived from the injection, audit and knowledge
 * sections.
 */
export const Features = z.object({
  semantic_enrichment: z.boolean(),
  query_enrichment: z.boolean(),
  storage_enrichment: z.boolean(),
  audit_logging: z.boolean(),
  knowledge_capture: z.boolean(),
});
export type FeaturesT = z.infer<typeof Features>;

export const ConfigVersionInfo = z.object({
  api_version: z.string(),
  latest_version: z.string(),
  supported_versions: z.array(z.string()),
});
export type ConfigVersionInfoT = z.infer<typeof ConfigVersionInfo>;

/**
 * Mirrors the `platform_info` tool result.
 */
export const ToolResult = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  agent_instructions: z.string(),
  /** Toolkit names in source order */
  toolkits: z.array(z.string()),
  /** null when no toolkit carries a non-blank description */
  toolkit_descriptions: z.record(z.string(), z.string()).nullable(),
  features: Features,
  config_version: ConfigVersionInfo,
});
export type ToolResultT = z.infer<typeof ToolResult>;

// ============================================================================
// branding
// ============================================================================

export const Branding = z.object({
  brand_name: z.string(),
  brand_url: z.string(),
  logo_svg: z.string(),
});
export type BrandingT = z.infer<typeof Branding>;

// ============================================================================
// Document
// ============================================================================

export const PreviewData = z
  .object({
    tool_result: ToolResult,
    branding: Branding,
  })
  .strict();
export type PreviewDataT = z.infer<typeof PreviewData>;
