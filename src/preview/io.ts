/**
 * File I/O for the preview extractor.
 *
 * All file system access is isolated here so that envelope handling and
 * extraction stay pure.
 */

import { readFile, writeFile } from "node:fs/promises";
import { LoadError, WriteError, describeCause } from "../utils/errors.js";
import { TelemetryEvents, emit } from "../utils/telemetry.js";
import { isConfigMap, parseYamlDocument, unwrapConfigMap } from "./envelope.js";
import { buildPreview, hasPlatformInfoConfig } from "./extract.js";
import type { PreviewDataT } from "./types.js";

// =============================================================================
// Loading
// =============================================================================

/** Read and decode the YAML document at `path`. */
export async function loadDocument(path: string): Promise<unknown> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (err) {
    throw new LoadError(
      `Failed to read config ${path}: ${describeCause(err) ?? "unreadable"}`,
      path,
      { cause: err }
    );
  }
  return parseYamlDocument(source, path);
}

// =============================================================================
// Writing
// =============================================================================

/** Two-space indented JSON, no trailing newline. */
export function serializePreview(data: PreviewDataT): string {
  return JSON.stringify(data, null, 2);
}

/** Overwrite `path` with the serialized preview. The parent directory must exist. */
export async function writePreview(path: string, data: PreviewDataT): Promise<void> {
  try {
    await writeFile(path, serializePreview(data), "utf-8");
  } catch (err) {
    throw new WriteError(
      `Failed to write preview data to ${path}: ${describeCause(err) ?? "unwritable"}`,
      path,
      { cause: err }
    );
  }
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Load `configPath`, unwrap a ConfigMap envelope if present, extract the
 * preview fields and write them to `outputPath`.
 */
export async function extractPreview(
  configPath: string,
  outputPath: string
): Promise<PreviewDataT> {
  emit(TelemetryEvents.ExtractStarted, { config_path: configPath });

  const loaded = await loadDocument(configPath);
  if (isConfigMap(loaded)) {
    emit(TelemetryEvents.ConfigMapUnwrapped, { config_path: configPath });
  }

  const doc = unwrapConfigMap(loaded, configPath);
  const preview = buildPreview(doc);

  await writePreview(outputPath, preview);

  emit(TelemetryEvents.ExtractCompleted, {
    output_path: outputPath,
    toolkit_count: preview.tool_result.toolkits.length,
    has_branding: hasPlatformInfoConfig(doc),
  }, `Preview data written to ${outputPath}`);

  return preview;
}
