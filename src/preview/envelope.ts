/**
 * YAML decoding and Kubernetes ConfigMap unwrapping.
 *
 * Platform configs are deployed either as a raw platform.yaml or embedded as a
 * string in a ConfigMap's `data["platform.yaml"]`. Unwrapping is one level
 * only: a ConfigMap inside the embedded document is left alone.
 */

import { parseDocument } from "yaml";
import { LoadError, describeCause } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { getIn, isMapping, type YamlMapping } from "./lookup.js";

export const CONFIGMAP_KIND = "ConfigMap";

export const PLATFORM_YAML_KEY = "platform.yaml";

/**
 * Decode a single YAML 1.1 document. Mappings come back as ordered Maps.
 *
 * @param path File the text was read from
 * @param where Location inside that file, when the text was embedded
 */
export function parseYamlDocument(source: string, path: string, where?: string): unknown {
  const origin = where ? `${path} ${where}` : path;
  // YAML 1.1: yes/no/on/off are booleans and `<<` merge keys apply.
  // Later duplicate keys override earlier ones.
  const doc = parseDocument(source, { version: "1.1", uniqueKeys: false });

  for (const warning of doc.warnings) {
    log.warn({ origin, warning: warning.message }, "YAML warning");
  }

  const [firstError] = doc.errors;
  if (firstError) {
    throw new LoadError(`Invalid YAML in ${origin}: ${firstError.message}`, path, {
      cause: firstError,
    });
  }

  try {
    return doc.toJS({ mapAsMap: true });
  } catch (err) {
    // alias expansion limits and unresolvable aliases surface here
    throw new LoadError(
      `Invalid YAML in ${origin}: ${describeCause(err) ?? "could not be decoded"}`,
      path,
      { cause: err }
    );
  }
}

export function isConfigMap(doc: unknown): doc is YamlMapping {
  return isMapping(doc) && doc.get("kind") === CONFIGMAP_KIND;
}

/**
 * Working platform document for `doc`: the embedded platform.yaml of a
 * ConfigMap, or `doc` itself.
 *
 * A ConfigMap without the embedded document (or with an empty one) yields an
 * empty mapping.
 */
export function unwrapConfigMap(doc: unknown, path: string): unknown {
  if (!isConfigMap(doc)) return doc;

  const embedded = getIn(doc, ["data", PLATFORM_YAML_KEY]);
  if (embedded === undefined || embedded === null) {
    return new Map();
  }
  if (typeof embedded !== "string") {
    throw new LoadError(
      `ConfigMap data["${PLATFORM_YAML_KEY}"] in ${path} must be a string`,
      path
    );
  }

  const inner = parseYamlDocument(embedded, path, `(data["${PLATFORM_YAML_KEY}"])`);
  return inner ?? new Map();
}
