/**
 * Config API version registry.
 *
 * The platform only ships the v1 config API. The document's own
 * `api_version` is reported back as-is and never alters these values.
 */

export const DEFAULT_API_VERSION = "v1";

export const LATEST_API_VERSION = "v1";

export const SUPPORTED_API_VERSIONS: readonly string[] = Object.freeze(["v1"]);

/** Fresh copy, so callers can hand it to a serializer without sharing state. */
export function listSupportedVersions(): string[] {
  return [...SUPPORTED_API_VERSIONS];
}
