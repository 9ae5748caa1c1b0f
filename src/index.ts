export { buildPreview, collectToolkits, buildFeatures, buildBranding, buildConfigVersion } from "./preview/extract.js";
export { isConfigMap, unwrapConfigMap, parseYamlDocument, PLATFORM_YAML_KEY } from "./preview/envelope.js";
export { extractPreview, loadDocument, serializePreview, writePreview } from "./preview/io.js";
export { getIn, getMapping, getString, getStringList, isTruthy, type YamlMapping, type KeyPath } from "./preview/lookup.js";
export { PreviewData, type PreviewDataT, type ToolResultT, type FeaturesT, type BrandingT } from "./preview/types.js";
export { UsageError, LoadError, WriteError, toErrorV1, type ErrorV1 } from "./utils/errors.js";
export { runCli } from "./cli.js";
