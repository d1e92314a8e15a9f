export { createOutputSink, formatOutput, type OutputSink } from "./outputs.js";
export { ARTIFACTS_ROOT, slugify, artifactDirFor } from "./layout.js";
export {
  TEMPLATE_SUFFIXES,
  isZipFile,
  isTextFile,
  extractionDir,
  collectCandidates,
  compareTemplates,
  findTemplate,
} from "./discover.js";
export { prepareIcfTemplate, type IcfTemplateStatus, type IcfTemplateResult, type PrepareIcfOptions } from "./icf.js";
export {
  METADATA_FILE,
  buildExportMetadata,
  writeExportMetadata,
  decodeOverridesPresent,
  isPresent,
  parseJsonString,
  resolvedPath,
  type ExportMetadata,
} from "./metadata.js";
