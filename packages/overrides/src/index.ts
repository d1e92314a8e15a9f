export type { OverrideEntry, OverrideSet, ParseOverridesOptions } from "./types.js";
export { OverrideFormatError, isCommentLine, parseOverrides, renderOverrides, overridesToRecord } from "./parse.js";
export { extractTemplateOverrides } from "./template.js";
