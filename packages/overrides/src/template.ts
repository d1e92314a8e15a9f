/**
 * Pull suggested overrides out of an exported customization template.
 * - Parsing starts after the first `## ... ----` header line, if any.
 * - `##` lines are section markers and skipped.
 * - Single-`#` lines are treated as commented-out entries and un-commented.
 * - Anything without `=` is ignored; keys and values are trimmed.
 */
export function extractTemplateOverrides(text: string): Record<string, string> {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);

  let start = 0;
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim().startsWith("##") && lines[i].includes("----")) {
      start = i + 1;
      break;
    }
  }

  const out = new Map<string, string>();
  for (const raw of lines.slice(start)) {
    let s = raw.trim();
    if (!s || s.startsWith("##")) continue;
    if (s.startsWith("#")) s = s.replace(/^#+/, "").trim();
    if (!s || s.startsWith("#") || !s.includes("=")) continue;

    const eq = s.indexOf("=");
    out.set(s.slice(0, eq).trim(), s.slice(eq + 1).trim());
  }
  return Object.fromEntries(out);
}
