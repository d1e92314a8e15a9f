import { describe, it, expect } from "vitest";
import { extractTemplateOverrides } from "../src/index.js";

describe("extractTemplateOverrides", () => {
  it("uncomments entries after the header line", () => {
    const text = [
      "## Import customization file",
      "ignored.before.header=1",
      "## -------------------------------",
      "## Connected System: Billing",
      "#connectedSystem.abc.baseUrl=",
      "# connectedSystem.abc.apiKeyValue = changeme ",
      "",
      "content.def.VALUE=10",
      "# free text without separator",
    ].join("\n");

    expect(extractTemplateOverrides(text)).toEqual({
      "connectedSystem.abc.baseUrl": "",
      "connectedSystem.abc.apiKeyValue": "changeme",
      "content.def.VALUE": "10",
    });
  });

  it("starts at the top when there is no header", () => {
    expect(extractTemplateOverrides("a = 1\n##section\nb=2")).toEqual({ a: "1", b: "2" });
  });

  it("skips lines that stay commented after stripping", () => {
    expect(extractTemplateOverrides("# # nested=1\n#=\nk=v")).toEqual({ "": "", k: "v" });
  });

  it("last occurrence wins", () => {
    expect(extractTemplateOverrides("#a=1\na=2")).toEqual({ a: "2" });
  });

  it("keeps __proto__ entries and ignores a byte-order mark", () => {
    const rec = extractTemplateOverrides("\uFEFF#__proto__=x\nk=v");
    expect(Object.keys(rec)).toEqual(["__proto__", "k"]);
    expect(JSON.stringify(rec)).toBe('{"__proto__":"x","k":"v"}');
  });

  it("returns an empty object for a template without pairs", () => {
    expect(extractTemplateOverrides("## ----\n# nothing here\n")).toEqual({});
  });
});
