import fs from "node:fs/promises";
import path from "node:path";
import { extractTemplateOverrides } from "@deploy-wrapper/overrides";
import { findTemplate } from "./discover.js";
import type { OutputSink } from "./outputs.js";

export type IcfTemplateStatus = "ready" | "fallback" | "missing" | "empty";

export type PrepareIcfOptions = {
  artifactDir?: string;
  fallbackTemplatePath?: string;
  outputs: OutputSink;
  logger?: (line: string) => void;
};

export type IcfTemplateResult = {
  status: IcfTemplateStatus;
  sourcePath?: string;
  overrides: Record<string, string>;
};

const b64 = (s: string) => Buffer.from(s, "utf8").toString("base64");

async function isFile(p: string): Promise<boolean> {
  const st = await fs.stat(p).catch(() => null);
  return !!st?.isFile();
}

/**
 * Locate the customization template in an export, derive suggested overrides
 * from it and publish both as step outputs.
 */
export async function prepareIcfTemplate(opts: PrepareIcfOptions): Promise<IcfTemplateResult> {
  const log = opts.logger ?? ((s) => console.log(s));
  const out = opts.outputs;

  let chosen: string | null = null;
  if (!opts.artifactDir) {
    log("::notice::ARTIFACT_DIR is not set; skipping the customization template search.");
  } else {
    log(`[icf] searching for templates in ${opts.artifactDir}`);
    chosen = await findTemplate(opts.artifactDir, log);
  }

  let status: IcfTemplateStatus = "missing";
  if (chosen) {
    log(`[icf] template found: ${chosen}`);
    status = "ready";
  } else {
    log("::notice::No customization template in the downloaded artifacts; the deployment continues without ICF overrides.");
  }

  let content: string | null = null;
  let sourcePath: string | undefined;
  if (chosen) {
    try {
      content = await fs.readFile(chosen, "utf8");
      sourcePath = chosen;
    } catch (e) {
      log(`::notice::Could not read template ${chosen}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (content === null && opts.fallbackTemplatePath && (await isFile(opts.fallbackTemplatePath))) {
    log(`[icf] using fallback template ${opts.fallbackTemplatePath}`);
    content = await fs.readFile(opts.fallbackTemplatePath, "utf8");
    sourcePath = opts.fallbackTemplatePath;
    if (status === "missing") status = "fallback";
  }

  if (content === null) {
    out.set("icf_template_status", status);
    return { status, overrides: {} };
  }

  const overrides = extractTemplateOverrides(content);
  const overridesJson = JSON.stringify(overrides, null, 2);

  if (!Object.keys(overrides).length) {
    if (status === "ready") status = "empty";
    log(
      `::notice::Template ${sourcePath} has no key=value pairs. No overrides will be suggested; ` +
        "fill the template with 'key=value' entries to suggest some."
    );
  } else {
    log("::notice::Generated ICF overrides from the template. Review the follow-up issue to complete the remaining steps.");
  }

  out.set("icf_template_path", sourcePath);
  out.set("icf_template_source", sourcePath);
  if (sourcePath) out.set("icf_template_file", path.basename(sourcePath));
  out.set("icf_template_content_b64", b64(content));
  out.set("icf_overrides_json_b64", b64(overridesJson));
  out.set("icf_overrides_qa_json_b64", b64(overridesJson));
  out.set("icf_overrides_prod_json_b64", b64(overridesJson));
  out.set("icf_template_status", status);

  return { status, sourcePath, overrides };
}
