import fs from "node:fs/promises";
import path from "node:path";
import { OverrideFormatError, overridesToRecord, parseOverrides } from "@deploy-wrapper/overrides";
import type { CommandContext } from "./context.js";

export type ParseOverridesOptions = {
  file?: string;
  env?: string;
  out?: string;
  strict?: boolean;
};

export class DuplicateOverrideError extends Error {
  constructor(line: number, firstLine: number) {
    super(`Override file line ${line} repeats the key from line ${firstLine}`);
    this.name = "DuplicateOverrideError";
  }
}

/**
 * Parse the environment's override secret and hand the ordered mapping to the
 * customization-build step. Nothing is written unless the whole text parses.
 */
export async function handleParseOverrides(ctx: CommandContext, options: ParseOverridesOptions): Promise<number> {
  const envName = options.env || "OVERRIDES";
  const text = options.file ? await fs.readFile(options.file, "utf8") : ctx.env[envName] ?? "";
  if (!text.trim()) {
    ctx.log(`::notice::No overrides provided (${options.file ?? envName}); the customization file is built without them.`);
    ctx.outputs.set("overrides_count", "0");
    return 0;
  }

  let record: Record<string, string>;
  try {
    const set = parseOverrides(text, {
      onDuplicate: (_key, line, firstLine) => {
        if (options.strict) throw new DuplicateOverrideError(line, firstLine);
        ctx.log(`::warning::Override file line ${line} repeats the key from line ${firstLine}; the later value wins.`);
      },
    });
    record = overridesToRecord(set);
  } catch (e) {
    if (e instanceof OverrideFormatError || e instanceof DuplicateOverrideError) {
      ctx.log(`::error::${e.message}`);
      return 1;
    }
    throw e;
  }

  const json = JSON.stringify(record);
  if (options.out) {
    await fs.mkdir(path.dirname(options.out), { recursive: true });
    await fs.writeFile(options.out, json, "utf8");
  }
  const count = Object.keys(record).length;
  ctx.outputs.set("overrides_json_b64", Buffer.from(json, "utf8").toString("base64"));
  ctx.outputs.set("overrides_count", String(count));
  ctx.log(`[overrides] parsed ${count} override(s)${options.out ? ` into ${options.out}` : ""}`);
  return 0;
}
