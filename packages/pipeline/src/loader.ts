import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import { FlowSchema, type FlowDef } from "./schema.js";
import type { FlowId } from "./types.js";

export type LoadedFlow = {
  id: FlowId;
  file: string;
  yaml: string;
  def: FlowDef;
};

export class FlowValidationError extends Error {
  constructor(message: string) { super(message); this.name = "FlowValidationError"; }
}

function formatIssues(issues: readonly ZodIssue[], source: string): string {
  return issues
    .map((i) => ` - ${source} :: ${i.path.length ? i.path.join(".") : "<root>"} — ${i.message} (${i.code})`)
    .join("\n");
}

export function parseFlow(txt: string, source: string): FlowDef {
  let doc: unknown;
  try {
    doc = yaml.load(txt);
  } catch (e) {
    throw new FlowValidationError(`Invalid YAML in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = FlowSchema.safeParse(doc);
  if (!parsed.success) {
    throw new FlowValidationError(`Invalid flow definition in ${source}:\n${formatIssues(parsed.error.issues, source)}`);
  }
  return parsed.data;
}

export async function loadFlowsFromDir(dir: string): Promise<LoadedFlow[]> {
  const files = await listYamlFiles(dir);
  const out: LoadedFlow[] = [];
  for (const f of files) {
    const full = path.join(dir, f);
    const txt = await fs.readFile(full, "utf8");
    const def = parseFlow(txt, full);
    out.push({ id: def.id, file: full, yaml: txt, def });
  }
  // ensure unique IDs
  const ids = new Set<string>();
  for (const t of out) {
    if (ids.has(t.id)) throw new FlowValidationError(`Duplicate flow id: ${t.id} (${t.file})`);
    ids.add(t.id);
  }
  return out;
}

async function listYamlFiles(dir: string): Promise<string[]> {
  let entries: Dirent[] = [];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) return [];
    throw e;
  }
  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .filter((n) => /\.ya?ml$/i.test(n))
    .sort();
}

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
