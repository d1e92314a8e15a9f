import fs from "node:fs/promises";
import path from "node:path";
import { Open } from "unzipper";

export const TEMPLATE_SUFFIXES = new Set([".properties", ".cfg", ".conf", ".ini", ".env", ".txt"]);

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export async function isZipFile(file: string): Promise<boolean> {
  const handle = await fs.open(file, "r");
  try {
    const buf = Buffer.alloc(4);
    const { bytesRead } = await handle.read(buf, 0, 4, 0);
    return bytesRead === 4 && buf.equals(ZIP_MAGIC);
  } finally {
    await handle.close();
  }
}

export async function isTextFile(file: string): Promise<boolean> {
  try {
    const bytes = await fs.readFile(file);
    new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    return true;
  } catch {
    return false;
  }
}

/** Where a zip is unpacked: beside it, extension stripped, or `<name>_extracted`. */
export function extractionDir(zipFile: string): string {
  const ext = path.extname(zipFile);
  if (ext) return zipFile.slice(0, -ext.length);
  return path.join(path.dirname(zipFile), `${path.basename(zipFile)}_extracted`);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Breadth-first walk of `root` returning every regular file.
 * Zip archives are unpacked once next to themselves and walked in place of the archive.
 */
export async function collectCandidates(root: string, log: (line: string) => void): Promise<string[]> {
  const candidates: string[] = [];
  if (!(await exists(root))) return candidates;

  const queue: string[] = [root];
  const seenDirs = new Set<string>();

  while (queue.length) {
    const current = queue.shift();
    if (current === undefined || seenDirs.has(current)) continue;
    seenDirs.add(current);

    const stat = await fs.stat(current).catch(() => null);
    if (!stat?.isDirectory()) continue;

    const entries = await fs.readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        queue.push(full);
        continue;
      }
      if (!entry.isFile()) continue;

      if (await isZipFile(full)) {
        const target = extractionDir(full);
        if (!(await exists(target))) {
          log(`[icf] extracting ZIP ${full} into ${target}`);
          await fs.mkdir(target, { recursive: true });
          const archive = await Open.file(full);
          await archive.extract({ path: target });
        }
        queue.push(target);
        continue;
      }

      candidates.push(full);
    }
  }
  return candidates;
}

function suffixPriority(file: string): number {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".properties") return 0;
  if (ext === ".txt" || ext === ".cfg") return 1;
  return 2;
}

/** `.properties` first, then `.txt`/`.cfg`, then the rest; shorter names win ties. */
export function compareTemplates(a: string, b: string): number {
  const pa = suffixPriority(a);
  const pb = suffixPriority(b);
  if (pa !== pb) return pa - pb;
  const na = path.basename(a);
  const nb = path.basename(b);
  if (na.length !== nb.length) return na.length - nb.length;
  return na < nb ? -1 : na > nb ? 1 : 0;
}

export async function findTemplate(artifactDir: string, log: (line: string) => void): Promise<string | null> {
  const roots = [
    path.join(artifactDir, "customization-template"),
    path.join(artifactDir, "customization"),
    artifactDir,
  ];

  const seen = new Set<string>();
  const usable: string[] = [];
  for (const root of roots) {
    for (const file of await collectCandidates(root, log)) {
      if (seen.has(file)) continue;
      seen.add(file);
      if (!TEMPLATE_SUFFIXES.has(path.extname(file).toLowerCase())) continue;
      if (!(await isTextFile(file))) continue;
      usable.push(file);
    }
  }
  if (!usable.length) return null;
  return usable.sort(compareTemplates)[0];
}
