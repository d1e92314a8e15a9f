import path from "node:path";

export const ARTIFACTS_ROOT = "artifacts";

/** Runs of characters outside [A-Za-z0-9._-] become one dash; never empty. */
export function slugify(text: string): string {
  const clean = text
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  return clean || "run";
}

/** `artifacts/<slug>/<run>`: one directory per exported app or package and run. */
export function artifactDirFor(name: string, runId: string, root = ARTIFACTS_ROOT): string {
  return path.posix.join(root, slugify(name), slugify(runId));
}
