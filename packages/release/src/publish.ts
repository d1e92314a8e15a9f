import { normalizeApprovals } from "./approvals.js";
import { buildRelease } from "./body.js";
import type { BuiltRelease, ExistingRelease, ReleaseClients, ReleaseConfig, ReleasePayload, RepoRef, RunApproval } from "./types.js";

export type EnsureResult = {
  action: "created" | "updated";
  release: ExistingRelease;
};

/** Update the release carrying `payload.tag_name`, or create it. */
export async function ensureRelease(clients: ReleaseClients, ref: RepoRef, payload: ReleasePayload): Promise<EnsureResult> {
  const existing = await clients.releases.getByTag(ref, payload.tag_name);
  if (existing) {
    const { tag_name: _tag, ...patch } = payload;
    const release = await clients.releases.update(ref, existing.id, patch);
    return { action: "updated", release };
  }
  const release = await clients.releases.create(ref, payload);
  return { action: "created", release };
}

export async function fetchRunApprovals(clients: ReleaseClients, ref: RepoRef, runId: string): Promise<RunApproval[]> {
  const id = Number(runId);
  if (!runId || !Number.isInteger(id) || id <= 0) return [];
  return normalizeApprovals(await clients.actions.listRunApprovals(ref, id));
}

export type PublishOptions = {
  logger?: (line: string) => void;
};

/** Build the release record for a deployment run and create or update it. */
export async function publishDeploymentRelease(
  cfg: ReleaseConfig,
  clients: ReleaseClients,
  opts: PublishOptions = {}
): Promise<BuiltRelease & EnsureResult> {
  const log = opts.logger ?? ((s) => console.log(`[release] ${s}`));

  const approvals = await fetchRunApprovals(clients, cfg.repository, cfg.runId);
  const built = buildRelease(cfg, approvals);
  log(`tag ${built.tagName} (${approvals.length} approval(s))`);

  const result = await ensureRelease(clients, cfg.repository, built.payload);
  log(`${result.action} release ${result.release.id}${result.release.html_url ? ` ${result.release.html_url}` : ""}`);
  return { ...built, ...result };
}
