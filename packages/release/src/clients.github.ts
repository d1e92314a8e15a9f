import { Octokit } from "@octokit/rest";
import { retry } from "@octokit/plugin-retry";
import { throttling } from "@octokit/plugin-throttling";
import { githubStatus, withGithubErrors } from "./errors.js";
import type { ReleaseClients } from "./types.js";

const RetryThrottledOctokit = Octokit.plugin(retry, throttling);

export type GithubTokenConfig = {
  token: string;
  baseUrl?: string;
  userAgent?: string;
};

function octokitFromToken(cfg: GithubTokenConfig) {
  return new RetryThrottledOctokit({
    auth: cfg.token,
    baseUrl: cfg.baseUrl,
    userAgent: cfg.userAgent ?? "deploy-wrapper",
    request: { retries: 3, retryAfter: 2 },
    throttle: { onRateLimit: () => true, onSecondaryRateLimit: () => true },
  });
}

export function createReleaseClients(cfg: GithubTokenConfig): ReleaseClients {
  const oc = octokitFromToken(cfg);

  const releases: ReleaseClients["releases"] = {
    async getByTag({ owner, repo }, tag) {
      try {
        const r = await oc.rest.repos.getReleaseByTag({ owner, repo, tag });
        return r.data;
      } catch (e) {
        if (githubStatus(e) === 404) return null;
        return withGithubErrors(`GET /repos/${owner}/${repo}/releases/tags/${tag}`, () => Promise.reject(e));
      }
    },
    async create({ owner, repo }, payload) {
      return withGithubErrors(`POST /repos/${owner}/${repo}/releases`, async () => {
        const r = await oc.rest.repos.createRelease({ owner, repo, ...payload });
        return r.data;
      });
    },
    async update({ owner, repo }, id, patch) {
      return withGithubErrors(`PATCH /repos/${owner}/${repo}/releases/${id}`, async () => {
        const r = await oc.rest.repos.updateRelease({ owner, repo, release_id: id, ...patch });
        return r.data;
      });
    },
  };

  const actions: ReleaseClients["actions"] = {
    async listRunApprovals({ owner, repo }, runId) {
      try {
        const r = await oc.rest.actions.getReviewsForRun({ owner, repo, run_id: runId });
        return r.data;
      } catch (e) {
        if (githubStatus(e) === 404) return [];
        return withGithubErrors(`GET /repos/${owner}/${repo}/actions/runs/${runId}/approvals`, () => Promise.reject(e));
      }
    },
  };

  return { releases, actions };
}
