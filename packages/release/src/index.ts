export type * from "./types.js";
export { ReleaseError, githubStatus, normalizeGithubError, withGithubErrors } from "./errors.js";
export { ReleaseEnvSchema, loadReleaseConfig, parseRepository } from "./config.js";
export { normalizeApprovals } from "./approvals.js";
export {
  buildRelease,
  deriveBranch,
  formatRunTime,
  releaseName,
  releaseTag,
  statusIcon,
} from "./body.js";
export { createReleaseClients, type GithubTokenConfig } from "./clients.github.js";
export {
  ensureRelease,
  fetchRunApprovals,
  publishDeploymentRelease,
  type EnsureResult,
  type PublishOptions,
} from "./publish.js";
