import { z } from "zod";
import { ReleaseError } from "./errors.js";
import type { ReleaseConfig, RepoRef } from "./types.js";

const str = z.string().optional().transform((v) => (v ?? "").trim());

/** Environment the release step runs with. Every value is trimmed; absent means "". */
export const ReleaseEnvSchema = z.object({
  GITHUB_TOKEN: str,
  GITHUB_REPOSITORY: str,
  REPOSITORY: str,
  GITHUB_API_URL: str,
  GITHUB_SERVER_URL: str,
  DEPLOY_KIND: str,
  PLAN: str,
  RUN_ID: str,
  RUN_NUMBER: str,
  RUN_URL: str,
  RUN_STARTED_AT: str,
  TRIGGERING_ACTOR: str,
  TRIGGER_ACTOR: str,
  INITIATED_BY: str,
  GIT_REF: str,
  GIT_SHA: str,
  GIT_REF_NAME: str,
  APP_NAME: str,
  PACKAGE_NAME: str,
  ARTIFACT_NAME: str,
  ARTIFACT_DIR: str,
  METADATA_PATH: str,
  PACKAGE_ARTIFACT_NAME: str,
  PACKAGE_FILE_NAME: str,
  PACKAGE_STATUS: str,
  ICF_TEMPLATE_STATUS: str,
  ICF_TEMPLATE_FILE: str,
  ICF_TEMPLATE_PATH: str,
  PROMOTE_QA_RESULT: str,
  PROMOTE_PROD_AFTER_QA_RESULT: str,
  PROMOTE_PROD_FROM_QA_RESULT: str,
});

export function parseRepository(value: string): RepoRef {
  const [owner, repo, ...rest] = value.split("/");
  if (!owner || !repo || rest.length) {
    throw new ReleaseError(`GITHUB_REPOSITORY must look like owner/repo (got "${value}")`);
  }
  return { owner, repo };
}

export function loadReleaseConfig(env: Record<string, string | undefined> = process.env): ReleaseConfig {
  const e = ReleaseEnvSchema.parse(env);

  if (!e.GITHUB_TOKEN) throw new ReleaseError("GITHUB_TOKEN is required");
  const repository = e.GITHUB_REPOSITORY || e.REPOSITORY;
  if (!repository) throw new ReleaseError("GITHUB_REPOSITORY is not set");

  return {
    token: e.GITHUB_TOKEN,
    repository: parseRepository(repository),
    apiUrl: e.GITHUB_API_URL || "https://api.github.com",
    serverUrl: (e.GITHUB_SERVER_URL || "https://github.com").replace(/\/+$/, ""),
    deployKind: e.DEPLOY_KIND === "package" ? "package" : "app",
    plan: e.PLAN,
    runId: e.RUN_ID,
    runNumber: e.RUN_NUMBER,
    runUrl: e.RUN_URL,
    runStartedAt: e.RUN_STARTED_AT,
    triggeringActor: e.TRIGGERING_ACTOR || e.TRIGGER_ACTOR || e.INITIATED_BY,
    gitRef: e.GIT_REF,
    gitSha: e.GIT_SHA,
    gitRefName: e.GIT_REF_NAME,
    appName: e.APP_NAME,
    packageName: e.PACKAGE_NAME,
    artifactName: e.ARTIFACT_NAME,
    artifactDir: e.ARTIFACT_DIR,
    metadataPath: e.METADATA_PATH,
    packageArtifactName: e.PACKAGE_ARTIFACT_NAME,
    packageFileName: e.PACKAGE_FILE_NAME,
    packageStatus: e.PACKAGE_STATUS,
    icfTemplateStatus: e.ICF_TEMPLATE_STATUS,
    icfTemplateFile: e.ICF_TEMPLATE_FILE,
    icfTemplatePath: e.ICF_TEMPLATE_PATH,
    promoteQaResult: e.PROMOTE_QA_RESULT,
    promoteProdAfterQaResult: e.PROMOTE_PROD_AFTER_QA_RESULT,
    promoteProdFromQaResult: e.PROMOTE_PROD_FROM_QA_RESULT,
  };
}
