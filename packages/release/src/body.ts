import { slugify } from "@deploy-wrapper/artifacts";
import { planLabel, planTargets } from "@deploy-wrapper/pipeline";
import type { BuiltRelease, ReleaseConfig, RunApproval } from "./types.js";

const STATUS_ICONS: Record<string, string> = {
  success: "✅",
  skipped: "⚪",
  cancelled: "⏭️",
  failure: "❌",
};

export function statusIcon(result: string): string {
  return `${STATUS_ICONS[result] ?? "ℹ️"} ${result || "unknown"}`;
}

/** ISO timestamp as `YYYY-MM-DD HH:MM:SS UTC`; anything unparseable is returned as-is. */
export function formatRunTime(value: string): string {
  if (!value) return "";
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) return value;
  return `${d.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function deriveBranch(refName: string, ref: string): string {
  if (refName) return refName;
  if (ref.startsWith("refs/heads/")) return ref.slice("refs/heads/".length);
  return ref || "main";
}

function repoLinks(cfg: ReleaseConfig) {
  const repoUrl = `${cfg.serverUrl}/${cfg.repository.owner}/${cfg.repository.repo}`;
  const branch = deriveBranch(cfg.gitRefName, cfg.gitRef);
  const clean = (p: string) => p.replace(/^[./]+/, "");
  return {
    tree: (p: string) => `[${p}](${repoUrl}/tree/${branch}/${clean(p)})`,
    blob: (p: string) => `[${p}](${repoUrl}/blob/${branch}/${clean(p)})`,
  };
}

function summaryLines(cfg: ReleaseConfig): string[] {
  const run = cfg.runNumber || cfg.runId;
  const lines = [
    cfg.runUrl ? `- Run: [${run}](${cfg.runUrl})` : `- Run: ${run}`,
    `- Plan: \`${cfg.plan || "unknown"}\` (${planLabel(cfg.plan)})`,
    `- Kind: ${cfg.deployKind}`,
  ];
  if (cfg.triggeringActor) lines.push(`- Triggered by: @${cfg.triggeringActor}`);
  const started = formatRunTime(cfg.runStartedAt);
  if (started) lines.push(`- Started at: ${started}`);
  if (cfg.appName) lines.push(`- App: ${cfg.appName}`);
  if (cfg.deployKind === "package" && cfg.packageName) lines.push(`- Package: ${cfg.packageName}`);
  if (cfg.gitRef) lines.push(`- Ref: \`${cfg.gitRef}\` @ ${cfg.gitSha.slice(0, 7)}`);
  return lines;
}

function environmentLines(cfg: ReleaseConfig): string[] {
  return planTargets(cfg.plan).map((target) =>
    target === "qa"
      ? `- QA: ${statusIcon(cfg.promoteQaResult)}`
      : `- Prod: ${statusIcon(cfg.promoteProdAfterQaResult || cfg.promoteProdFromQaResult)}`
  );
}

function artifactLines(cfg: ReleaseConfig): string[] {
  const { tree, blob } = repoLinks(cfg);
  const lines: string[] = [];
  if (cfg.artifactName) lines.push(`- Export artifact: \`${cfg.artifactName}\``);
  if (cfg.artifactDir) lines.push(`- Artifact dir: ${tree(cfg.artifactDir)}`);
  if (cfg.metadataPath) lines.push(`- Metadata JSON: ${blob(cfg.metadataPath)}`);
  if (cfg.packageArtifactName) lines.push(`- Package artifact: \`${cfg.packageArtifactName}\``);
  if (cfg.packageFileName) {
    lines.push(
      cfg.artifactDir
        ? `- Package file: ${blob(`${cfg.artifactDir}/${cfg.packageFileName}`)}`
        : `- Package file: \`${cfg.packageFileName}\``
    );
  }
  if (cfg.packageStatus) lines.push(`- Package status: ${cfg.packageStatus}`);
  if (cfg.icfTemplateStatus) {
    if (cfg.icfTemplatePath) {
      lines.push(`- ICF template: ${cfg.icfTemplateStatus} ${blob(cfg.icfTemplatePath)}`);
    } else if (cfg.icfTemplateFile && cfg.artifactDir) {
      lines.push(`- ICF template: ${cfg.icfTemplateStatus} ${blob(`${cfg.artifactDir}/${cfg.icfTemplateFile}`)}`);
    } else {
      lines.push(`- ICF template: ${cfg.icfTemplateStatus} ${cfg.icfTemplateFile || "(no file)"}`);
    }
  }
  if (cfg.runUrl) lines.push(`- Artifacts (run): [view in GitHub Actions](${cfg.runUrl}#artifacts)`);
  return lines;
}

export function releaseTag(cfg: ReleaseConfig): string {
  const root =
    cfg.deployKind === "package"
      ? `deploy-package-${slugify(cfg.packageName || "package")}`
      : `deploy-app-${slugify(cfg.appName || "app")}`;
  return `${root}-${cfg.runId || cfg.runNumber || "run"}`;
}

export function releaseName(cfg: ReleaseConfig): string {
  const prefix = cfg.deployKind === "package" ? `Deploy Package · ${cfg.packageName || "unknown package"}` : "Deploy App";
  return `${prefix} · ${planLabel(cfg.plan)}`;
}

export function buildRelease(cfg: ReleaseConfig, approvals: RunApproval[]): BuiltRelease {
  const sections = ["## Summary", summaryLines(cfg).join("\n")];

  const envs = environmentLines(cfg);
  if (envs.length) sections.push("\n## Result by environment", envs.join("\n"));

  const artifacts = artifactLines(cfg);
  if (artifacts.length) sections.push("\n## Artifacts", artifacts.join("\n"));

  sections.push(
    "\n## Approvals",
    approvals.length ? approvals.map((a) => `- @${a.user} (${a.state})`).join("\n") : "_No approvals recorded_",
    "\n## Change summary (to complete)",
    "_Edit this release and document the promoted changes._",
    "\n---\n_Generated automatically by GitHub Actions._"
  );

  const tagName = releaseTag(cfg);
  const name = releaseName(cfg);
  const body = sections.join("\n\n");
  return {
    tagName,
    name,
    body,
    payload: {
      tag_name: tagName,
      name,
      body,
      draft: false,
      prerelease: false,
      target_commitish: cfg.gitSha || cfg.gitRef || "main",
    },
  };
}
