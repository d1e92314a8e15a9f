export type DeployKind = "app" | "package";

export interface RepoRef {
  owner: string;
  repo: string;
}

/** Body of POST /repos/{owner}/{repo}/releases */
export interface ReleasePayload {
  tag_name: string;
  name: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
  target_commitish: string;
}

export type ReleasePatch = Omit<ReleasePayload, "tag_name">;

export interface ExistingRelease {
  id: number;
  tag_name: string;
  html_url?: string;
}

export interface RunApproval {
  user: string;
  state: string;
}

export interface ReleaseClients {
  releases: {
    /** null when no release carries the tag */
    getByTag(ref: RepoRef, tag: string): Promise<ExistingRelease | null>;
    create(ref: RepoRef, payload: ReleasePayload): Promise<ExistingRelease>;
    update(ref: RepoRef, id: number, patch: ReleasePatch): Promise<ExistingRelease>;
  };
  actions: {
    /** Raw environment reviews of a workflow run; [] when the run is unknown */
    listRunApprovals(ref: RepoRef, runId: number): Promise<unknown>;
  };
}

export type ReleaseConfig = {
  token: string;
  repository: RepoRef;
  apiUrl: string;
  serverUrl: string;
  deployKind: DeployKind;
  plan: string;
  runId: string;
  runNumber: string;
  runUrl: string;
  runStartedAt: string;
  triggeringActor: string;
  gitRef: string;
  gitSha: string;
  gitRefName: string;
  appName: string;
  packageName: string;
  artifactName: string;
  artifactDir: string;
  metadataPath: string;
  packageArtifactName: string;
  packageFileName: string;
  packageStatus: string;
  icfTemplateStatus: string;
  icfTemplateFile: string;
  /** Workspace-relative path of the chosen template; may sit below an extracted archive. */
  icfTemplatePath: string;
  promoteQaResult: string;
  promoteProdAfterQaResult: string;
  promoteProdFromQaResult: string;
};

export type BuiltRelease = {
  tagName: string;
  name: string;
  body: string;
  payload: ReleasePayload;
};
