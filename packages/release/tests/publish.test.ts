import { describe, it, expect, vi } from "vitest";
import {
  ensureRelease,
  fetchRunApprovals,
  loadReleaseConfig,
  normalizeApprovals,
  normalizeGithubError,
  publishDeploymentRelease,
  ReleaseError,
  withGithubErrors,
  type ExistingRelease,
  type ReleaseClients,
  type ReleasePayload,
} from "../src/index.js";

const ref = { owner: "acme", repo: "deployments" };

const payload: ReleasePayload = {
  tag_name: "deploy-app-crm-1",
  name: "Deploy App · QA → Prod",
  body: "body",
  draft: false,
  prerelease: false,
  target_commitish: "main",
};

function fakeClients(opts: { existing?: ExistingRelease | null; reviews?: unknown } = {}) {
  const clients = {
    releases: {
      getByTag: vi.fn(async () => opts.existing ?? null),
      create: vi.fn(async () => ({ id: 10, tag_name: payload.tag_name, html_url: "https://example.test/r/10" })),
      update: vi.fn(async (_ref: unknown, id: number) => ({ id, tag_name: payload.tag_name })),
    },
    actions: {
      listRunApprovals: vi.fn(async () => opts.reviews ?? []),
    },
  } satisfies ReleaseClients;
  return clients;
}

describe("ensureRelease", () => {
  it("creates a release when the tag is new", async () => {
    const clients = fakeClients();
    const res = await ensureRelease(clients, ref, payload);
    expect(res).toEqual({ action: "created", release: { id: 10, tag_name: payload.tag_name, html_url: "https://example.test/r/10" } });
    expect(clients.releases.getByTag).toHaveBeenCalledWith(ref, "deploy-app-crm-1");
    expect(clients.releases.create).toHaveBeenCalledWith(ref, payload);
    expect(clients.releases.update).not.toHaveBeenCalled();
  });

  it("updates the existing release without resending the tag", async () => {
    const clients = fakeClients({ existing: { id: 3, tag_name: payload.tag_name } });
    const res = await ensureRelease(clients, ref, payload);
    expect(res.action).toBe("updated");
    expect(clients.releases.update).toHaveBeenCalledWith(ref, 3, {
      name: payload.name,
      body: "body",
      draft: false,
      prerelease: false,
      target_commitish: "main",
    });
    expect(clients.releases.create).not.toHaveBeenCalled();
  });
});

describe("approvals", () => {
  it("normalizes the review list", () => {
    expect(
      normalizeApprovals([
        { state: "APPROVED", user: { login: "lead" }, environments: [{ name: "prod" }] },
        { state: null, user: { login: "ops" } },
        { state: "rejected", user: null },
        "garbage",
      ])
    ).toEqual([
      { user: "lead", state: "approved" },
      { user: "ops", state: "approved" },
    ]);
  });

  it("accepts a wrapped list and ignores other shapes", () => {
    expect(normalizeApprovals({ approvals: [{ state: "Rejected", user: { login: "qa" } }] })).toEqual([
      { user: "qa", state: "rejected" },
    ]);
    expect(normalizeApprovals(null)).toEqual([]);
    expect(normalizeApprovals({})).toEqual([]);
  });

  it("skips the lookup without a numeric run id", async () => {
    const clients = fakeClients();
    expect(await fetchRunApprovals(clients, ref, "")).toEqual([]);
    expect(await fetchRunApprovals(clients, ref, "abc")).toEqual([]);
    expect(clients.actions.listRunApprovals).not.toHaveBeenCalled();
  });
});

describe("publishDeploymentRelease", () => {
  it("lists approvals, builds the body and creates the release", async () => {
    const clients = fakeClients({ reviews: [{ state: "approved", user: { login: "lead" } }] });
    const cfg = loadReleaseConfig({
      GITHUB_TOKEN: "test-token",
      GITHUB_REPOSITORY: "acme/deployments",
      APP_NAME: "crm",
      PLAN: "qa-to-prod",
      RUN_ID: "1",
    });
    const lines: string[] = [];

    const res = await publishDeploymentRelease(cfg, clients, { logger: (l) => lines.push(l) });

    expect(clients.actions.listRunApprovals).toHaveBeenCalledWith(ref, 1);
    expect(res.tagName).toBe("deploy-app-crm-1");
    expect(res.action).toBe("created");
    expect(res.body).toContain("\n\n## Approvals\n\n- @lead (approved)\n\n");
    expect(lines).toEqual([
      "tag deploy-app-crm-1 (1 approval(s))",
      "created release 10 https://example.test/r/10",
    ]);
  });
});

describe("GitHub errors", () => {
  it("normalizes status, message and request id", () => {
    const err = Object.assign(new Error("API rate limit exceeded"), {
      status: 403,
      response: { headers: { "x-github-request-id": "ABC:1" }, data: { message: "API rate limit exceeded" } },
    });
    expect(normalizeGithubError(err)).toEqual({
      statusCode: 403,
      message: "API rate limit exceeded",
      requestId: "ABC:1",
    });
  });

  it("wraps failures with the route", async () => {
    const failing = () => Promise.reject(Object.assign(new Error("Validation Failed"), { status: 422 }));
    const attempt = withGithubErrors("POST /repos/acme/deployments/releases", failing);
    await expect(attempt).rejects.toThrow(ReleaseError);
    await expect(withGithubErrors("POST /x", failing)).rejects.toThrow(
      "GitHub API POST /x failed: 422 Validation Failed"
    );
  });
});
