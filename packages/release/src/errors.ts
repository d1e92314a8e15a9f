export class ReleaseError extends Error {
  readonly status?: number;
  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "ReleaseError";
    this.status = opts.status;
  }
}

/** Own-property read on an unknown thrown value. */
function prop(o: unknown, key: string): unknown {
  if (typeof o !== "object" || o === null) return undefined;
  return Object.getOwnPropertyDescriptor(o, key)?.value;
}

export function githubStatus(e: unknown): number | undefined {
  const status = prop(e, "status") ?? prop(prop(e, "response"), "status");
  return typeof status === "number" ? status : undefined;
}

export function normalizeGithubError(e: unknown) {
  const status = githubStatus(e);
  const response = prop(e, "response");
  const headers = prop(response, "headers");
  const requestId = prop(headers, "x-github-request-id") ?? prop(headers, "x-request-id");
  const rawMessage = prop(prop(response, "data"), "message") ?? prop(e, "message");
  const message = typeof rawMessage === "string" && rawMessage ? rawMessage : "GitHub API error";
  return {
    statusCode: status,
    message,
    requestId: typeof requestId === "string" ? requestId : undefined,
  };
}

/** Run a GitHub call, turning failures into a ReleaseError naming the route. */
export async function withGithubErrors<T>(route: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof ReleaseError) throw e;
    const n = normalizeGithubError(e);
    const req = n.requestId ? ` (request ${n.requestId})` : "";
    throw new ReleaseError(`GitHub API ${route} failed: ${n.statusCode ?? "n/a"} ${n.message}${req}`, {
      status: n.statusCode,
      cause: e,
    });
  }
}
