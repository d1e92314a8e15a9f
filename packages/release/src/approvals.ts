import { z } from "zod";
import type { RunApproval } from "./types.js";

const ReviewSchema = z.object({
  state: z.string().nullish(),
  user: z.object({ login: z.string().nullish() }).passthrough().nullish(),
}).passthrough();

const ReviewListSchema = z.union([
  z.array(z.unknown()),
  z.object({ approvals: z.array(z.unknown()).nullish() }).passthrough(),
]);

/**
 * Reduce the run's environment reviews to `{ user, state }` pairs.
 * Accepts the bare array the API returns or an `{ approvals: [...] }` wrapper;
 * entries without a login are dropped.
 */
export function normalizeApprovals(data: unknown): RunApproval[] {
  const list = ReviewListSchema.safeParse(data);
  if (!list.success) return [];
  const items = Array.isArray(list.data) ? list.data : list.data.approvals ?? [];

  const out: RunApproval[] = [];
  for (const item of items) {
    const review = ReviewSchema.safeParse(item);
    if (!review.success) continue;
    const login = review.data.user?.login;
    if (!login) continue;
    out.push({ user: login, state: (review.data.state || "approved").toLowerCase() });
  }
  return out;
}
