import { PlanIdSchema } from "./schema.js";
import type { Environment, PlanId } from "./types.js";

export const PLAN_LABELS: Record<PlanId, string> = {
  "dev-to-qa": "Dev → QA",
  "dev-qa-prod": "Dev → QA → Prod",
  "qa-to-prod": "QA → Prod",
};

export const PLAN_TARGETS: Record<PlanId, Environment[]> = {
  "dev-to-qa": ["qa"],
  "dev-qa-prod": ["qa", "prod"],
  "qa-to-prod": ["prod"],
};

export function isPlanId(value: string): value is PlanId {
  return PlanIdSchema.safeParse(value).success;
}

/** Label for display; unknown plans fall back to their raw value. */
export function planLabel(plan: string): string {
  if (isPlanId(plan)) return PLAN_LABELS[plan];
  return plan || "unknown plan";
}

export function planTargets(plan: string): Environment[] {
  return isPlanId(plan) ? [...PLAN_TARGETS[plan]] : [];
}
