import type { z } from "zod";
import type { CoreActionSchema, FlowIdSchema, PlanIdSchema } from "./schema.js";

export type FlowId = z.infer<typeof FlowIdSchema>;
export type PlanId = z.infer<typeof PlanIdSchema>;
export type CoreAction = z.infer<typeof CoreActionSchema>;
export type Environment = "dev" | "qa" | "prod";

/** Compiled step: a Core action with its resolved parameters */
export type PlanStep = {
  id: string;
  title: string;
  action: CoreAction;   // e.g., "promote"
  with: Record<string, string>;
};

export type DeploymentPlan = {
  flow: FlowId;
  plan: PlanId;
  summary: string;
  targets: Environment[];
  steps: PlanStep[];
};
