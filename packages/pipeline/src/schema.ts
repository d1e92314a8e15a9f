import { z } from "zod";

export const FLOW_IDS = ["A", "B", "C"] as const;
export const PLAN_IDS = ["dev-to-qa", "dev-qa-prod", "qa-to-prod"] as const;
export const CORE_ACTIONS = ["export", "promote", "build-icf", "prepare-db-scripts"] as const;

export const FlowIdSchema = z.enum(FLOW_IDS);
export const PlanIdSchema = z.enum(PLAN_IDS);
export const CoreActionSchema = z.enum(CORE_ACTIONS);

const InputValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Input spec for a flow variable */
export const InputSpecSchema = z.object({
  required: z.boolean().optional(),
  default: InputValueSchema.optional(),
  enum: z.array(InputValueSchema).optional(),
  description: z.string().optional()
}).strict();

export const InputsSchema = z.record(InputSpecSchema);

/** One Core action invocation */
export const StepSchema = z.object({
  id: z.string(),
  title: z.string(),
  action: CoreActionSchema,
  when: z.string().optional(),
  with: z.record(z.string()).default({})
}).strict();

export const FlowSchema = z.object({
  id: FlowIdSchema,
  name: z.string(),
  plan: PlanIdSchema,
  summary: z.string().optional(),
  inputs: InputsSchema.default({}),
  steps: z.array(StepSchema).min(1)
}).strict();

export type InputValue = z.infer<typeof InputValueSchema>;
export type FlowDef = z.infer<typeof FlowSchema>;
export type StepDef = z.infer<typeof StepSchema>;
