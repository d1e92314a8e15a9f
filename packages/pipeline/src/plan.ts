import type { FlowDef, StepDef } from "./schema.js";
import { interpolateRecord, evalWhen, type FlowInputs } from "./interp.js";
import { planTargets } from "./plans.js";
import type { DeploymentPlan, PlanStep } from "./types.js";

export class FlowInputError extends Error {
  constructor(message: string) { super(message); this.name = "FlowInputError"; }
}

/**
 * Apply the flow's declared defaults and checks to the trigger inputs.
 * Undeclared inputs are kept as given.
 */
export function resolveFlowInputs(flow: FlowDef, inputs: FlowInputs): FlowInputs {
  const resolved: FlowInputs = { ...inputs };
  for (const [name, decl] of Object.entries(flow.inputs)) {
    const value = inputs[name] ?? decl.default;
    if (value === undefined) {
      if (decl.required) throw new FlowInputError(`Missing required input for flow ${flow.id}: ${name}`);
      resolved[name] = undefined;
      continue;
    }
    if (decl.enum?.length && !decl.enum.includes(value)) {
      throw new FlowInputError(`Invalid value for ${name}. Expected one of: ${decl.enum.join(", ")}`);
    }
    resolved[name] = value;
  }
  return resolved;
}

export function compileFlow(flow: FlowDef, inputs: FlowInputs): DeploymentPlan {
  const resolved = resolveFlowInputs(flow, inputs);
  const steps: PlanStep[] = [];
  for (const step of flow.steps) {
    emitStep(step, resolved, steps);
  }
  return {
    flow: flow.id,
    plan: flow.plan,
    summary: flow.summary || `${flow.name} (${flow.id})`,
    targets: planTargets(flow.plan),
    steps
  };
}

function emitStep(step: StepDef, inputs: FlowInputs, out: PlanStep[]) {
  if (!evalWhen(step.when, inputs)) return;
  out.push({
    id: step.id,
    title: step.title,
    action: step.action,
    with: interpolateRecord(step.with, inputs)
  });
}

export function summarizePlan(plan: DeploymentPlan): string {
  const lines = [
    `### Flow ${plan.flow}: ${plan.plan}`,
    `- **Summary:** ${plan.summary}`,
    ...plan.steps.map(s => `- **${s.title}** → \`${s.action}\``)
  ];
  return lines.join("\n");
}
