import { createFlowCatalog, FlowIdSchema, planLabel, summarizePlan, type FlowInputs } from "@deploy-wrapper/pipeline";
import { errorMessage, type CommandContext } from "./context.js";

export type PlanOptions = {
  flow: string;
  input?: string[];
  flowsDir?: string;
};

/** `key=value` trigger inputs; the value keeps any further `=`. */
export function parseInputs(pairs: string[]): FlowInputs {
  const out: FlowInputs = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new Error(`Input must be key=value: ${pair}`);
    out[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return out;
}

export async function handlePlan(ctx: CommandContext, options: PlanOptions): Promise<number> {
  const flow = FlowIdSchema.safeParse(options.flow.trim().toUpperCase());
  if (!flow.success) {
    ctx.log(`::error::Unknown flow "${options.flow}". Expected one of: ${FlowIdSchema.options.join(", ")}`);
    return 1;
  }

  const catalog = createFlowCatalog({
    flowsDir: options.flowsDir || ctx.env.DEPLOY_FLOWS_DIR,
    logger: (line) => ctx.log(`[pipeline] ${line}`),
  });

  try {
    const plan = await catalog.compile(flow.data, parseInputs(options.input ?? []));
    const exportStep = plan.steps.find((s) => s.action === "export");
    if (!exportStep) {
      ctx.log(`::error::Flow ${flow.data} has no export step`);
      return 1;
    }
    ctx.log(summarizePlan(plan));
    ctx.outputs.set("plan", plan.plan);
    ctx.outputs.set("plan_label", planLabel(plan.plan));
    ctx.outputs.set("targets", JSON.stringify(plan.targets));
    ctx.outputs.set("steps_json", JSON.stringify(plan.steps));
    // workflow jobs gate on these rather than on the raw trigger inputs
    ctx.outputs.set("step_ids", JSON.stringify(plan.steps.map((s) => s.id)));
    ctx.outputs.set("export_environment", exportStep.with.environment ?? "");
    ctx.outputs.set("export_credentials", exportStep.with.credentials ?? "");
    return 0;
  } catch (e) {
    ctx.log(`::error::Could not plan flow ${flow.data}: ${errorMessage(e)}`);
    return 1;
  }
}
