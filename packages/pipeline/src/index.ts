import path from "node:path";
import { loadFlowsFromDir, type LoadedFlow } from "./loader.js";
import { compileFlow } from "./plan.js";
import type { FlowInputs } from "./interp.js";
import type { DeploymentPlan, FlowId } from "./types.js";

export * from "./schema.js";
export type * from "./types.js";
export { PLAN_LABELS, PLAN_TARGETS, isPlanId, planLabel, planTargets } from "./plans.js";
export { interpolateString, interpolateRecord, evalWhen, type FlowInputs } from "./interp.js";
export { FlowInputError, resolveFlowInputs, compileFlow, summarizePlan } from "./plan.js";
export { FlowValidationError, parseFlow, loadFlowsFromDir, type LoadedFlow } from "./loader.js";

export type FlowCatalogOptions = {
  /** Directory holding flow YAML files. Defaults to process.env.DEPLOY_FLOWS_DIR || "<cwd>/flows" */
  flowsDir?: string;
  logger?: (line: string) => void;
};

export type FlowCatalog = {
  flowsDir: string;
  list(): Promise<LoadedFlow[]>;
  get(id: FlowId): Promise<LoadedFlow>;
  compile(id: FlowId, inputs: FlowInputs): Promise<DeploymentPlan>;
};

export function createFlowCatalog(opts: FlowCatalogOptions = {}): FlowCatalog {
  const flowsDir = opts.flowsDir || process.env.DEPLOY_FLOWS_DIR || path.resolve(process.cwd(), "flows");
  const log = opts.logger ?? ((s) => console.log(`[pipeline] ${s}`));

  // re-read on each call; the catalog is a handful of small files
  async function list() {
    const all = await loadFlowsFromDir(flowsDir);
    log(`loaded ${all.length} flow(s) from ${flowsDir}`);
    return all;
  }

  async function get(id: FlowId) {
    const found = (await list()).find((f) => f.id === id);
    if (!found) throw new Error(`Flow not found: ${id} (searched ${flowsDir})`);
    return found;
  }

  return {
    flowsDir,
    list,
    get,
    async compile(id, inputs) {
      const flow = await get(id);
      return compileFlow(flow.def, inputs);
    },
  };
}
