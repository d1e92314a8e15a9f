import { prepareIcfTemplate, writeExportMetadata } from "@deploy-wrapper/artifacts";
import type { CommandContext } from "./context.js";

export async function handlePrepareIcfTemplate(ctx: CommandContext): Promise<number> {
  const result = await prepareIcfTemplate({
    artifactDir: ctx.env.ARTIFACT_DIR,
    fallbackTemplatePath: ctx.env.FALLBACK_TEMPLATE_PATH,
    outputs: ctx.outputs,
    logger: ctx.log,
  });
  ctx.log(`[icf] status: ${result.status}`);
  return 0;
}

export async function handleWriteExportMetadata(ctx: CommandContext): Promise<number> {
  const file = await writeExportMetadata(ctx.env);
  ctx.outputs.set("metadata_path", file);
  ctx.log(`[metadata] wrote ${file}`);
  return 0;
}
