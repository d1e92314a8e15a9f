import { loadReleaseConfig, publishDeploymentRelease } from "@deploy-wrapper/release";
import { errorMessage, type CommandContext } from "./context.js";

export async function handleCreateRelease(ctx: CommandContext): Promise<number> {
  try {
    const cfg = loadReleaseConfig(ctx.env);
    const res = await publishDeploymentRelease(cfg, ctx.releaseClients(cfg), {
      logger: (line) => ctx.log(`[release] ${line}`),
    });
    ctx.outputs.set("release_tag", res.tagName);
    ctx.outputs.set("release_url", res.release.html_url);
    return 0;
  } catch (e) {
    ctx.log(`::error::Could not create the release: ${errorMessage(e)}`);
    return 1;
  }
}
