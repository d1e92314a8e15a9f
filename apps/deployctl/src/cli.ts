import { Command } from "commander";
import { defaultContext, type CommandContext } from "./cli/context.js";
import { handleParseOverrides, type ParseOverridesOptions } from "./cli/overrides-commands.js";
import { handlePrepareIcfTemplate, handleWriteExportMetadata } from "./cli/artifact-commands.js";
import { handleCreateRelease } from "./cli/release-commands.js";
import { handlePlan, type PlanOptions } from "./cli/plan-commands.js";

const collect = (value: string, previous: string[]) => [...previous, value];

/** Build the CLI; every action stores its exit code on process.exitCode. */
export function buildProgram(ctx: CommandContext = defaultContext()): Command {
  const program = new Command();
  const finish = (code: number) => {
    process.exitCode = code;
  };

  program
    .name("deployctl")
    .description("Helpers the deployment workflows run between Core actions")
    .version("0.1.0");

  program
    .command("parse-overrides")
    .description("Parse a key=value override secret into the mapping for the customization build")
    .option("-f, --file <path>", "Read overrides from a file instead of the environment")
    .option("-e, --env <name>", "Environment variable holding the overrides", "OVERRIDES")
    .option("-o, --out <path>", "Write the ordered mapping as JSON")
    .option("--strict", "Fail on repeated keys instead of letting the last one win")
    .action(async (options: ParseOverridesOptions) => {
      finish(await handleParseOverrides(ctx, options));
    });

  program
    .command("prepare-icf-template")
    .description("Find the customization template in ARTIFACT_DIR and publish suggested overrides")
    .action(async () => {
      finish(await handlePrepareIcfTemplate(ctx));
    });

  program
    .command("write-export-metadata")
    .description("Write export-metadata.json into DEST from the export step outputs")
    .action(async () => {
      finish(await handleWriteExportMetadata(ctx));
    });

  program
    .command("create-release")
    .description("Create or update the GitHub release summarising this deployment run")
    .action(async () => {
      finish(await handleCreateRelease(ctx));
    });

  program
    .command("plan")
    .description("Compile a flow (A, B or C) into its ordered Core action steps")
    .requiredOption("--flow <id>", "Flow to run: A, B or C")
    .option("-i, --input <key=value>", "Flow input (repeatable)", collect, [])
    .option("--flows-dir <dir>", "Directory holding the flow catalog")
    .action(async (options: PlanOptions) => {
      finish(await handlePlan(ctx, options));
    });

  return program;
}
