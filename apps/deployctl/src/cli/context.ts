import { createOutputSink, type OutputSink } from "@deploy-wrapper/artifacts";
import { createReleaseClients, type ReleaseClients, type ReleaseConfig } from "@deploy-wrapper/release";

export type CommandContext = {
  env: Record<string, string | undefined>;
  log: (line: string) => void;
  outputs: OutputSink;
  releaseClients: (cfg: ReleaseConfig) => ReleaseClients;
};

export function defaultContext(): CommandContext {
  return {
    env: process.env,
    log: (line) => console.log(line),
    outputs: createOutputSink(process.env.GITHUB_OUTPUT),
    releaseClients: (cfg) => createReleaseClients({ token: cfg.token, baseUrl: cfg.apiUrl }),
  };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
