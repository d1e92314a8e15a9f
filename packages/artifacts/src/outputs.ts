import fs from "node:fs";
import { randomUUID } from "node:crypto";

/** Step outputs written to the file named by GITHUB_OUTPUT. */
export type OutputSink = {
  file?: string;
  values: Record<string, string>;
  set(name: string, value: string | null | undefined): void;
};

export function formatOutput(name: string, value: string): string {
  if (!value.includes("\n")) return `${name}=${value}\n`;
  const delimiter = `ghadelimiter_${randomUUID()}`;
  return `${name}<<${delimiter}\n${value}\n${delimiter}\n`;
}

export function createOutputSink(file: string | undefined = process.env.GITHUB_OUTPUT): OutputSink {
  const values: Record<string, string> = {};
  return {
    file,
    values,
    set(name, value) {
      if (!value) return;
      values[name] = value;
      if (!file) return;
      fs.appendFileSync(file, formatOutput(name, value), "utf8");
    },
  };
}
