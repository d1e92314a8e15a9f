#!/usr/bin/env node
import "dotenv/config";
import { buildProgram } from "./cli.js";

try {
  await buildProgram().parseAsync(process.argv);
} catch (e) {
  console.error(`::error::${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
}
