import type { InputValue } from "./schema.js";

/** Trigger inputs as a flow sees them; workflow booleans arrive as "true"/"false". */
export type FlowInputs = Record<string, InputValue | undefined>;

const PLACEHOLDER = /\{\{\s*([a-zA-Z0-9_.-]+)\s*\}\}/g;
const FALSY_WORDS = new Set(["false", "0", "no", "off", "null", "undefined"]);

/** `{{name}}` becomes the input's string form; unknown names become "". */
export function interpolateString(template: string, inputs: FlowInputs): string {
  return template.replace(PLACEHOLDER, (_, name: string) => {
    const value = inputs[name];
    return value === undefined ? "" : String(value);
  });
}

export function interpolateRecord(params: Record<string, string>, inputs: FlowInputs): Record<string, string> {
  return Object.fromEntries(
    Object.entries(params).map(([key, template]): [string, string] => [key, interpolateString(template, inputs)])
  );
}

/** A step runs unless its `when` renders empty or to a falsy word. */
export function evalWhen(when: string | undefined, inputs: FlowInputs): boolean {
  if (when === undefined) return true;
  const rendered = interpolateString(when, inputs).trim().toLowerCase();
  return rendered !== "" && !FALSY_WORDS.has(rendered);
}
