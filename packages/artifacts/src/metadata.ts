import fs from "node:fs/promises";
import path from "node:path";

export type ExportMetadata = {
  artifact_name: string;
  artifact_path: string;
  artifact_dir: string;
  manifest_path: string;
  raw_response_path: string;
  deployment_uuid: string;
  deployment_status: string;
  database_scripts: unknown;
  plugins_zip: string;
  customization_file: string;
  customization_template: string;
  downloaded_files: unknown;
  icf_template_status: string;
  icf_template_file: string;
  icf_overrides_present: boolean;
  database_scripts_present: boolean;
};

export const METADATA_FILE = "export-metadata.json";

type Env = Record<string, string | undefined>;
const get = (env: Env, name: string, fallback = "") => env[name] || fallback;

/** Truthiness as the workflow reads it: empty arrays, objects and strings are absent. */
export function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value && typeof value === "object") return Object.keys(value).length > 0;
  return Boolean(value);
}

export function parseJsonString(value: string, fallback: unknown): unknown {
  if (!value) return fallback;
  try {
    return JSON.parse(value);
  } catch {
    return fallback;
  }
}

export function decodeOverridesPresent(encoded: string): boolean {
  if (!encoded) return false;
  const decoded = parseJsonString(Buffer.from(encoded, "base64").toString("utf8"), null);
  return isPresent(decoded);
}

/** DEST joined with the basename of the export step's output, or with the default name. */
export function resolvedPath(destDir: string, outputValue: string, fallbackName: string): string {
  if (!outputValue) return path.join(destDir, fallbackName);
  return path.join(destDir, path.basename(outputValue));
}

export function buildExportMetadata(env: Env): ExportMetadata {
  const destDir = path.join(get(env, "DEST"));
  const artifactName = get(env, "ARTIFACT_NAME");
  const artifactPathOutput = get(env, "ARTIFACT_PATH");
  const zipName = artifactPathOutput ? path.basename(artifactPathOutput) : `${artifactName}.zip`;

  const databaseScripts = parseJsonString(get(env, "DATABASE_SCRIPTS_JSON"), []);
  const downloadedFiles = parseJsonString(get(env, "DOWNLOADED_FILES_JSON"), []);

  return {
    artifact_name: artifactName,
    artifact_path: path.join(destDir, zipName),
    artifact_dir: destDir,
    manifest_path: resolvedPath(destDir, get(env, "MANIFEST_PATH"), "export-manifest.json"),
    raw_response_path: resolvedPath(destDir, get(env, "RAW_RESPONSE_PATH"), "export-response.json"),
    deployment_uuid: get(env, "DEPLOYMENT_UUID"),
    deployment_status: get(env, "DEPLOYMENT_STATUS"),
    database_scripts: databaseScripts,
    plugins_zip: get(env, "PLUGINS_ZIP"),
    customization_file: get(env, "CUSTOMIZATION_FILE"),
    customization_template: get(env, "CUSTOMIZATION_TEMPLATE"),
    downloaded_files: downloadedFiles,
    icf_template_status: get(env, "ICF_TEMPLATE_STATUS", "missing"),
    icf_template_file: get(env, "ICF_TEMPLATE_FILE"),
    icf_overrides_present: decodeOverridesPresent(get(env, "ICF_OVERRIDES_JSON_B64")),
    database_scripts_present: isPresent(databaseScripts),
  };
}

/** Write `<DEST>/export-metadata.json` and return its path. */
export async function writeExportMetadata(env: Env): Promise<string> {
  const data = buildExportMetadata(env);
  await fs.mkdir(data.artifact_dir, { recursive: true });
  const file = path.join(data.artifact_dir, METADATA_FILE);
  await fs.writeFile(file, JSON.stringify(data, null, 2), "utf8");
  return file;
}
