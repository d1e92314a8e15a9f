import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  compareTemplates,
  createOutputSink,
  extractionDir,
  findTemplate,
  isZipFile,
  prepareIcfTemplate,
} from "../src/index.js";

const b64 = (s: string) => Buffer.from(s, "utf8").toString("base64");

let dir: string;
let lines: string[];
const log = (line: string) => { lines.push(line); };

async function put(rel: string, content: string | Buffer) {
  const full = path.join(dir, rel);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content);
  return full;
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

function crc32(data: Buffer): number {
  let c = 0xffffffff;
  for (const byte of data) c = CRC_TABLE[(c ^ byte) & 0xff] ^ (c >>> 8);
  return (c ^ 0xffffffff) >>> 0;
}

/** Minimal stored (uncompressed) zip archive. */
function storedZip(files: Record<string, string>): Buffer {
  const locals: Buffer[] = [];
  const central: Buffer[] = [];
  let offset = 0;
  for (const [name, text] of Object.entries(files)) {
    const nameBuf = Buffer.from(name, "utf8");
    const data = Buffer.from(text, "utf8");
    const crc = crc32(data);
    const date = ((2026 - 1980) << 9) | (1 << 5) | 1;

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(date, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(nameBuf.length, 26);

    const entry = Buffer.alloc(46);
    entry.writeUInt32LE(0x02014b50, 0);
    entry.writeUInt16LE(20, 4);
    entry.writeUInt16LE(20, 6);
    entry.writeUInt16LE(date, 14);
    entry.writeUInt32LE(crc, 16);
    entry.writeUInt32LE(data.length, 20);
    entry.writeUInt32LE(data.length, 24);
    entry.writeUInt16LE(nameBuf.length, 28);
    entry.writeUInt32LE(offset, 42);

    locals.push(local, nameBuf, data);
    central.push(entry, nameBuf);
    offset += local.length + nameBuf.length + data.length;
  }
  const centralBuf = Buffer.concat(central);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(Object.keys(files).length, 8);
  end.writeUInt16LE(Object.keys(files).length, 10);
  end.writeUInt32LE(centralBuf.length, 12);
  end.writeUInt32LE(offset, 16);
  return Buffer.concat([...locals, centralBuf, end]);
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "icf-"));
  lines = [];
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("template selection", () => {
  it("orders by suffix, then name length, then name", () => {
    const files = ["/x/b.conf", "/x/long-name.txt", "/x/z.properties", "/x/a.txt", "/x/aa.properties"];
    expect([...files].sort(compareTemplates)).toEqual([
      "/x/z.properties",
      "/x/aa.properties",
      "/x/a.txt",
      "/x/long-name.txt",
      "/x/b.conf",
    ]);
  });

  it("ignores binary files and unsupported suffixes", async () => {
    await put("customization/binary.properties", Buffer.from([0xff, 0xfe, 0x00, 0x41]));
    await put("customization/readme.md", "a=b");
    const chosen = await put("nested/deep/settings.cfg", "a=b");
    expect(await findTemplate(dir, log)).toBe(chosen);
  });

  it("returns null when nothing qualifies", async () => {
    await put("manifest.json", "{}");
    expect(await findTemplate(dir, log)).toBeNull();
  });

  it("detects zip archives by signature", async () => {
    const zip = await put("export.zip", Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]));
    const notZip = await put("export.txt", "PK but not really");
    expect(await isZipFile(zip)).toBe(true);
    expect(await isZipFile(notZip)).toBe(false);
  });

  it("unpacks beside the archive", () => {
    expect(extractionDir("/a/export.zip")).toBe("/a/export");
    expect(extractionDir("/a/export")).toBe("/a/export_extracted");
  });
});

describe("prepareIcfTemplate", () => {
  it("publishes the template and suggested overrides", async () => {
    const content = "## Customization\n## ------\n#connectedSystem.abc.baseUrl=\ncontent.def.VALUE = 10\n";
    const template = await put("customization-template/app.properties", content);
    await put("notes.txt", "x=y");
    const outputs = createOutputSink(undefined);

    const result = await prepareIcfTemplate({ artifactDir: dir, outputs, logger: log });

    const overrides = { "connectedSystem.abc.baseUrl": "", "content.def.VALUE": "10" };
    expect(result).toEqual({ status: "ready", sourcePath: template, overrides });
    const json = b64(JSON.stringify(overrides, null, 2));
    expect(outputs.values).toEqual({
      icf_template_path: template,
      icf_template_source: template,
      icf_template_file: "app.properties",
      icf_template_content_b64: b64(content),
      icf_overrides_json_b64: json,
      icf_overrides_qa_json_b64: json,
      icf_overrides_prod_json_b64: json,
      icf_template_status: "ready",
    });
  });

  it("marks a template without pairs as empty", async () => {
    await put("customization/app.properties", "## ----\n# nothing to override\n");
    const outputs = createOutputSink(undefined);
    const result = await prepareIcfTemplate({ artifactDir: dir, outputs, logger: log });
    expect(result.status).toBe("empty");
    expect(outputs.values.icf_template_status).toBe("empty");
    expect(outputs.values.icf_overrides_json_b64).toBe(b64("{}"));
  });

  it("falls back to the configured template", async () => {
    const fallback = await put("fallback/default.properties", "k=v\n");
    await fs.mkdir(path.join(dir, "artifact"));
    const outputs = createOutputSink(undefined);
    const result = await prepareIcfTemplate({
      artifactDir: path.join(dir, "artifact"),
      fallbackTemplatePath: fallback,
      outputs,
      logger: log,
    });
    expect(result).toEqual({ status: "fallback", sourcePath: fallback, overrides: { k: "v" } });
    expect(outputs.values.icf_template_file).toBe("default.properties");
  });

  it("extracts a zipped export once and reads the nested template", async () => {
    const zip = await put("export/bundle.zip", storedZip({ "customization-template/app.properties": "k=v\n" }));
    const artifactDir = path.join(dir, "export");
    const extracted = path.join(artifactDir, "bundle");
    const template = path.join(extracted, "customization-template", "app.properties");

    const first = await prepareIcfTemplate({ artifactDir, outputs: createOutputSink(undefined), logger: log });
    expect(first).toEqual({ status: "ready", sourcePath: template, overrides: { k: "v" } });
    expect(lines).toContain(`[icf] extracting ZIP ${zip} into ${extracted}`);

    await fs.writeFile(template, "k=edited\n");
    lines = [];
    const outputs = createOutputSink(undefined);
    const second = await prepareIcfTemplate({ artifactDir, outputs, logger: log });
    expect(second).toEqual({ status: "ready", sourcePath: template, overrides: { k: "edited" } });
    expect(outputs.values.icf_template_path).toBe(template);
    expect(lines.some((line) => line.startsWith("[icf] extracting ZIP"))).toBe(false);
  });

  it("only reports the status when no template exists", async () => {
    const outputs = createOutputSink(undefined);
    const result = await prepareIcfTemplate({ outputs, logger: log });
    expect(result).toEqual({ status: "missing", overrides: {} });
    expect(outputs.values).toEqual({ icf_template_status: "missing" });
    expect(lines[0]).toBe("::notice::ARTIFACT_DIR is not set; skipping the customization template search.");
  });
});
