import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validateConfig } from "../validate";

describe("validateConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-validate-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  async function writeConfig(content: string): Promise<string> {
    const file = path.join(dir, "requests.yaml");
    await fs.writeFile(file, content, "utf8");
    return file;
  }

  it("accepts a clean config", async () => {
    const file = await writeConfig("- { name: a, method: GET, url: 'http://a.test/', params: { page: 1 } }\n");

    const result = await validateConfig(file);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.templates.map((t) => t.name)).toEqual(["a"]);
  });

  it("warns about duplicates and GET defaults with no query form", async () => {
    const file = await writeConfig(
      [
        "- { name: a, method: GET, url: 'http://a.test/' }",
        "- { name: g, method: get, url: 'http://g.test/', params: { flag: true, page: 2 } }",
        "- { name: a, method: POST, url: 'http://a.test/', params: { flag: true } }",
      ].join("\n")
    );

    const result = await validateConfig(file);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Template name "a" is used 2 times; only the first is reachable by name.',
      'Template "g" param "flag" (true) cannot be sent in a GET query string.',
    ]);
  });

  it("warns about an empty config", async () => {
    const file = await writeConfig("");

    const result = await validateConfig(file);

    expect(result.warnings).toEqual(["Config contains no request templates."]);
  });

  it("reports a config that cannot be loaded", async () => {
    const file = path.join(dir, "absent.yaml");

    const result = await validateConfig(file);

    expect(result).toEqual({ valid: false, errors: [`Config file not found: ${file}`], warnings: [], templates: [] });
  });
});
