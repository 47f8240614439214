import fs from "fs-extra";
import yaml from "js-yaml";
import { ConfigLoadError, errorMessage } from "../errors";
import { isHttpMethod, RequestTemplate, StaticParamValue } from "../model/template";
import { isRecord } from "../utils/guards";
import { logger } from "../utils/logger";

/**
 * Load request templates from a YAML file.
 * The file holds a sequence of `{ name, method, url, params?, download? }` entries.
 * Duplicate names are reported but kept, in file order.
 * @param configPath path to the YAML file
 */
export async function loadRequestTemplates(configPath: string): Promise<readonly RequestTemplate[]> {
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigLoadError(`Config file not found: ${configPath}`);
  }

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf8");
  } catch (err: unknown) {
    throw new ConfigLoadError(`Failed to read config ${configPath}: ${errorMessage(err)}`);
  }

  const templates = parseRequestTemplates(content, configPath);

  for (const name of findDuplicateNames(templates)) {
    logger.warn(`Duplicate template name "${name}" in ${configPath}; lookups by name use the first entry.`);
  }
  logger.info(`Loaded ${templates.length} request template(s) from ${configPath}`);
  return templates;
}

/**
 * Parse YAML text into a frozen template list.
 * @param source used in error messages only
 */
export function parseRequestTemplates(content: string, source = "config"): readonly RequestTemplate[] {
  let doc: unknown;
  try {
    doc = yaml.load(content, { filename: source });
  } catch (err: unknown) {
    throw new ConfigLoadError(`Failed to parse ${source}: ${errorMessage(err)}`);
  }

  // an empty file is an empty list
  if (doc === undefined || doc === null) return Object.freeze([]);
  if (!Array.isArray(doc)) {
    throw new ConfigLoadError(`${source}: expected a list of request templates at the top level`);
  }

  const templates = doc.map((entry, index) => Object.freeze(toTemplate(entry, `${source}[${index}]`)));
  return Object.freeze(templates);
}

/** Names used by more than one template, each reported once, in order of first repetition. */
export function findDuplicateNames(templates: readonly RequestTemplate[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const t of templates) {
    if (seen.has(t.name)) {
      if (!duplicates.includes(t.name)) duplicates.push(t.name);
    } else {
      seen.add(t.name);
    }
  }
  return duplicates;
}

function toTemplate(entry: unknown, where: string): RequestTemplate {
  if (!isRecord(entry)) {
    throw new ConfigLoadError(`${where}: expected a mapping with name, method and url`);
  }

  const { name, method, url, params, download } = entry;

  if (typeof name !== "string" || name.trim() === "") {
    throw new ConfigLoadError(`${where}.name: expected a non-empty string`);
  }
  if (typeof method !== "string") {
    throw new ConfigLoadError(`${where}.method: expected a string`);
  }
  const upper = method.trim().toUpperCase();
  if (!isHttpMethod(upper)) {
    throw new ConfigLoadError(`${where}.method: unsupported HTTP method "${method}"`);
  }
  if (typeof url !== "string") {
    throw new ConfigLoadError(`${where}.url: expected a string`);
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigLoadError(`${where}.url: "${url}" is not an absolute URL`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigLoadError(`${where}.url: only http and https URLs are supported`);
  }
  if (download !== undefined && download !== null && typeof download !== "boolean") {
    throw new ConfigLoadError(`${where}.download: expected a boolean`);
  }

  return {
    name,
    method: upper,
    url,
    params: toStaticParams(params, `${where}.params`),
    download: download === true,
  };
}

function toStaticParams(params: unknown, where: string): Record<string, StaticParamValue> {
  if (params === undefined || params === null) return {};
  if (!isRecord(params)) {
    throw new ConfigLoadError(`${where}: expected a mapping of parameter names to values`);
  }

  const entries = Object.entries(params).map(([key, value]): [string, StaticParamValue] => {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      return [key, value];
    }
    // `key:` with nothing after it in YAML
    if (value === null) return [key, ""];
    throw new ConfigLoadError(`${where}.${key}: expected a string, number or boolean`);
  });
  return Object.freeze(Object.fromEntries(entries));
}
