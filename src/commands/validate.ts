// src/commands/validate.ts
import { errorMessage } from "../errors";
import type { RequestTemplate } from "../model/template";
import { findDuplicateNames, loadRequestTemplates } from "../parser/config.parser";
import { classifyParam } from "../proxy/params";
import { logger } from "../utils/logger";

export type ValidationResult = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  templates: readonly RequestTemplate[];
};

/**
 * Validate a request-template config file.
 * - Loads and parses it the same way `serve` does.
 * - Extra checks that do not stop the server from starting:
 *   - duplicate names (lookups by name use the first entry)
 *   - an empty template list
 *   - GET defaults that have no query-string form (booleans, fractional numbers)
 */
export async function validateConfig(configPath: string): Promise<ValidationResult> {
  const warnings: string[] = [];

  let templates: readonly RequestTemplate[];
  try {
    templates = await loadRequestTemplates(configPath);
  } catch (err: unknown) {
    const msg = errorMessage(err);
    logger.error("Config loading failed:", msg);
    return { valid: false, errors: [msg], warnings, templates: [] };
  }

  if (templates.length === 0) {
    warnings.push("Config contains no request templates.");
  }

  for (const name of findDuplicateNames(templates)) {
    const count = templates.filter((t) => t.name === name).length;
    warnings.push(`Template name "${name}" is used ${count} times; only the first is reachable by name.`);
  }

  for (const t of templates) {
    if (t.method !== "GET") continue;
    for (const [key, value] of Object.entries(t.params)) {
      if (classifyParam(value).kind === "other") {
        warnings.push(`Template "${t.name}" param "${key}" (${String(value)}) cannot be sent in a GET query string.`);
      }
    }
  }

  templates.forEach((t, i) => logger.info(`  [${i}] ${t.method} ${t.name} -> ${t.url}`));

  if (warnings.length) {
    logger.warn("Validation produced warnings:");
    for (const w of warnings) logger.warn("  - " + w);
  }

  return { valid: true, errors: [], warnings, templates };
}
