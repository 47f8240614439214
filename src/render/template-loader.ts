import fs from "fs-extra";
import path from "path";
import Handlebars from "handlebars";
import type { RequestTemplate } from "../model/template";

export const INDEX_TEMPLATE_FILE = "index.html.hbs";

export type IndexPageContext = {
  title: string;
  configFile: string;
  templates: ReadonlyArray<RequestTemplate & { index: number }>;
};

export type IndexPage = (context: IndexPageContext) => string;

Handlebars.registerHelper("upper", (s: unknown) => String(s).toUpperCase());
Handlebars.registerHelper("json", (value: unknown) => JSON.stringify(value ?? {}, null, 2));

/**
 * Load and compile the index page from a template directory.
 * Expects `<templateDir>/index.html.hbs`.
 */
export async function loadIndexPage(templateDir: string): Promise<IndexPage> {
  const file = path.join(templateDir, INDEX_TEMPLATE_FILE);
  if (!(await fs.pathExists(file))) {
    throw new Error(`Index template not found: ${file}`);
  }
  const source = await fs.readFile(file, "utf8");
  return compileIndexPage(source);
}

export function compileIndexPage(source: string): IndexPage {
  const compiled = Handlebars.compile<IndexPageContext>(source);
  return (context) => compiled(context);
}

export function indexPageContext(templates: readonly RequestTemplate[], configFile: string): IndexPageContext {
  return {
    title: "Request templates",
    configFile,
    templates: templates.map((t, index) => ({ ...t, index })),
  };
}
