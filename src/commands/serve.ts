import type { Server } from "http";
import type { ServeSettings } from "../config/settings";
import { loadRequestTemplates } from "../parser/config.parser";
import { loadIndexPage } from "../render/template-loader";
import { createApp } from "../server/app";
import { resolveAssetDir } from "../utils/file";
import { logger, setLogFile } from "../utils/logger";

/**
 * Load templates and start listening. Rejects when the config cannot be loaded
 * or the socket cannot be bound; the caller decides whether that is fatal.
 */
export async function startServer(settings: ServeSettings): Promise<Server> {
  await setLogFile(settings.logFile);

  const templates = await loadRequestTemplates(settings.configPath);
  const templateDir = await resolveAssetDir("templates", settings.templateDir);
  const staticDir = await resolveAssetDir("static", settings.staticDir);
  logger.debug(`Assets: templates=${templateDir}, static=${staticDir}`);

  const app = createApp({
    templates,
    configPath: settings.configPath,
    indexPage: await loadIndexPage(templateDir),
    staticDir,
    timeoutMs: settings.timeoutMs,
  });

  return await new Promise<Server>((resolve, reject) => {
    const server = app.listen(settings.port, settings.host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const addr = server.address();
      const where = typeof addr === "object" && addr ? `${addr.address}:${addr.port}` : String(addr);
      logger.info(`Listening on ${where} (${templates.length} templates, upstream timeout ${settings.timeoutMs} ms)`);
      resolve(server);
    });
  });
}
