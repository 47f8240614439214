import path from "path";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { RelayError, errorMessage } from "../errors";
import type { RequestTemplate } from "../model/template";
import { createSendRequestHandler } from "../proxy/send-request.handler";
import { indexPageContext, IndexPage } from "../render/template-loader";
import { isRecord } from "../utils/guards";
import { logger } from "../utils/logger";
import { diagnosticsRouter } from "./diagnostics";

export type AppOptions = {
  templates: readonly RequestTemplate[];
  configPath: string;
  indexPage: IndexPage;
  staticDir: string;
  timeoutMs?: number;
};

/** body-parser and friends attach an HTTP status to the errors they raise */
function clientErrorStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const status = err.status ?? err.statusCode;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(opts: AppOptions): Express {
  const { templates, configPath, indexPage, staticDir, timeoutMs } = opts;
  const configFile = path.basename(configPath);
  const app = express();

  app.disable("x-powered-by");
  app.use(express.json({ limit: "10mb" }));

  app.use("/static", express.static(staticDir));

  app.get("/", (_req, res) => {
    res.type("html").send(indexPage(indexPageContext(templates, configFile)));
  });

  app.get("/download", (_req, res, next) => {
    res.attachment(configFile);
    res.type("application/octet-stream");
    res.sendFile(path.resolve(configPath), (err?: Error) => {
      if (err) next(err);
    });
  });

  app.post("/send-request", createSendRequestHandler(templates, { timeoutMs }));

  app.use(diagnosticsRouter());

  app.use((req, res) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  // express recognises error middleware by its four parameters
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    let status: number;
    if (err instanceof RelayError) {
      status = err.status;
    } else {
      status = clientErrorStatus(err) ?? 500;
    }
    const message = errorMessage(err);

    if (status >= 500) logger.error(`${req.method} ${req.path} failed (${status}): ${message}`);
    else logger.warn(`${req.method} ${req.path} rejected (${status}): ${message}`);

    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(status).json({ error: message });
  });

  return app;
}
