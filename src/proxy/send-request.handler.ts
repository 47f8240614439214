import type { NextFunction, Request, RequestHandler, Response } from "express";
import { MalformedRequestError, TemplateNotFoundError } from "../errors";
import type { Invocation, JsonValue, RequestTemplate } from "../model/template";
import { isRecord } from "../utils/guards";
import { logger } from "../utils/logger";
import { buildRequest } from "./request-builder";
import { executeRequest, UpstreamResponse } from "./upstream-client";

// never forwarded: they describe the upstream connection, not the payload
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
]);

// recomputed by Node from the bytes actually written (a HEAD reply announces a length it never sends)
const RECOMPUTED_HEADERS = new Set(["content-length"]);

export type SendRequestOptions = {
  timeoutMs?: number;
};

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isRecord(value)) return Object.values(value).every(isJsonValue);
  return false;
}

/**
 * Read `{ name | id, params? }` from a decoded JSON body.
 */
export function parseInvocation(body: unknown): Invocation {
  if (!isRecord(body)) {
    throw new MalformedRequestError("Request body must be a JSON object");
  }

  const { name, id, params } = body;

  let ref: Invocation["ref"];
  if (name !== undefined && id !== undefined) {
    throw new MalformedRequestError('Specify either "name" or "id", not both');
  } else if (typeof name === "string") {
    ref = { kind: "name", name };
  } else if (typeof id === "number" && Number.isInteger(id)) {
    ref = { kind: "index", index: id };
  } else if (name !== undefined) {
    throw new MalformedRequestError('"name" must be a string');
  } else if (id !== undefined) {
    throw new MalformedRequestError('"id" must be an integer');
  } else {
    throw new MalformedRequestError('Missing template "name" or "id"');
  }

  if (params === undefined || params === null) {
    return { ref, params: {} };
  }
  if (!isRecord(params)) {
    throw new MalformedRequestError('"params" must be a JSON object');
  }
  const entries = Object.entries(params).map(([key, value]): [string, JsonValue] => {
    if (!isJsonValue(value)) {
      throw new MalformedRequestError(`Parameter "${key}" is not a JSON value`);
    }
    return [key, value];
  });
  // own properties only: a "__proto__" key stays a plain parameter
  return { ref, params: Object.fromEntries(entries) };
}

/**
 * Find the template an invocation refers to. With duplicate names the first entry wins.
 */
export function resolveTemplate(templates: readonly RequestTemplate[], ref: Invocation["ref"]): RequestTemplate {
  if (ref.kind === "index") {
    const template = templates[ref.index];
    if (ref.index < 0 || template === undefined) {
      throw new TemplateNotFoundError(`No request template at index ${ref.index} (have ${templates.length})`);
    }
    return template;
  }

  const template = templates.find((t) => t.name === ref.name);
  if (!template) {
    throw new TemplateNotFoundError(`No request template named "${ref.name}"`);
  }
  return template;
}

/** Copy upstream status, headers and body bytes onto the outbound response. */
export function relayResponse(upstream: UpstreamResponse, res: Response): void {
  res.status(upstream.statusCode);
  for (const [key, value] of Object.entries(upstream.headers)) {
    const lower = key.toLowerCase();
    if (value === undefined || HOP_BY_HOP_HEADERS.has(lower) || RECOMPUTED_HEADERS.has(lower)) continue;
    res.setHeader(key, value);
  }
  // end() rather than send(): express would add its own ETag / Content-Type
  res.end(upstream.body);
}

export function createSendRequestHandler(
  templates: readonly RequestTemplate[],
  opts: SendRequestOptions = {}
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const invocation = parseInvocation(req.body);
      const template = resolveTemplate(templates, invocation.ref);

      const payload = Buffer.from(JSON.stringify(invocation.params), "utf8");
      const outbound = buildRequest(template.method, template.url, payload, invocation.params);

      const started = Date.now();
      const upstream = await executeRequest(outbound, { timeoutMs: opts.timeoutMs });
      logger.info(
        `send-request "${template.name}": ${outbound.method} ${outbound.url} -> ${upstream.statusCode} ` +
          `(${upstream.body.length} bytes, ${Date.now() - started} ms)`
      );

      relayResponse(upstream, res);
    } catch (err: unknown) {
      next(err);
    }
  };
}
