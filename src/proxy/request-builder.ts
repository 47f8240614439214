import { RequestBuildError, errorMessage } from "../errors";
import { isHttpMethod, HttpMethod, JsonValue } from "../model/template";
import { stringifyQueryParam } from "./params";

export type OutboundRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
};

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "content-type": "application/json",
});

/**
 * Describe the outbound call for a template. `verb` is case-insensitive.
 * - GET with parameters: parameters go into the query string, no body.
 * - anything else (GET without parameters included): url unchanged, `body` as payload.
 */
export function buildRequest(
  verb: string,
  url: string,
  body: Buffer | undefined,
  queryParams: Record<string, JsonValue> | undefined
): OutboundRequest {
  const method = verb.trim().toUpperCase();
  if (!isHttpMethod(method)) {
    throw new RequestBuildError(`Unsupported HTTP method "${verb}"`);
  }

  let target: URL;
  try {
    target = new URL(url);
  } catch (err: unknown) {
    throw new RequestBuildError(`Invalid upstream URL "${url}": ${errorMessage(err)}`);
  }

  const headers = { ...DEFAULT_HEADERS };

  if (method === "GET" && queryParams && Object.keys(queryParams).length > 0) {
    for (const [key, value] of Object.entries(queryParams)) {
      target.searchParams.set(key, stringifyQueryParam(key, value));
    }
    return { method, url: target.toString(), headers };
  }

  return { method, url, headers, body: body ?? Buffer.alloc(0) };
}
