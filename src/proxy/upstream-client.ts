import type { IncomingHttpHeaders } from "http";
import { request } from "undici";
import type { Dispatcher } from "undici";
import { UpstreamBodyReadError, UpstreamTransportError, errorMessage } from "../errors";
import type { OutboundRequest } from "./request-builder";

export const DEFAULT_TIMEOUT_MS = 30_000;

export type UpstreamResponse = {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
};

export type ExecuteOptions = {
  timeoutMs?: number;
};

/**
 * Perform the outbound call and read the whole response body.
 * Redirects are not followed; the upstream status is returned as is.
 */
export async function executeRequest(
  outbound: OutboundRequest,
  opts: ExecuteOptions = {}
): Promise<UpstreamResponse> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Dispatcher.ResponseData;
  try {
    response = await request(outbound.url, {
      method: outbound.method,
      headers: outbound.headers,
      body: outbound.body,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });
  } catch (err: unknown) {
    throw new UpstreamTransportError(describeTransportError(err));
  }

  const { body } = response;
  try {
    const bytes = Buffer.from(await body.arrayBuffer());
    return { statusCode: response.statusCode, headers: response.headers, body: bytes };
  } catch (err: unknown) {
    throw new UpstreamBodyReadError(`Failed to read upstream response body: ${errorMessage(err)}`);
  } finally {
    // releases the connection when reading stopped early
    if (!body.destroyed) body.destroy();
  }
}

function describeTransportError(err: unknown): string {
  // dual-stack connects fail with an AggregateError whose own message is empty
  if (err instanceof AggregateError && !err.message && err.errors.length > 0) {
    return err.errors.map((e: unknown) => errorMessage(e)).join("; ");
  }
  return errorMessage(err);
}
