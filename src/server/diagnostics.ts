import { Router } from "express";
import { MalformedRequestError } from "../errors";
import { isRecord } from "../utils/guards";
import { formatDateTime } from "../utils/time";

export type PostJsonEcho = {
  hello: string;
  value2: number;
  value3: string;
};

/**
 * Validate a `/post_json` body. Absent fields take their zero values.
 */
export function parsePostJson(body: unknown, now: Date = new Date()): PostJsonEcho {
  if (!isRecord(body)) {
    throw new MalformedRequestError("Request body must be a JSON object");
  }
  const { value2 = 0, value3 = "" } = body;
  if (typeof value2 !== "number" || !Number.isInteger(value2)) {
    throw new MalformedRequestError('"value2" must be an integer');
  }
  if (typeof value3 !== "string") {
    throw new MalformedRequestError('"value3" must be a string');
  }
  return { hello: formatDateTime(now), value2, value3 };
}

/** Fixed endpoints used to check that the server (or a template pointing at it) responds. */
export function diagnosticsRouter(): Router {
  const router = Router();

  router.get("/hello", (_req, res) => {
    res.json("hello");
  });

  router.get("/hello_json", (_req, res) => {
    res.json({ hello: formatDateTime(new Date()) });
  });

  router.post("/post_json", (req, res) => {
    res.json(parsePostJson(req.body));
  });

  return router;
}
