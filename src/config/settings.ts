import path from "path";
import { DEFAULT_TIMEOUT_MS } from "../proxy/upstream-client";

export const DEFAULT_CONFIG_PATH = "./config/requests.yaml";
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = "0.0.0.0";

/** Raw `serve` flags as commander hands them over (all strings). */
export type ServeFlags = {
  config?: string;
  port?: string;
  host?: string;
  templates?: string;
  static?: string;
  timeout?: string;
  logFile?: string;
};

export type ServeSettings = {
  configPath: string;
  port: number;
  host: string;
  templateDir?: string; // unset: resolved at startup (cwd, then bundled)
  staticDir?: string;
  timeoutMs: number;
  logFile?: string;
};

type Env = Record<string, string | undefined>;

function parseInteger(raw: string, setting: string, min: number, max: number): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${setting} "${raw}": expected an integer between ${min} and ${max}`);
  }
  return value;
}

/**
 * Merge CLI flags over environment variables over defaults.
 */
export function resolveServeSettings(flags: ServeFlags, env: Env = process.env): ServeSettings {
  const configPath = path.resolve(flags.config ?? env.RELAY_CONFIG ?? DEFAULT_CONFIG_PATH);

  const rawPort = flags.port ?? env.PORT;
  const port = rawPort === undefined ? DEFAULT_PORT : parseInteger(rawPort, "port", 0, 65535);

  const rawTimeout = flags.timeout ?? env.RELAY_TIMEOUT_MS;
  const timeoutMs =
    rawTimeout === undefined ? DEFAULT_TIMEOUT_MS : parseInteger(rawTimeout, "timeout", 1, 24 * 60 * 60 * 1000);

  return {
    configPath,
    port,
    host: flags.host ?? env.HOST ?? DEFAULT_HOST,
    templateDir: flags.templates,
    staticDir: flags.static,
    timeoutMs,
    logFile: flags.logFile ?? env.LOG_FILE,
  };
}
