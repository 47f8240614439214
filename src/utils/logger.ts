import path from "path";
import { format } from "util";
import type { WriteStream } from "fs";
import fs from "fs-extra";
import { formatDateTime } from "./time";

type Level = "debug" | "info" | "warn" | "error";

let fileSink: WriteStream | undefined;

function emit(level: Level, args: unknown[]) {
  const prefix = `${formatDateTime(new Date(), true)} [${level}]`;
  switch (level) {
    case "debug":
      console.debug(prefix, ...args);
      break;
    case "info":
      console.log(prefix, ...args);
      break;
    case "warn":
      console.warn(prefix, ...args);
      break;
    case "error":
      console.error(prefix, ...args);
      break;
  }
  // a single stream: writes from concurrent requests are queued in order
  fileSink?.write(`${prefix} ${format(...args)}\n`);
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (process.env.DEBUG) emit("debug", args);
  },
  info: (...args: unknown[]) => emit("info", args),
  warn: (...args: unknown[]) => emit("warn", args),
  error: (...args: unknown[]) => emit("error", args),
};

/**
 * Mirror every log line into `filePath` (appending). Passing undefined
 * detaches the current file. The file is never rotated here; with
 * logrotate use `copytruncate`, which an append-mode stream follows.
 */
export async function setLogFile(filePath: string | undefined): Promise<void> {
  await closeLogFile();
  if (!filePath) return;

  await fs.ensureDir(path.dirname(path.resolve(filePath)));
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err) => {
    if (fileSink === stream) fileSink = undefined;
    console.error("[error]", `Log file ${filePath} disabled: ${err.message}`);
  });
  fileSink = stream;
}

export function closeLogFile(): Promise<void> {
  const stream = fileSink;
  fileSink = undefined;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}
