import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, describe, expect, it, vi } from "vitest";
import { closeLogFile, logger, setLogFile } from "../logger";

const PREFIX = (level: string) => new RegExp(`^\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3} \\[${level}\\]$`);

describe("logger", () => {
  afterEach(async () => {
    await closeLogFile();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("prefixes console output with a timestamp and level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.info("loaded", 3);
    logger.error("failed");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(PREFIX("info"));
    expect(log.mock.calls[0].slice(1)).toEqual(["loaded", 3]);
    expect(error.mock.calls[0][0]).toMatch(PREFIX("error"));
    expect(error.mock.calls[0].slice(1)).toEqual(["failed"]);
  });

  it("prints debug lines only when DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    vi.stubEnv("DEBUG", "");
    logger.debug("hidden");
    vi.stubEnv("DEBUG", "1");
    logger.debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0].slice(1)).toEqual(["shown"]);
  });

  it("appends formatted lines to the log file", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-log-"));
    const file = path.join(dir, "logs", "relay.log");

    await setLogFile(file);
    logger.warn("disk", { a: 1 });
    logger.info("second");
    await closeLogFile();
    logger.info("not written");

    const lines = (await fs.readFile(file, "utf8")).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} \[warn\] disk \{ a: 1 \}$/);
    expect(lines[1]).toMatch(/ \[info\] second$/);
    expect(lines[2]).toBe("");
    await fs.remove(dir);
  });

  it("keeps what is already in the log file and writes after it", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-log-"));
    const file = path.join(dir, "relay.log");
    await fs.writeFile(file, "earlier run\n", "utf8");

    await setLogFile(file);
    logger.info("restarted");
    await closeLogFile();

    const lines = (await fs.readFile(file, "utf8")).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("earlier run");
    expect(lines[1]).toMatch(/ \[info\] restarted$/);
    await fs.remove(dir);
  });
});
