#!/usr/bin/env node
import { Command } from "commander";
import { resolveServeSettings, ServeFlags } from "./config/settings";
import { errorMessage } from "./errors";
import { logger } from "./utils/logger";

const program = new Command();

program
  .name("template-relay")
  .description("Serve named HTTP request templates from a YAML file and relay their responses")
  .version("0.1.0");

program
  .command("serve", { isDefault: true })
  .description("Start the web UI and the /send-request relay")
  .option("-c, --config <path>", "Request template file (yaml). Env: RELAY_CONFIG")
  .option("-p, --port <port>", "Port to listen on. Env: PORT")
  .option("-H, --host <host>", "Interface to bind. Env: HOST")
  .option("-t, --templates <dir>", "Directory holding index.html.hbs (optional)")
  .option("--static <dir>", "Directory served under /static (optional)")
  .option("--timeout <ms>", "Upstream timeout in milliseconds. Env: RELAY_TIMEOUT_MS")
  .option("--log-file <path>", "Also append log lines to this file. Env: LOG_FILE")
  .action(async (opts: ServeFlags) => {
    try {
      const settings = resolveServeSettings(opts);
      const { startServer } = await import("./commands/serve");
      await startServer(settings);
    } catch (err: unknown) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Check a request template file and list its templates")
  .option("-c, --config <path>", "Request template file (yaml). Env: RELAY_CONFIG")
  .action(async (opts: Pick<ServeFlags, "config">) => {
    const { validateConfig } = await import("./commands/validate");
    try {
      const { configPath } = resolveServeSettings({ config: opts.config });
      const result = await validateConfig(configPath);
      if (!result.valid) process.exit(2);
    } catch (err: unknown) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
