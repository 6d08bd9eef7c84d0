/**
 * serve command - starts the vault server
 */

import { resolve } from "node:path";
import kleur from "kleur";
import { startServer, type RunningServer } from "../../index.js";
import {
  readConfigFile,
  resolveConfig,
  type ConfigOverrides,
  type ResolvedConfig,
} from "../../config.js";
import { createLogger } from "../../logger.js";
import { VaultError } from "../../errors.js";

interface ServeOptions {
  config: string;
  port?: string;
  bind?: string;
  db?: string;
}

const GRACE_PERIOD_MS = 30_000;

/**
 * Known startup failures end the process with a one-line message
 */
function failStartup(error: unknown): never {
  if (error instanceof VaultError) {
    console.error(kleur.red(`❌ ${error.message}`));
    process.exit(1);
  }
  throw error;
}

export async function serveCommand(options: ServeOptions) {
  const overrides: ConfigOverrides = {
    port: options.port ? parseInt(options.port, 10) : undefined,
    bindAddress: options.bind,
    databasePath: options.db,
  };

  let resolved: ResolvedConfig;
  try {
    const file = await readConfigFile(resolve(process.cwd(), options.config));
    resolved = resolveConfig({ file: file ?? undefined, env: process.env, overrides });
  } catch (error) {
    failStartup(error);
  }

  const { config, warnings } = resolved;
  const log = createLogger({ level: config.logLevel, mode: config.mode });
  for (const warning of warnings) {
    log.warn(warning);
  }

  console.log(kleur.cyan(`🚀 Starting vault server (${config.mode})...`));
  let running: RunningServer;
  try {
    running = await startServer(config, log);
  } catch (error) {
    log.error({ err: error }, "Server failed to start");
    failStartup(error);
  }

  if (running.services.keySource === "ephemeral") {
    console.log(kleur.yellow("   Encryption key is in memory only"));
  }
  console.log(kleur.gray(`   Register: POST http://${config.bindAddress}:${config.port}/api/auth/register`));

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down gracefully...`);

    // Force close after grace period
    setTimeout(() => {
      log.warn("Forcing shutdown after grace period");
      process.exit(1);
    }, GRACE_PERIOD_MS).unref();

    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      }
    );
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
