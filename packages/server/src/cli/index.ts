#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { serveCommand } from "./commands/serve.js";
import { generateSecretsCommand } from "./commands/generate-secrets.js";

const program = new Command();

program
  .name("vault")
  .description("Credential vault and session-token issuer")
  .version("0.1.0");

program
  .command("init")
  .description("Create vault.config.json")
  .option("--dir <path>", "Project directory", ".")
  .action(async (options: { dir: string }) => {
    if (options.dir && options.dir !== ".") {
      process.chdir(options.dir);
    }
    await initCommand();
  });

program
  .command("generate-secrets")
  .description("Print a signing secret and an encryption key for deployment")
  .action(() => {
    generateSecretsCommand();
  });

program
  .command("serve")
  .description("Start the vault HTTP server")
  .option("-c, --config <path>", "Config file path", "vault.config.json")
  .option("-p, --port <number>", "Server port")
  .option("--bind <address>", "Bind address")
  .option("--db <path>", "SQLite database path")
  .option("--dir <path>", "Project directory", ".")
  .action(async (options) => {
    if (options.dir && options.dir !== ".") {
      process.chdir(options.dir);
    }
    await serveCommand(options);
  });

await program.parseAsync();
