/**
 * init command - creates vault.config.json
 */

import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { DEFAULT_CONFIG } from "@credvault/shared";

export async function initCommand(): Promise<boolean> {
  const configPath = resolve(process.cwd(), "vault.config.json");

  if (existsSync(configPath)) {
    console.log(kleur.yellow("⚠ vault.config.json already exists"));
    return false;
  }

  await writeFile(
    configPath,
    JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
    "utf-8"
  );

  console.log(kleur.green("✅ Created vault.config.json"));
  console.log("\nNext steps:");
  console.log("  1. Run: vault generate-secrets, and export the values");
  console.log("  2. Run: vault serve");
  return true;
}
