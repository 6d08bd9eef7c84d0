/**
 * generate-secrets command - prints fresh deployment secrets
 */

import kleur from "kleur";
import { generateEncryptionKey, generateSigningSecret } from "../../services/crypto.js";

export function generateSecretsCommand(): void {
  console.log(kleur.cyan("🔑 Production secrets\n"));
  console.log("Set these in the environment of every instance:\n");
  console.log(`JWT_SECRET_KEY=${generateSigningSecret()}`);
  console.log(`ENCRYPTION_KEY=${generateEncryptionKey()}\n`);
  console.log(
    kleur.yellow("⚠ Keep these secret. Changing ENCRYPTION_KEY makes stored credentials unreadable.")
  );
}
