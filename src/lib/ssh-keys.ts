import fs from "node:fs";
import path from "node:path";
import type { HostTools } from "./exec";
import { silentLogger, type Logger } from "./log";

export const SSH_KEY_COMMENT = "snail-test-vms";

export function publicKeyPath(keyPath: string): string {
  return `${keyPath}.pub`;
}

/** Returns the fleet public key, generating an ed25519 pair when none exists. */
export async function ensureSshKey(tools: HostTools, keyPath: string, logger: Logger = silentLogger): Promise<string> {
  const pubPath = publicKeyPath(keyPath);
  if (!fs.existsSync(keyPath) || !fs.existsSync(pubPath)) {
    logger.info(`Generating SSH key at ${keyPath}`);
    await fs.promises.mkdir(path.dirname(keyPath), { recursive: true, mode: 0o700 });
    await tools.exec("ssh-keygen", ["-t", "ed25519", "-f", keyPath, "-N", "", "-C", SSH_KEY_COMMENT], {
      timeoutMs: 30_000
    });
  }
  return (await fs.promises.readFile(pubPath, "utf8")).trim();
}
