import fs from "node:fs";
import path from "node:path";

/** The fleet manifest: one VM name per line, rewritten on every create. */
export async function writeManifest(manifestPath: string, names: readonly string[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(manifestPath), { recursive: true });
  const body = names.length > 0 ? `${names.join("\n")}\n` : "";
  await fs.promises.writeFile(manifestPath, body, "utf8");
}

export async function readManifest(manifestPath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(manifestPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function removeManifest(manifestPath: string): Promise<void> {
  await fs.promises.rm(manifestPath, { force: true });
}
