import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

export interface PackageMeta {
  name?: string;
  version?: string;
}

/** Finds the harness package.json from either the bundled dist/ entry or the sources. */
export function readPackageMeta(baseDir = __dirname): PackageMeta {
  const candidates = [path.resolve(baseDir, "../../package.json"), path.resolve(baseDir, "../package.json")];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed = JSON.parse(fs.readFileSync(candidate, "utf8")) as unknown;
    if (isRecord(parsed) && parsed.name === "snail-vm-harness") {
      return {
        name: parsed.name,
        version: typeof parsed.version === "string" ? parsed.version : undefined
      };
    }
  }

  return {};
}
