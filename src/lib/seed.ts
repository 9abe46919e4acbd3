import fs from "node:fs";
import path from "node:path";
import { SEED_VOLUME_LABEL } from "./constants";
import type { HostTools } from "./exec";
import type { VmInstance } from "./types";

export interface SeedDocuments {
  userData: string;
  metaData: string;
}

/**
 * Writes the NoCloud pair next to the seed volume path and packs them into
 * an ISO labelled `cidata`, which cloud-init looks for on first boot.
 */
export async function writeSeedVolume(tools: HostTools, instance: VmInstance, documents: SeedDocuments): Promise<string> {
  const outputDir = path.dirname(instance.seedVolumePath);
  await fs.promises.mkdir(outputDir, { recursive: true });

  const userDataPath = path.join(outputDir, "user-data");
  const metaDataPath = path.join(outputDir, "meta-data");
  await fs.promises.writeFile(userDataPath, documents.userData, "utf8");
  await fs.promises.writeFile(metaDataPath, documents.metaData, "utf8");

  await tools.exec(
    "genisoimage",
    ["-output", instance.seedVolumePath, "-volid", SEED_VOLUME_LABEL, "-joliet", "-rock", userDataPath, metaDataPath],
    { timeoutMs: 60_000 }
  );
  return instance.seedVolumePath;
}
