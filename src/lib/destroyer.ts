import fs from "node:fs";
import { errorMessage } from "./errors";
import type { HostTools } from "./exec";
import { selectFleetDomains, type FleetSelector, type Hypervisor } from "./hypervisor";
import { silentLogger, type Logger } from "./log";
import { removeManifest } from "./manifest";
import { diskPathFor, seedDirFor } from "./naming";

export type DestroyStep = "state" | "stop" | "undefine" | "disk" | "seed" | "seed-root" | "manifest";

export interface DestroyFailure {
  target: string;
  step: DestroyStep;
  message: string;
}

export interface DestroyReport {
  destroyed: string[];
  failures: DestroyFailure[];
}

export interface DestroyDeps {
  hypervisor: Hypervisor;
  tools: HostTools;
  imageDir: string;
  seedDir: string;
  manifestPath: string;
  logger?: Logger;
}

export async function destroyFleet(selector: FleetSelector, deps: DestroyDeps): Promise<DestroyReport> {
  const logger = deps.logger ?? silentLogger;
  const report: DestroyReport = { destroyed: [], failures: [] };
  const names = await selectFleetDomains(deps.hypervisor, selector);

  const record = (target: string, step: DestroyStep, error: unknown): void => {
    const message = errorMessage(error);
    logger.warn(`${target}: ${step} failed: ${message}`);
    report.failures.push({ target, step, message });
  };

  const attempt = async (target: string, step: DestroyStep, action: () => Promise<void>): Promise<boolean> => {
    try {
      await action();
      return true;
    } catch (error) {
      record(target, step, error);
      return false;
    }
  };

  for (const name of names) {
    logger.info(`Destroying ${name}...`);

    const state = await deps.hypervisor.domainState(name).catch((error: unknown) => {
      record(name, "state", error);
      return "unknown";
    });
    if (state === "running") {
      await attempt(name, "stop", () => deps.hypervisor.forceStop(name));
    }
    const removed = await attempt(name, "undefine", () =>
      deps.hypervisor.undefine(name, { removeAllStorage: true })
    );
    await attempt(name, "disk", async () => {
      await deps.tools.privileged("rm", ["-f", diskPathFor(deps.imageDir, name)]);
    });
    await attempt(name, "seed", () => fs.promises.rm(seedDirFor(deps.seedDir, name), { recursive: true, force: true }));

    if (removed) {
      report.destroyed.push(name);
      logger.success(`Destroyed ${name}`);
    }
  }

  if (selector.kind === "all" && names.length > 0) {
    await attempt(deps.seedDir, "seed-root", () => fs.promises.rm(deps.seedDir, { recursive: true, force: true }));
    await attempt(deps.manifestPath, "manifest", () => removeManifest(deps.manifestPath));
  }

  return report;
}
