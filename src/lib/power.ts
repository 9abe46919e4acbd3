import { errorMessage } from "./errors";
import type { Hypervisor } from "./hypervisor";
import { silentLogger, type Logger } from "./log";
import { systemClock, type Clock } from "./poller";

export const SHUTDOWN_WAIT_MS = 60_000;
export const SHUTDOWN_POLL_MS = 2_000;

export interface PowerDeps {
  hypervisor: Hypervisor;
  logger?: Logger;
  clock?: Clock;
}

export interface StopOptions {
  force?: boolean;
  wait?: boolean;
}

export interface PowerReport {
  changed: string[];
  skipped: string[];
  failed: { name: string; message: string }[];
}

export async function startDomains(names: readonly string[], deps: PowerDeps): Promise<PowerReport> {
  const logger = deps.logger ?? silentLogger;
  const report: PowerReport = { changed: [], skipped: [], failed: [] };

  for (const name of names) {
    try {
      if ((await deps.hypervisor.domainState(name)) === "running") {
        logger.info(`${name} is already running`);
        report.skipped.push(name);
        continue;
      }
      await deps.hypervisor.start(name);
      logger.success(`Started ${name}`);
      report.changed.push(name);
    } catch (error) {
      logger.error(`Failed to start ${name}: ${errorMessage(error)}`);
      report.failed.push({ name, message: errorMessage(error) });
    }
  }
  return report;
}

export async function stopDomains(names: readonly string[], options: StopOptions, deps: PowerDeps): Promise<PowerReport> {
  const logger = deps.logger ?? silentLogger;
  const report: PowerReport = { changed: [], skipped: [], failed: [] };

  for (const name of names) {
    try {
      if ((await deps.hypervisor.domainState(name)) === "shut off") {
        logger.info(`${name} is already stopped`);
        report.skipped.push(name);
        continue;
      }
      if (options.force) {
        await deps.hypervisor.forceStop(name);
      } else {
        await deps.hypervisor.shutdown(name);
      }
      report.changed.push(name);
    } catch (error) {
      logger.error(`Failed to stop ${name}: ${errorMessage(error)}`);
      report.failed.push({ name, message: errorMessage(error) });
    }
  }

  for (const name of report.changed) {
    if (options.force) {
      logger.success(`Stopped ${name}`);
    } else if (!options.wait) {
      logger.info(`Shutdown requested for ${name}`);
    } else if (await waitForShutoff(name, deps)) {
      logger.success(`Stopped ${name}`);
    } else {
      logger.warn(`${name} did not shut off within ${SHUTDOWN_WAIT_MS / 1000}s`);
    }
  }
  return report;
}

export async function waitForShutoff(name: string, deps: PowerDeps, timeoutMs = SHUTDOWN_WAIT_MS): Promise<boolean> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  const start = clock.now();
  for (;;) {
    const state = await deps.hypervisor.domainState(name).catch((error: unknown) => {
      logger.debug(`State query for ${name} failed: ${errorMessage(error)}`);
      return "unknown";
    });
    if (state === "shut off") {
      return true;
    }
    const remaining = timeoutMs - (clock.now() - start);
    if (remaining <= 0) {
      return false;
    }
    await clock.sleep(Math.min(SHUTDOWN_POLL_MS, remaining));
  }
}
