import { errorMessage } from "./errors";
import type { Hypervisor } from "./hypervisor";
import { isPrivateIPv4 } from "./hypervisor";
import { silentLogger, type Logger } from "./log";
import { sleep } from "./utils";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  accept?: (address: string) => boolean;
}

export interface PollDeps {
  hypervisor: Hypervisor;
  clock?: Clock;
  logger?: Logger;
  onRound?: (readyCount: number, total: number, elapsedMs: number) => void;
}

export interface PollResult {
  ready: Set<string>;
  pending: Set<string>;
}

/**
 * Waits until every named domain reports an acceptable address, or the
 * timeout runs out. Never throws; whatever is still pending is returned.
 */
export async function awaitReachable(names: readonly string[], options: PollOptions, deps: PollDeps): Promise<PollResult> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  const accept = options.accept ?? isPrivateIPv4;

  const ready = new Set<string>();
  const pending = new Set(names);
  const start = clock.now();

  while (pending.size > 0) {
    for (const name of [...pending]) {
      const addresses = await deps.hypervisor.domainAddresses(name).catch((error: unknown) => {
        logger.debug(`Address query for ${name} failed: ${errorMessage(error)}`);
        return [];
      });
      if (addresses.some(accept)) {
        pending.delete(name);
        ready.add(name);
      }
    }

    const elapsed = clock.now() - start;
    deps.onRound?.(ready.size, names.length, elapsed);
    if (pending.size === 0) {
      break;
    }

    const remaining = options.timeoutMs - elapsed;
    if (remaining <= 0) {
      logger.warn(`Timeout waiting for VMs. ${ready.size}/${names.length} have IPs.`);
      break;
    }
    await clock.sleep(Math.min(options.intervalMs, remaining));
  }

  return { ready, pending };
}
