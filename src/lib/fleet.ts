import { errorMessage } from "./errors";
import type { Hypervisor } from "./hypervisor";
import { silentLogger, type Logger } from "./log";
import { writeManifest } from "./manifest";
import { expandFleet, type FleetPaths } from "./naming";
import { awaitReachable, type Clock, type PollOptions, type PollResult } from "./poller";
import type { ProvisionResult } from "./provisioner";
import { formatSpec, validateSpec } from "./specs";
import type { BaseImage, FleetRequest, VmInstance, VmSpec } from "./types";
import { mapWithConcurrency } from "./utils";

export interface ImageSourceResolver {
  resolve(spec: VmSpec): Promise<BaseImage>;
}

export interface InstanceProvisioner {
  provision(instance: VmInstance, baseImage: BaseImage | undefined): Promise<ProvisionResult>;
}

export interface FleetDeps {
  hypervisor: Hypervisor;
  resolver: ImageSourceResolver;
  provisioner: InstanceProvisioner;
  paths: FleetPaths;
  manifestPath: string;
  poll: PollOptions;
  concurrency?: number;
  clock?: Clock;
  logger?: Logger;
  onPollRound?: (readyCount: number, total: number, elapsedMs: number) => void;
}

export type InstanceOutcome =
  | { name: string; spec: VmSpec; outcome: "created" | "already-exists" }
  | { name: string; spec: VmSpec; outcome: "failed"; error: string };

export interface ImageFailure {
  spec: VmSpec;
  message: string;
}

export interface FleetCreateReport {
  instances: InstanceOutcome[];
  imageFailures: ImageFailure[];
  manifestPath: string;
  names: string[];
  poll: PollResult;
}

export async function createFleet(request: FleetRequest, deps: FleetDeps): Promise<FleetCreateReport> {
  const logger = deps.logger ?? silentLogger;

  request.specs.forEach(validateSpec);
  const specs = uniqueSpecs(request.specs);

  const images = new Map<string, BaseImage>();
  const imageFailures: ImageFailure[] = [];
  for (const spec of specs) {
    try {
      images.set(formatSpec(spec), await deps.resolver.resolve(spec));
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Image for ${formatSpec(spec)} unavailable: ${message}`);
      imageFailures.push({ spec, message });
    }
  }

  const instances = expandFleet(request, deps.paths);
  logger.step(`Provisioning ${instances.length} VM(s) across ${request.specs.length} spec(s)`);

  const provision = async (instance: VmInstance): Promise<InstanceOutcome> => {
    try {
      const result = await deps.provisioner.provision(instance, images.get(formatSpec(instance.spec)));
      return { name: instance.name, spec: instance.spec, outcome: result.outcome };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to create ${instance.name}: ${message}`);
      return { name: instance.name, spec: instance.spec, outcome: "failed", error: message };
    }
  };

  // A repeated spec yields repeated names; those run after the pool so they
  // see the first copy's domain.
  const firstSeen = new Set<string>();
  const repeats = new Set<number>();
  instances.forEach((instance, index) => {
    if (firstSeen.has(instance.name)) {
      repeats.add(index);
    }
    firstSeen.add(instance.name);
  });

  const outcomes = new Array<InstanceOutcome>(instances.length);
  const firsts = instances.flatMap((instance, index) => (repeats.has(index) ? [] : [{ instance, index }]));
  await mapWithConcurrency(firsts, deps.concurrency ?? 1, async ({ instance, index }) => {
    outcomes[index] = await provision(instance);
  });
  for (const index of repeats) {
    outcomes[index] = await provision(instances[index]);
  }

  const names = [...new Set(outcomes.filter((item) => item.outcome !== "failed").map((item) => item.name))];
  await writeManifest(deps.manifestPath, names);
  logger.info(`VM list saved to ${deps.manifestPath}`);

  let poll: PollResult = { ready: new Set(), pending: new Set() };
  if (names.length > 0) {
    logger.step("Waiting for VMs to obtain IP addresses...");
    poll = await awaitReachable(names, deps.poll, {
      hypervisor: deps.hypervisor,
      clock: deps.clock,
      logger,
      onRound: deps.onPollRound
    });
  }

  return { instances: outcomes, imageFailures, manifestPath: deps.manifestPath, names, poll };
}

function uniqueSpecs(specs: readonly VmSpec[]): VmSpec[] {
  const seen = new Set<string>();
  return specs.filter((spec) => {
    const key = formatSpec(spec);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
