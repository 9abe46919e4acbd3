import path from "node:path";
import { SEED_VOLUME_FILE } from "./constants";
import { DISTRIBUTIONS, type FleetRequest, type VmInstance, type VmSpec } from "./types";

export interface FleetPaths {
  imageDir: string;
  seedDir: string;
}

export function versionSlug(version: string): string {
  return version.replace(/\./g, "");
}

export function instanceName(prefix: string, spec: VmSpec, index: number): string {
  return `${prefix}-${spec.distribution}-${versionSlug(spec.version)}-${index}`;
}

export function diskPathFor(imageDir: string, name: string): string {
  return path.join(imageDir, `${name}.qcow2`);
}

export function seedDirFor(seedDir: string, name: string): string {
  return path.join(seedDir, name);
}

export function toInstance(prefix: string, spec: VmSpec, index: number, paths: FleetPaths): VmInstance {
  const name = instanceName(prefix, spec, index);
  return {
    name,
    spec,
    index,
    diskPath: diskPathFor(paths.imageDir, name),
    seedVolumePath: path.join(seedDirFor(paths.seedDir, name), SEED_VOLUME_FILE)
  };
}

/** countPerSpec instances per spec, spec-major, numbered from 1. */
export function expandFleet(request: FleetRequest, paths: FleetPaths): VmInstance[] {
  const instances: VmInstance[] = [];
  for (const spec of request.specs) {
    for (let index = 1; index <= request.countPerSpec; index++) {
      instances.push(toInstance(request.namePrefix, spec, index, paths));
    }
  }
  return instances;
}

export function sortDomainNames(names: Iterable<string>): string[] {
  return [...names].sort((a, b) => a.localeCompare(b, "en", { numeric: true }));
}

/**
 * `prefix-<distro>-<slug>-<n>`, or the older `prefix-<version>-<n>` that
 * predates multi-distro fleets. Anything else under the prefix is not ours.
 */
export function matchesNamingConvention(prefix: string, name: string): boolean {
  const head = prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`^${head}-(?:(?:${DISTRIBUTIONS.join("|")})-[0-9A-Za-z]+|[0-9]+)-[0-9]+$`);
  return pattern.test(name);
}
