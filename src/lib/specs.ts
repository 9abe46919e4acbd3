import catalogData from "../data/distributions.json";
import { DEFAULT_DISTRIBUTION } from "./constants";
import { InvalidSpecFormatError } from "./errors";
import { DISTRIBUTIONS, type Distribution, type VmSpec } from "./types";
import { compareVersions } from "./utils";

export interface ImageSource {
  indexUrl: string;
  listingPattern: string;
  fallbackFiles: string[];
}

export interface OsVariantRule {
  minVersion: string;
  variant: string;
}

export interface DistributionEntry {
  label: string;
  releases: Record<string, string>;
  image: ImageSource | null;
  osVariants: OsVariantRule[];
  osVariantFallback: string;
}

export const CATALOG: Record<Distribution, DistributionEntry> = catalogData;

export function isDistribution(value: string): value is Distribution {
  return (DISTRIBUTIONS as readonly string[]).includes(value);
}

/**
 * Parses "fedora:42,debian:12,41" into specs, left to right. Bare versions
 * take the default distribution. Duplicates are kept.
 */
export function parseSpecs(specString: string, defaultDistribution: Distribution = DEFAULT_DISTRIBUTION): VmSpec[] {
  return specString.split(",").map((raw) => parseSpecToken(raw.trim(), defaultDistribution));
}

export function parseSpecToken(token: string, defaultDistribution: Distribution = DEFAULT_DISTRIBUTION): VmSpec {
  if (!token) {
    throw new InvalidSpecFormatError(token, "empty token");
  }

  const separator = token.indexOf(":");
  if (separator === -1) {
    return { distribution: defaultDistribution, version: token };
  }

  const distribution = token.slice(0, separator).trim().toLowerCase();
  const version = token.slice(separator + 1).trim();
  if (!isDistribution(distribution)) {
    throw new InvalidSpecFormatError(token, `unknown distribution '${distribution}' (expected one of ${DISTRIBUTIONS.join(", ")})`);
  }
  if (!version) {
    throw new InvalidSpecFormatError(token, "missing version");
  }
  return { distribution, version };
}

/** The `--distro debian --versions 12,11` input form. */
export function expandVersions(distribution: string, versionsCsv: string): VmSpec[] {
  const normalized = distribution.trim().toLowerCase();
  if (!isDistribution(normalized)) {
    throw new InvalidSpecFormatError(distribution, `unknown distribution '${distribution}'`);
  }
  return versionsCsv.split(",").map((raw) => parseSpecToken(raw.trim(), normalized));
}

export function validateSpec(spec: VmSpec): void {
  const entry = CATALOG[spec.distribution];
  if (!Object.hasOwn(entry.releases, spec.version)) {
    const known = knownVersions(spec.distribution).join(", ");
    throw new InvalidSpecFormatError(
      formatSpec(spec),
      `${entry.label} ${spec.version} is not a known release (known: ${known})`
    );
  }
}

export function codenameFor(spec: VmSpec): string {
  const releases = CATALOG[spec.distribution].releases;
  return Object.hasOwn(releases, spec.version) ? releases[spec.version] : spec.version;
}

/** Known versions, newest first. */
export function knownVersions(distribution: Distribution): string[] {
  return Object.keys(CATALOG[distribution].releases).sort((a, b) => compareVersions(b, a));
}

export function osVariantFor(spec: VmSpec): string {
  const entry = CATALOG[spec.distribution];
  const rules = [...entry.osVariants].sort((a, b) => compareVersions(b.minVersion, a.minVersion));
  for (const rule of rules) {
    if (compareVersions(spec.version, rule.minVersion) >= 0) {
      return rule.variant;
    }
  }
  return entry.osVariantFallback;
}

export function formatSpec(spec: VmSpec): string {
  return `${spec.distribution}:${spec.version}`;
}

export interface SpecInput {
  specs?: string;
  distro?: string;
  versions?: string;
}

/** `--specs` wins; otherwise `--distro` with `--versions`; otherwise the configured default. */
export function resolveSpecInput(input: SpecInput, defaultSpecs: string): VmSpec[] {
  if (input.specs) {
    return parseSpecs(input.specs);
  }
  if (input.distro || input.versions) {
    if (!input.versions) {
      throw new InvalidSpecFormatError(input.distro ?? "", "--distro needs --versions");
    }
    return expandVersions(input.distro ?? DEFAULT_DISTRIBUTION, input.versions);
  }
  return parseSpecs(defaultSpecs);
}
