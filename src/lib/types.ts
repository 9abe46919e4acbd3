export const DISTRIBUTIONS = ["fedora", "debian", "ubuntu", "centos", "rhel"] as const;

export type Distribution = (typeof DISTRIBUTIONS)[number];

export interface VmSpec {
  distribution: Distribution;
  version: string;
}

export interface VmResources {
  memoryMb: number;
  vcpus: number;
  diskGb: number;
}

export interface FleetRequest {
  specs: VmSpec[];
  countPerSpec: number;
  namePrefix: string;
  resources: VmResources;
}

export interface VmInstance {
  name: string;
  spec: VmSpec;
  index: number;
  diskPath: string;
  seedVolumePath: string;
}

export interface BaseImage {
  distribution: Distribution;
  version: string;
  localPath: string;
  sourceUrl?: string;
}

/** Raw `virsh domstate` output, e.g. "running", "shut off", "paused". */
export type DomainState = string;

export type SetupStatus = "ready" | "setup" | "unreachable" | "unknown";

export interface VmStatus {
  name: string;
  state: DomainState;
  ip?: string;
  setupStatus: SetupStatus;
}

export interface Credentials {
  username: string;
  password: string;
  sshPublicKey: string;
}

export interface AgentSettings {
  repoUrl: string;
  apiEndpoint: string;
  apiKey: string;
  logLevel: string;
}
