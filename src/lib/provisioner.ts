import fs from "node:fs";
import { buildBootstrapPayload, renderMetaData, renderUserData } from "./cloud-init";
import { BaseImageMissingError, RegistrationFailedError } from "./errors";
import type { HostTools } from "./exec";
import type { Hypervisor } from "./hypervisor";
import { inspectImage } from "./images";
import { silentLogger, type Logger } from "./log";
import { writeSeedVolume } from "./seed";
import { osVariantFor } from "./specs";
import type { AgentSettings, BaseImage, Credentials, VmInstance, VmResources } from "./types";

const GIB = 1024 ** 3;

export interface ProvisionerOptions {
  hypervisor: Hypervisor;
  tools: HostTools;
  resources: VmResources;
  network: string;
  credentials: Credentials;
  agent: AgentSettings;
  logger?: Logger;
}

export type ProvisionResult =
  | { outcome: "created"; instance: VmInstance }
  | { outcome: "already-exists"; instance: VmInstance };

export class Provisioner {
  private readonly options: ProvisionerOptions;
  private readonly logger: Logger;

  constructor(options: ProvisionerOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async provision(instance: VmInstance, baseImage: BaseImage | undefined): Promise<ProvisionResult> {
    const { hypervisor, tools, resources } = this.options;

    if (await hypervisor.domainExists(instance.name)) {
      this.logger.warn(`VM ${instance.name} already exists, skipping...`);
      return { outcome: "already-exists", instance };
    }

    if (!baseImage) {
      throw new BaseImageMissingError(instance.name);
    }
    if (!fs.existsSync(baseImage.localPath)) {
      throw new BaseImageMissingError(instance.name, baseImage.localPath);
    }

    this.logger.step(`Creating VM: ${instance.name}`);

    this.logger.info(`Creating disk: ${instance.diskPath}`);
    await tools.privileged("cp", ["--sparse=always", baseImage.localPath, instance.diskPath], { timeoutMs: 600_000 });
    await this.growDisk(instance.diskPath);

    this.logger.info("Creating cloud-init configuration...");
    const payload = buildBootstrapPayload(instance, this.options.credentials, this.options.agent);
    await writeSeedVolume(tools, instance, {
      userData: renderUserData(payload),
      metaData: renderMetaData(instance)
    });

    this.logger.info("Registering domain with virt-install...");
    try {
      await hypervisor.createDomain({
        name: instance.name,
        memoryMb: resources.memoryMb,
        vcpus: resources.vcpus,
        diskPath: instance.diskPath,
        diskGb: resources.diskGb,
        seedVolumePath: instance.seedVolumePath,
        osVariant: osVariantFor(instance.spec),
        network: this.options.network
      });
    } catch (error) {
      throw new RegistrationFailedError(instance.name, error);
    }

    this.logger.success(`VM ${instance.name} created!`);
    return { outcome: "created", instance };
  }

  // Cloud images ship small; qemu-img refuses to shrink, so only grow.
  private async growDisk(diskPath: string): Promise<void> {
    const { tools, resources } = this.options;
    const info = await inspectImage(tools, diskPath);
    const target = resources.diskGb * GIB;
    if (typeof info.virtualSizeBytes === "number" && info.virtualSizeBytes >= target) {
      this.logger.debug(`Disk already ${info.virtualSizeBytes} bytes, no resize needed`);
      return;
    }
    await tools.privileged("qemu-img", ["resize", diskPath, `${resources.diskGb}G`], { timeoutMs: 120_000 });
  }
}
