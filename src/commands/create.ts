import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { getCommandContext } from "../lib/command-context";
import { parsePositiveInt } from "../lib/config";
import { createFleet, type FleetCreateReport } from "../lib/fleet";
import { ImageResolver } from "../lib/images";
import { Provisioner } from "../lib/provisioner";
import { ensureSshKey } from "../lib/ssh-keys";
import { formatSpec, resolveSpecInput, validateSpec } from "../lib/specs";
import { renderTable } from "../lib/table";

interface CreateOptions {
  specs?: string;
  distro?: string;
  versions?: string;
  count?: string;
  prefix?: string;
  memory?: string;
  vcpus?: string;
  disk?: string;
  concurrency?: string;
  timeout?: string;
}

export function registerCreateCommand(program: Command): void {
  program
    .command("create")
    .description("Create a fleet of test VMs from cloud images")
    .option("--specs <list>", "Comma-separated distro:version tokens, e.g. fedora:42,debian:12")
    .option("--distro <name>", "Distribution for --versions")
    .option("--versions <list>", "Comma-separated versions of --distro")
    .option("-n, --count <n>", "VMs per spec")
    .option("--prefix <prefix>", "VM name prefix")
    .option("--memory <mb>", "Memory per VM in MB")
    .option("--vcpus <n>", "vCPUs per VM")
    .option("--disk <gb>", "Disk size per VM in GB")
    .option("--concurrency <n>", "VMs provisioned in parallel")
    .option("--timeout <seconds>", "How long to wait for VM IP addresses")
    .action(async (options: CreateOptions) => {
      const { config, tools, hypervisor, logger } = await getCommandContext(program);

      const specs = resolveSpecInput(options, config.defaultSpecs);
      specs.forEach(validateSpec);
      const prefix = options.prefix ?? config.prefix;
      const countPerSpec = options.count ? parsePositiveInt(options.count, "--count") : config.countPerSpec;
      const resources = {
        memoryMb: options.memory ? parsePositiveInt(options.memory, "--memory") : config.resources.memoryMb,
        vcpus: options.vcpus ? parsePositiveInt(options.vcpus, "--vcpus") : config.resources.vcpus,
        diskGb: options.disk ? parsePositiveInt(options.disk, "--disk") : config.resources.diskGb
      };

      console.log(chalk.cyan("Create summary"));
      console.log(`  Specs: ${specs.map(formatSpec).join(", ")}`);
      console.log(`  VMs per spec: ${countPerSpec} (${countPerSpec * specs.length} total)`);
      console.log(`  Prefix: ${prefix}`);
      console.log(`  Resources: ${resources.memoryMb} MB RAM, ${resources.vcpus} vCPU, ${resources.diskGb} GB disk`);

      const sshPublicKey = await ensureSshKey(tools, config.sshKeyPath, logger);

      const progress: { spinner?: ReturnType<typeof ora> } = {};
      const report = await createFleet(
        { specs, countPerSpec, namePrefix: prefix, resources },
        {
          hypervisor,
          resolver: new ImageResolver({ imageDir: config.imageDir, tools, logger }),
          provisioner: new Provisioner({
            hypervisor,
            tools,
            resources,
            network: config.network,
            credentials: { username: config.vmUser, password: config.vmPassword, sshPublicKey },
            agent: config.agent,
            logger
          }),
          paths: { imageDir: config.imageDir, seedDir: config.seedDir },
          manifestPath: config.manifestPath,
          concurrency: options.concurrency ? parsePositiveInt(options.concurrency, "--concurrency") : config.concurrency,
          poll: {
            timeoutMs: options.timeout ? parsePositiveInt(options.timeout, "--timeout") * 1000 : config.waitTimeoutMs,
            intervalMs: config.waitIntervalMs
          },
          logger,
          onPollRound: (ready, total, elapsedMs) => {
            progress.spinner = progress.spinner ?? ora().start();
            progress.spinner.text = `${ready}/${total} VMs have IPs (${Math.round(elapsedMs / 1000)}s)`;
          }
        }
      );

      const { spinner } = progress;
      if (spinner) {
        if (report.poll.pending.size === 0) {
          spinner.succeed(`All ${report.names.length} VM(s) have IP addresses.`);
        } else {
          spinner.warn(`${report.poll.pending.size} VM(s) still without an IP address.`);
        }
      }

      printReport(report);
      console.log(`Next: run ${chalk.bold("snail-harness status --probe")} to follow guest setup.`);
    });
}

function printReport(report: FleetCreateReport): void {
  const rows = report.instances.map((item) => [
    item.name,
    formatSpec(item.spec),
    item.outcome,
    item.outcome === "failed" ? item.error : report.poll.ready.has(item.name) ? "has IP" : "no IP yet"
  ]);
  console.log("");
  console.log(renderTable(["NAME", "SPEC", "OUTCOME", "NOTE"], rows));

  const created = report.instances.filter((item) => item.outcome === "created").length;
  const existing = report.instances.filter((item) => item.outcome === "already-exists").length;
  const failed = report.instances.filter((item) => item.outcome === "failed").length;
  console.log("");
  console.log(`Created: ${created}  Already existed: ${existing}  Failed: ${failed}`);
  for (const failure of report.imageFailures) {
    console.log(chalk.red(`Image for ${formatSpec(failure.spec)} unavailable: ${failure.message}`));
  }
  console.log(`VM list: ${report.manifestPath}`);

  if (failed > 0) {
    process.exitCode = 1;
  }
}
