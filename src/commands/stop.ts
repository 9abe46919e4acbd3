import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { selectFleetDomains, type FleetSelector } from "../lib/hypervisor";
import { stopDomains } from "../lib/power";

interface StopOptions {
  vm?: string;
  prefix?: string;
  force?: boolean;
  wait?: boolean;
}

export function registerStopCommand(program: Command): void {
  program
    .command("stop")
    .description("Shut down running test VMs")
    .option("--vm <name>", "Stop a single VM")
    .option("--prefix <prefix>", "VM name prefix")
    .option("-f, --force", "Power off immediately (virsh destroy)")
    .option("-w, --wait", "Wait up to 60s for each VM to shut off")
    .action(async (options: StopOptions) => {
      const { config, hypervisor, logger } = await getCommandContext(program);
      const prefix = options.prefix ?? config.prefix;
      const selector: FleetSelector = options.vm ? { kind: "one", name: options.vm, prefix } : { kind: "all", prefix };

      const names = await selectFleetDomains(hypervisor, selector);
      if (names.length === 0) {
        console.log(`No VMs found with prefix '${prefix}'.`);
        return;
      }

      const report = await stopDomains(names, { force: options.force, wait: options.wait }, { hypervisor, logger });
      console.log(`Stopped: ${report.changed.length}  Already stopped: ${report.skipped.length}  Failed: ${report.failed.length}`);
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    });
}
