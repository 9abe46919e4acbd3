import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { selectFleetDomains, type FleetSelector } from "../lib/hypervisor";
import { startDomains } from "../lib/power";

interface StartOptions {
  vm?: string;
  prefix?: string;
}

export function registerStartCommand(program: Command): void {
  program
    .command("start")
    .description("Start stopped test VMs")
    .option("--vm <name>", "Start a single VM")
    .option("--prefix <prefix>", "VM name prefix")
    .action(async (options: StartOptions) => {
      const { config, hypervisor, logger } = await getCommandContext(program);
      const prefix = options.prefix ?? config.prefix;
      const selector: FleetSelector = options.vm ? { kind: "one", name: options.vm, prefix } : { kind: "all", prefix };

      const names = await selectFleetDomains(hypervisor, selector);
      if (names.length === 0) {
        console.log(`No VMs found with prefix '${prefix}'.`);
        return;
      }

      const report = await startDomains(names, { hypervisor, logger });
      console.log(`Started: ${report.changed.length}  Already running: ${report.skipped.length}  Failed: ${report.failed.length}`);
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    });
}
