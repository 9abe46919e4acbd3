import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { buildInventory, hostVarsFor } from "../lib/inventory";
import { collectStatus } from "../lib/status";

interface InventoryOptions {
  list?: boolean;
  host?: string;
  prefix?: string;
}

export function registerInventoryCommand(program: Command): void {
  program
    .command("inventory")
    .description("Print an Ansible dynamic inventory of running test VMs")
    .option("--list", "Print the full inventory (default)")
    .option("--host <name>", "Print variables for one host")
    .option("--prefix <prefix>", "VM name prefix")
    .action(async (options: InventoryOptions) => {
      const { config, tools, hypervisor, ssh } = await getCommandContext(program);
      const rows = await collectStatus(options.prefix ?? config.prefix, { probe: false }, { hypervisor, tools, ssh });

      const output = options.host ? hostVarsFor(rows, options.host) : buildInventory(rows, ssh);
      console.log(JSON.stringify(output, null, 2));
    });
}
